import { describe, expect, it } from "vitest";
import { DefaultRegistry, createDefaultRegistry } from "../DefaultRegistry.js";

function parse(kind: string, raw: string): unknown {
  const parser = createDefaultRegistry().get(kind);
  if (!parser) throw new Error(`no parser for ${kind}`);
  return parser(raw);
}

describe("DefaultRegistry", () => {
  it("starts empty", () => {
    expect(new DefaultRegistry().has("string")).toBe(false);
  });

  it("registers the built-in kinds", () => {
    const registry = createDefaultRegistry();

    expect(["string", "boolean", "integer", "number", "enum"].every((kind) => registry.has(kind))).toBe(true);
    expect(registry.has("list")).toBe(false);
  });

  it("parses booleans strictly", () => {
    expect(parse("boolean", " TRUE ")).toBe(true);
    expect(parse("boolean", "false")).toBe(false);
    expect(() => parse("boolean", "yes")).toThrow(`"yes" is not a boolean`);
  });

  it("parses integers within the safe range", () => {
    expect(parse("integer", " -42 ")).toBe(-42);
    expect(() => parse("integer", "4.2")).toThrow(`"4.2" is not an integer`);
    expect(() => parse("integer", "99999999999999999999")).toThrow(
      `"99999999999999999999" is outside the safe integer range`,
    );
  });

  it("parses finite numbers", () => {
    expect(parse("number", "1e3")).toBe(1000);
    expect(() => parse("number", "abc")).toThrow(`"abc" is not a number`);
    expect(() => parse("number", "  ")).toThrow(`"  " is not a number`);
  });

  it("trims enum text", () => {
    expect(parse("enum", " debug ")).toBe("debug");
  });

  it("replaces a parser on register", () => {
    const registry = createDefaultRegistry().register("string", (raw) => raw.toUpperCase());

    expect(registry.get("string")?.("abc")).toBe("ABC");
  });
});
