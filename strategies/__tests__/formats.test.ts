import { describe, expect, it } from "vitest";
import { StructureError } from "../../core/errors.js";
import { JsonFormat, TomlFormat, YamlFormat, getFormat } from "../index.js";

describe("YamlFormat", () => {
  const yaml = new YamlFormat();

  it("parses a mapping into a comment-keeping tree", () => {
    const document = yaml.parse("# header\nport: 8080\n", "app.yml");

    expect(document.kind).toBe("tree");
    expect(yaml.toBag(document, "app.yml")).toEqual({ port: 8080 });
    expect(yaml.emit(document)).toContain("# header");
  });

  it("rejects a root that is not a mapping", () => {
    expect(() => yaml.parse("- a\n- b\n", "app.yml")).toThrow(
      new StructureError("Root of app.yml must be a mapping"),
    );
  });

  it("rejects an empty document", () => {
    expect(() => yaml.parse("", "app.yml")).toThrow("No document found in app.yml");
  });

  it("rejects malformed YAML", () => {
    expect(() => yaml.parse("a: [1, 2\n", "app.yml")).toThrow(/^Invalid YAML in app\.yml/);
  });
});

describe("JsonFormat", () => {
  const json = new JsonFormat();

  it("emits two-space JSON with a trailing newline", () => {
    const document = json.parse('{"port":8080,"tags":["a"]}', "app.json");

    expect(json.emit(document)).toBe('{\n  "port": 8080,\n  "tags": [\n    "a"\n  ]\n}\n');
  });

  it("rejects a root that is not an object", () => {
    expect(() => json.parse("[1]", "app.json")).toThrow("Root of app.json must be a mapping");
    expect(() => json.parse("null", "app.json")).toThrow("No document found in app.json");
  });

  it("rejects malformed JSON", () => {
    expect(() => json.parse("{bad", "app.json")).toThrow(StructureError);
  });
});

describe("TomlFormat", () => {
  const toml = new TomlFormat();

  it("turns dates into ISO strings", () => {
    const document = toml.parse("created = 2024-01-02T03:04:05Z\n", "app.toml");

    expect(toml.toBag(document, "app.toml")).toEqual({ created: "2024-01-02T03:04:05.000Z" });
  });

  it("round-trips tables and arrays, dropping nulls", () => {
    const document = {
      kind: "bag" as const,
      bag: { name: "svc", unset: null, server: { port: 9000, hosts: ["a", "b"] } },
    };

    const reparsed = toml.parse(toml.emit(document), "app.toml");

    expect(toml.toBag(reparsed, "app.toml")).toEqual({
      name: "svc",
      server: { port: 9000, hosts: ["a", "b"] },
    });
  });

  it("rejects arrays of mixed types", () => {
    const document = { kind: "bag" as const, bag: { list: [1, "a"] } };

    expect(() => toml.emit(document)).toThrow("TOML arrays must hold a single value type (at $.list)");
  });
});

describe("getFormat", () => {
  it("detects the format from the extension", () => {
    expect(getFormat(undefined, "config/app.YML").name).toBe("yaml");
    expect(getFormat(undefined, "app.toml").name).toBe("toml");
  });

  it("prefers an explicit format name", () => {
    expect(getFormat("json", "app.conf").name).toBe("json");
  });

  it("rejects unknown formats", () => {
    expect(() => getFormat("xml", "app.xml")).toThrow(
      'Unknown config format "xml" (expected one of yaml, json, toml)',
    );
    expect(() => getFormat(undefined, "app.ini")).toThrow("Cannot detect config format of app.ini");
  });
});
