import { describe, expect, it } from "vitest";
import { compareVersions, isOlderVersion, parseVersion } from "../Version.js";

describe("parseVersion", () => {
  it("reads non-numeric components as zero", () => {
    expect(parseVersion("2.beta.1")).toEqual([2, 0, 1]);
  });
});

describe("compareVersions", () => {
  it("pads missing components with zero", () => {
    expect(compareVersions("1.2", "1.2.0")).toBe(0);
  });

  it("compares components as integers", () => {
    expect(compareVersions("1.10.0", "1.9.9")).toBe(1);
    expect(compareVersions("1.0.0", "1.0.1")).toBe(-1);
  });

  it("treats non-numeric components as zero", () => {
    expect(compareVersions("1.x.3", "1.0.3")).toBe(0);
  });
});

describe("isOlderVersion", () => {
  it("detects a shorter but older version", () => {
    expect(isOlderVersion("1.2", "1.2.0.1")).toBe(true);
    expect(isOlderVersion("2.0", "1.9")).toBe(false);
  });
});
