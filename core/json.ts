import { StructureError } from "./errors.js";
import type { JsonObject, JsonValue } from "./types.js";

/**
 * Check if value is a plain object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert parser output into JSON values. Dates become ISO strings, bigints
 * become numbers, `undefined` entries are dropped.
 */
export function toJsonValue(value: unknown, path = "$"): JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toJsonValue(item, `${path}[${index}]`));
  }
  if (typeof value === "object") {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      result[key] = toJsonValue(entry, `${path}.${key}`);
    }
    return result;
  }

  throw new StructureError(`Unsupported value of type ${typeof value} at ${path}`);
}

export function toJsonObject(value: unknown, source: string): JsonObject {
  if (value === null || value === undefined) {
    throw new StructureError(`No document found in ${source}`, { file: source });
  }
  const json = toJsonValue(value);
  if (!isJsonObject(json)) {
    throw new StructureError(`Root of ${source} must be a mapping`, { file: source });
  }
  return json;
}

/**
 * Deep equality check
 */
export function deepEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every((key) => key in b && deepEqual(a[key], b[key]));
  }

  return false;
}
