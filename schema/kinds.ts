/**
 * Field kinds
 *
 * A kind names the DefaultRegistry parser used for defaults and scalar
 * coercion, and guards the runtime shape of a resolved value.
 */

import { isJsonObject } from "../core/json.js";
import type { JsonObject } from "../core/types.js";

export interface FieldKind<V> {
  /** DefaultRegistry key */
  readonly name: string;
  /** Human readable description used in messages */
  readonly label: string;
  is(value: unknown): value is V;
}

export function customKind<V>(
  name: string,
  is: (value: unknown) => value is V,
  label = name,
): FieldKind<V> {
  return { name, label, is };
}

export const stringKind = customKind(
  "string",
  (value): value is string => typeof value === "string",
);

export const booleanKind = customKind(
  "boolean",
  (value): value is boolean => typeof value === "boolean",
);

export const integerKind = customKind(
  "integer",
  (value): value is number => Number.isSafeInteger(value),
);

export const numberKind = customKind(
  "number",
  (value): value is number => typeof value === "number" && Number.isFinite(value),
);

export const mappingKind = customKind<JsonObject>("mapping", isJsonObject);

export function oneOfKind<const T extends readonly string[]>(
  values: T,
): FieldKind<T[number]> {
  return customKind(
    "enum",
    (value): value is T[number] =>
      typeof value === "string" && values.some((allowed) => allowed === value),
    `one of ${values.join(", ")}`,
  );
}

export function listKind<V>(item: FieldKind<V>): FieldKind<V[]> {
  return customKind(
    "list",
    (value): value is V[] =>
      Array.isArray(value) && value.every((entry) => item.is(entry)),
    `list of ${item.label}`,
  );
}
