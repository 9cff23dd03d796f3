import type { FieldRule } from "./Field.js";

export type FieldMap = Record<string, FieldRule<unknown>>;

/**
 * The value bag a schema resolves to, one entry per declared field
 */
export type InferFields<F extends FieldMap> = {
  [K in keyof F]: F[K] extends FieldRule<infer Out> ? Out : never;
};

export interface Schema<T, F extends FieldMap = FieldMap> {
  readonly fields: F;
  /** Canonical constructor, called once with every resolved field */
  construct(values: InferFields<F>): T;
}

/**
 * Declare the fields of a config type once; the schema is reused on every load.
 *
 * @example
 * const ServerSchema = defineSchema({
 *   port: field.integer().default(8080).range(1, 65535),
 *   apiKey: field.string().name("API_KEY").softRequired(),
 * });
 */
export function defineSchema<F extends FieldMap>(
  fields: F,
): Schema<InferFields<F>, F>;
export function defineSchema<F extends FieldMap, T>(
  fields: F,
  construct: (values: InferFields<F>) => T,
): Schema<T, F>;
export function defineSchema<F extends FieldMap, T>(
  fields: F,
  construct?: (values: InferFields<F>) => T,
): Schema<T, F> | Schema<InferFields<F>, F> {
  if (construct) {
    return { fields, construct };
  }
  return { fields, construct: (values) => values };
}

/**
 * Whether every declared field holds a value its rule accepts
 */
export function isResolved<F extends FieldMap>(
  fields: F,
  values: unknown,
): values is InferFields<F> {
  if (typeof values !== "object" || values === null) return false;
  const entries = new Map<string, unknown>(Object.entries(values));
  return Object.entries(fields).every(([name, rule]) =>
    rule.accepts(entries.get(name)),
  );
}
