/**
 * Field rules
 *
 * A FieldBuilder is an immutable rule for one schema field: every method
 * returns a new builder. Its type tracks the resolved value: `V | null` until
 * `required()` is called, `V` afterwards.
 */

import { describeError } from "../core/errors.js";
import type { JsonObject } from "../core/types.js";
import {
  type FieldKind,
  booleanKind,
  integerKind,
  listKind,
  mappingKind,
  numberKind,
  oneOfKind,
  stringKind,
} from "./kinds.js";

export type Requirement = "none" | "soft" | "hard";

export interface FieldRange {
  min: bigint;
  max: bigint;
}

export const LONG_MIN = -(2n ** 63n);
export const LONG_MAX = 2n ** 63n - 1n;

/**
 * Returning `false` or a message string fails validation, as does throwing.
 */
export type ValidationOutcome = void | boolean | string;

export type FieldValidator<V> = (
  value: V,
  values: Readonly<Record<string, unknown>>,
) => ValidationOutcome;

export interface MissingFieldContext {
  field: string;
  key: string;
  /** Values resolved before this field */
  values: Readonly<Record<string, unknown>>;
}

export type MissingHandler = (context: MissingFieldContext) => void;

export interface ValidationFailure {
  detail: string;
  cause?: unknown;
}

/**
 * Runtime view of a field rule, as consumed by the FieldResolver
 */
export interface FieldRule<Out> {
  readonly kind: FieldKind<unknown>;
  readonly alias?: string;
  readonly requirement: Requirement;
  readonly bounds?: FieldRange;
  readonly defaultRaw?: string;
  readonly loader?: (raw: unknown) => unknown;
  readonly onMissing?: MissingHandler;
  /** Whether `value` is an acceptable final value for this field */
  accepts(value: unknown): value is Out;
  validate(
    value: unknown,
    values: Readonly<Record<string, unknown>>,
  ): ValidationFailure | undefined;
}

interface FieldSettings<V> {
  alias?: string;
  requirement: Requirement;
  bounds?: FieldRange;
  defaultRaw?: string;
  loader?: (raw: unknown) => V | null | undefined;
  validators: ReadonlyArray<FieldValidator<V>>;
  onMissing?: MissingHandler;
}

export class FieldBuilder<V, N extends null = null> implements FieldRule<V | N> {
  constructor(
    readonly kind: FieldKind<V>,
    private readonly settings: FieldSettings<V> = {
      requirement: "none",
      validators: [],
    },
  ) {}

  get alias(): string | undefined {
    return this.settings.alias;
  }

  get requirement(): Requirement {
    return this.settings.requirement;
  }

  get bounds(): FieldRange | undefined {
    return this.settings.bounds;
  }

  get defaultRaw(): string | undefined {
    return this.settings.defaultRaw;
  }

  get loader(): ((raw: unknown) => V | null | undefined) | undefined {
    return this.settings.loader;
  }

  get onMissing(): MissingHandler | undefined {
    return this.settings.onMissing;
  }

  /**
   * Read the value from `key` instead of the field name
   */
  name(key: string): FieldBuilder<V, N> {
    return this.with({ alias: key });
  }

  /**
   * Raw default text, parsed with the DefaultRegistry entry for this kind
   */
  default(raw: string | number | boolean): FieldBuilder<V, N> {
    return this.with({ defaultRaw: String(raw) });
  }

  /**
   * Fail the whole load when the field is missing or blank
   */
  required(): FieldBuilder<V, never> {
    return new FieldBuilder<V, never>(this.kind, {
      ...this.settings,
      requirement: "hard",
    });
  }

  /**
   * Report a warning when the field is missing or blank, and resolve it to null
   */
  softRequired(): FieldBuilder<V, null> {
    return new FieldBuilder<V, null>(this.kind, {
      ...this.settings,
      requirement: "soft",
    });
  }

  /**
   * Inclusive bounds. Values are truncated to a 64-bit integer before comparing.
   */
  range(min: number | bigint = LONG_MIN, max: number | bigint = LONG_MAX): FieldBuilder<V, N> {
    const bounds = { min: BigInt(min), max: BigInt(max) };
    if (bounds.min > bounds.max) {
      throw new RangeError(`Invalid range [${bounds.min}, ${bounds.max}]`);
    }
    return this.with({ bounds });
  }

  loadWith(loader: (raw: unknown) => V | null | undefined): FieldBuilder<V, N> {
    return this.with({ loader });
  }

  validateWith(validator: FieldValidator<V>): FieldBuilder<V, N> {
    return this.with({ validators: [...this.settings.validators, validator] });
  }

  ifMissing(handler: MissingHandler): FieldBuilder<V, N> {
    return this.with({ onMissing: handler });
  }

  accepts(value: unknown): value is V | N {
    if (value === null) {
      return this.settings.requirement !== "hard";
    }
    return this.kind.is(value);
  }

  validate(
    value: unknown,
    values: Readonly<Record<string, unknown>>,
  ): ValidationFailure | undefined {
    if (!this.kind.is(value)) return undefined;

    for (const validator of this.settings.validators) {
      let outcome: ValidationOutcome;
      try {
        outcome = validator(value, values);
      } catch (error) {
        return { detail: describeError(error), cause: error };
      }
      if (outcome === false) {
        return { detail: `value ${JSON.stringify(value)} was rejected` };
      }
      if (typeof outcome === "string") {
        return { detail: outcome };
      }
    }
    return undefined;
  }

  private with(patch: Partial<FieldSettings<V>>): FieldBuilder<V, N> {
    return new FieldBuilder<V, N>(this.kind, { ...this.settings, ...patch });
  }
}

export const field = {
  string: () => new FieldBuilder(stringKind),
  boolean: () => new FieldBuilder(booleanKind),
  integer: () => new FieldBuilder(integerKind),
  number: () => new FieldBuilder(numberKind),
  mapping: () => new FieldBuilder<JsonObject>(mappingKind),
  oneOf: <const T extends readonly string[]>(values: T) =>
    new FieldBuilder(oneOfKind(values)),
  list: <V>(item: FieldKind<V>) => new FieldBuilder(listKind(item)),
  of: <V>(kind: FieldKind<V>) => new FieldBuilder(kind),
};
