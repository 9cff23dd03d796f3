/**
 * Field Resolver
 *
 * Turns a flat key/value bag into a typed config object using a schema.
 * Fields resolve in declaration order: lookup, custom loader or coercion,
 * default injection, missing handler, required check, range check. Validators
 * run once every field has a value, then the schema constructs the object.
 */

import { DefaultRegistry, createDefaultRegistry } from "../core/DefaultRegistry.js";
import {
  ConstructionError,
  CustomValidationError,
  RangeViolationError,
  RequiredFieldMissingError,
  describeError,
} from "../core/errors.js";
import { findKey } from "../core/keys.js";
import { silentLogger } from "../core/Logger.js";
import {
  type ConfigIssue,
  type ConfigLogger,
  ErrorSeverity,
  type JsonObject,
  type JsonValue,
} from "../core/types.js";
import { type FieldRange, type FieldRule, LONG_MAX, LONG_MIN } from "../schema/Field.js";
import { type FieldMap, type Schema, isResolved } from "../schema/Schema.js";

export interface FieldResolverOptions {
  registry?: DefaultRegistry;
  logger?: ConfigLogger;
}

export interface ResolveOptions {
  /** File the bag was read from, used in messages */
  source?: string;
}

export interface Resolution<T> {
  value: T;
  /** Soft issues raised along the way */
  issues: ConfigIssue[];
}

type Report = (issue: Omit<ConfigIssue, "file">) => void;

export class FieldResolver {
  private registry: DefaultRegistry;
  private logger: ConfigLogger;

  constructor(options: FieldResolverOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve every schema field from `bag` and construct the target object.
   * Throws on the first fatal condition; nothing partial is ever returned.
   */
  resolve<T, F extends FieldMap>(
    bag: JsonObject,
    schema: Schema<T, F>,
    options: ResolveOptions = {},
  ): Resolution<T> {
    const { source } = options;
    const issues: ConfigIssue[] = [];
    const report: Report = (issue) => {
      issues.push(source === undefined ? issue : { ...issue, file: source });
      this.logger.warn(issue.message);
    };

    const values: Record<string, unknown> = {};
    for (const [name, rule] of Object.entries(schema.fields)) {
      values[name] = this.resolveField(name, rule, bag, values, report, source);
    }

    for (const [name, rule] of Object.entries(schema.fields)) {
      const value = values[name];
      if (value === null) continue;

      const failure = rule.validate(value, values);
      if (failure) {
        this.logger.error(`Custom validation failed for field '${name}'`, failure.cause);
        throw new CustomValidationError(name, failure.detail, {
          file: source,
          cause: failure.cause,
        });
      }
    }

    if (!isResolved(schema.fields, values)) {
      throw new ConstructionError("Resolved values do not match the schema", {
        file: source,
      });
    }

    try {
      return { value: schema.construct(values), issues };
    } catch (error) {
      throw new ConstructionError(
        `Failed to construct config${source ? ` from ${source}` : ""}: ${describeError(error)}`,
        { file: source, cause: error },
      );
    }
  }

  /**
   * Resolve one field. `undefined` marks the field as missing until the end,
   * where it becomes null or fails the required check.
   */
  private resolveField(
    name: string,
    rule: FieldRule<unknown>,
    bag: JsonObject,
    values: Readonly<Record<string, unknown>>,
    report: Report,
    source: string | undefined,
  ): unknown {
    const key = rule.alias ?? name;
    const found = findKey(Object.keys(bag), key);
    const raw = found === undefined ? undefined : bag[found];

    let value = isMissing(raw) ? undefined : this.load(name, rule, raw, report);

    if (value === undefined && rule.defaultRaw !== undefined) {
      value = this.injectDefault(name, rule, rule.defaultRaw, report);
    }

    if (value === undefined && rule.onMissing) {
      try {
        rule.onMissing({ field: name, key, values: { ...values } });
      } catch (error) {
        report({
          severity: ErrorSeverity.WARNING,
          code: "MISSING_HANDLER_FAILED",
          field: name,
          message: `Missing-value handler for '${name}' failed: ${describeError(error)}`,
        });
      }
    }

    if (value === undefined) {
      if (rule.requirement === "hard") {
        this.logger.error(`Required field '${name}' is missing or blank!`);
        throw new RequiredFieldMissingError(name, key, { file: source });
      }
      if (rule.requirement === "soft") {
        report({
          severity: ErrorSeverity.WARNING,
          code: "SOFT_REQUIRED_MISSING",
          field: name,
          message: `Soft required field '${name}' is not set.`,
          suggestion: `Set "${key}" in the config file`,
        });
      }
      return null;
    }

    if (rule.bounds) {
      checkRange(name, rule.bounds, value, source);
    }

    return value;
  }

  private load(
    name: string,
    rule: FieldRule<unknown>,
    raw: JsonValue,
    report: Report,
  ): unknown {
    if (rule.loader) {
      let loaded: unknown;
      try {
        loaded = rule.loader(raw);
      } catch (error) {
        report({
          severity: ErrorSeverity.WARNING,
          code: "CUSTOM_LOADER_FAILED",
          field: name,
          message: `Custom loader for '${name}' failed: ${describeError(error)}`,
        });
        return undefined;
      }

      if (loaded === null || loaded === undefined) return undefined;
      if (rule.kind.is(loaded)) return loaded;

      report({
        severity: ErrorSeverity.WARNING,
        code: "TYPE_MISMATCH",
        field: name,
        message: `Custom loader for '${name}' returned a value of the wrong type (expected ${rule.kind.label})`,
      });
      return undefined;
    }

    if (rule.kind.is(raw)) return raw;
    return this.coerce(name, rule, raw, report);
  }

  /**
   * Scalars of the wrong type go through the registry parser for the kind,
   * so `port: "8080"` still resolves an integer field.
   */
  private coerce(
    name: string,
    rule: FieldRule<unknown>,
    raw: JsonValue,
    report: Report,
  ): unknown {
    const parser = this.registry.get(rule.kind.name);
    let reason = "";
    if (
      parser &&
      (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean")
    ) {
      try {
        const parsed = parser(String(raw));
        if (rule.kind.is(parsed)) return parsed;
      } catch (error) {
        reason = ` (${describeError(error)})`;
      }
    }

    report({
      severity: ErrorSeverity.WARNING,
      code: "TYPE_MISMATCH",
      field: name,
      message: `Field '${name}' expected ${rule.kind.label}, got ${JSON.stringify(raw)}${reason}`,
    });
    return undefined;
  }

  private injectDefault(
    name: string,
    rule: FieldRule<unknown>,
    defaultRaw: string,
    report: Report,
  ): unknown {
    const parser = this.registry.get(rule.kind.name);
    if (!parser) {
      report({
        severity: ErrorSeverity.WARNING,
        code: "UNREGISTERED_DEFAULT_TYPE",
        field: name,
        message: `No default parser registered for '${rule.kind.name}' to parse the default of '${name}'`,
        suggestion: `Register one with registry.register("${rule.kind.name}", parser)`,
      });
      return undefined;
    }

    let detail: string;
    try {
      const parsed = parser(defaultRaw);
      if (rule.kind.is(parsed)) {
        this.logger.info(`Field '${name}' was missing or blank, set default: ${defaultRaw}`);
        return parsed;
      }
      detail = `expected ${rule.kind.label}`;
    } catch (error) {
      detail = describeError(error);
    }

    report({
      severity: ErrorSeverity.WARNING,
      code: "DEFAULT_PARSE_FAILED",
      field: name,
      message: `Failed to parse default value "${defaultRaw}" for field '${name}': ${detail}`,
    });
    return undefined;
  }
}

function isMissing(raw: JsonValue | undefined): raw is undefined | null {
  return raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "");
}

/**
 * Widen a number to a signed 64-bit integer, truncating toward zero and
 * saturating at the bounds. NaN becomes 0.
 */
export function toLong(value: number | bigint): bigint {
  if (typeof value === "bigint") {
    if (value < LONG_MIN) return LONG_MIN;
    if (value > LONG_MAX) return LONG_MAX;
    return value;
  }
  if (Number.isNaN(value)) return 0n;
  if (value >= 2 ** 63) return LONG_MAX;
  if (value <= -(2 ** 63)) return LONG_MIN;
  return BigInt(Math.trunc(value));
}

function checkRange(
  name: string,
  bounds: FieldRange,
  value: unknown,
  source: string | undefined,
): void {
  if (typeof value !== "number" && typeof value !== "bigint") return;

  const long = toLong(value);
  if (long < bounds.min || long > bounds.max) {
    throw new RangeViolationError(name, bounds.min, bounds.max, long, { file: source });
  }
}
