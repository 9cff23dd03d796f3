/**
 * Error taxonomy.
 *
 * Every fatal condition extends ConfigLoadError and carries a stable `code`.
 * Soft conditions are never thrown; they are reported as ConfigIssue values.
 */

export interface ConfigLoadErrorOptions {
  file?: string;
  cause?: unknown;
}

export class ConfigLoadError extends Error {
  readonly code: string;
  readonly file?: string;

  constructor(code: string, message: string, options: ConfigLoadErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.file = options.file;
  }
}

/**
 * Missing resource, missing document, or a root that is not a mapping
 */
export class StructureError extends ConfigLoadError {
  constructor(message: string, options: ConfigLoadErrorOptions = {}) {
    super("STRUCTURE_ERROR", message, options);
  }
}

export class RequiredFieldMissingError extends ConfigLoadError {
  constructor(
    readonly field: string,
    readonly key: string,
    options: ConfigLoadErrorOptions = {},
  ) {
    super(
      "REQUIRED_FIELD_MISSING",
      `Missing required config field: ${field}${key !== field ? ` (key "${key}")` : ""}`,
      options,
    );
  }
}

export class RangeViolationError extends ConfigLoadError {
  constructor(
    readonly field: string,
    readonly min: bigint,
    readonly max: bigint,
    readonly value: bigint,
    options: ConfigLoadErrorOptions = {},
  ) {
    super(
      "RANGE_VIOLATION",
      `Config field '${field}' out of range [${min}, ${max}]: ${value}`,
      options,
    );
  }
}

export class CustomValidationError extends ConfigLoadError {
  constructor(
    readonly field: string,
    detail: string,
    options: ConfigLoadErrorOptions = {},
  ) {
    super(
      "CUSTOM_VALIDATION_FAILED",
      `Validation failed for config field '${field}': ${detail}`,
      options,
    );
  }
}

export class ConstructionError extends ConfigLoadError {
  constructor(message: string, options: ConfigLoadErrorOptions = {}) {
    super("CONSTRUCTION_FAILED", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
