/**
 * Default Registry
 *
 * Maps a field kind name to the parser that turns a raw default text (and
 * scalar values found in a config file) into a typed value.
 */

export type DefaultParser = (raw: string) => unknown;

export class DefaultRegistry {
  private parsers = new Map<string, DefaultParser>();

  /**
   * Register a parser for a kind name. An existing parser is replaced.
   */
  register(kind: string, parser: DefaultParser): this {
    this.parsers.set(kind, parser);
    return this;
  }

  get(kind: string): DefaultParser | undefined {
    return this.parsers.get(kind);
  }

  has(kind: string): boolean {
    return this.parsers.has(kind);
  }

  /**
   * Register the parsers for the built-in kinds
   */
  registerDefaults(): this {
    return this.register("string", (raw) => raw)
      .register("boolean", parseBoolean)
      .register("integer", parseInteger)
      .register("number", parseNumber)
      .register("enum", (raw) => raw.trim());
  }
}

export function createDefaultRegistry(): DefaultRegistry {
  return new DefaultRegistry().registerDefaults();
}

function parseBoolean(raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === "true") return true;
  if (value === "false") return false;
  throw new Error(`"${raw}" is not a boolean`);
}

function parseInteger(raw: string): number {
  const value = raw.trim();
  if (!/^[+-]?\d+$/.test(value)) {
    throw new Error(`"${raw}" is not an integer`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`"${raw}" is outside the safe integer range`);
  }
  return parsed;
}

function parseNumber(raw: string): number {
  const value = raw.trim();
  const parsed = Number(value);
  if (value === "" || !Number.isFinite(parsed)) {
    throw new Error(`"${raw}" is not a number`);
  }
  return parsed;
}
