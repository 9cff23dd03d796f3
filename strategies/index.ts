/**
 * Config Formats
 *
 * Parsers and emitters for the supported file formats. YAML keeps the parsed
 * document tree so comments survive a rewrite; JSON and TOML work on plain
 * objects.
 */

import * as TOML from "@iarna/toml";
import YAML, { isMap } from "yaml";
import { StructureError, describeError } from "../core/errors.js";
import { isJsonObject, toJsonObject } from "../core/json.js";
import type { ConfigDocument, JsonObject, JsonValue } from "../core/types.js";

export interface ConfigFormat {
  name: string;
  extensions: readonly string[];
  /** Whether parse() keeps comments for emit() to write back */
  preservesComments: boolean;
  /**
   * Parse file content. Throws StructureError when the text does not parse
   * or its root is not a mapping.
   */
  parse(text: string, source: string): ConfigDocument;
  /** Flat key/value view of the root mapping */
  toBag(document: ConfigDocument, source: string): JsonObject;
  emit(document: ConfigDocument): string;
}

const YAML_OPTIONS = {
  indent: 2,
  lineWidth: 0, // Disable automatic line wrapping
} as const;

export class YamlFormat implements ConfigFormat {
  name = "yaml";
  extensions = [".yaml", ".yml"];
  preservesComments = true;

  parse(text: string, source: string): ConfigDocument {
    const tree = YAML.parseDocument(text);

    if (tree.errors.length > 0) {
      const details = tree.errors.map((error) => error.message).join("; ");
      throw new StructureError(`Invalid YAML in ${source}: ${details}`, { file: source });
    }
    if (tree.contents === null) {
      throw new StructureError(`No document found in ${source}`, { file: source });
    }
    if (!isMap(tree.contents)) {
      throw new StructureError(`Root of ${source} must be a mapping`, { file: source });
    }

    return { kind: "tree", tree };
  }

  toBag(document: ConfigDocument, source: string): JsonObject {
    if (document.kind === "bag") return document.bag;
    return toJsonObject(document.tree.toJS(), source);
  }

  emit(document: ConfigDocument): string {
    if (document.kind === "bag") {
      return YAML.stringify(document.bag, YAML_OPTIONS);
    }
    return document.tree.toString(YAML_OPTIONS);
  }
}

export class JsonFormat implements ConfigFormat {
  name = "json";
  extensions = [".json"];
  preservesComments = false;

  parse(text: string, source: string): ConfigDocument {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new StructureError(`Invalid JSON in ${source}: ${describeError(error)}`, {
        file: source,
        cause: error,
      });
    }
    return { kind: "bag", bag: toJsonObject(parsed, source) };
  }

  toBag(document: ConfigDocument, source: string): JsonObject {
    return bagOf(document, source);
  }

  emit(document: ConfigDocument): string {
    return `${JSON.stringify(bagOf(document, "document"), null, 2)}\n`;
  }
}

type TomlTable = Parameters<typeof TOML.stringify>[0];
type TomlList = boolean[] | number[] | string[] | TomlTable[];

export class TomlFormat implements ConfigFormat {
  name = "toml";
  extensions = [".toml"];
  preservesComments = false;

  parse(text: string, source: string): ConfigDocument {
    let parsed: unknown;
    try {
      parsed = TOML.parse(text);
    } catch (error) {
      throw new StructureError(`Invalid TOML in ${source}: ${describeError(error)}`, {
        file: source,
        cause: error,
      });
    }
    return { kind: "bag", bag: toJsonObject(parsed, source) };
  }

  toBag(document: ConfigDocument, source: string): JsonObject {
    return bagOf(document, source);
  }

  emit(document: ConfigDocument): string {
    return TOML.stringify(toTomlTable(bagOf(document, "document"), "$"));
  }
}

function bagOf(document: ConfigDocument, source: string): JsonObject {
  if (document.kind === "bag") return document.bag;
  return toJsonObject(document.tree.toJS(), source);
}

/**
 * TOML has no null, so null entries are dropped. Arrays must hold a single
 * value type.
 */
function toTomlTable(bag: JsonObject, path: string): TomlTable {
  const table: TomlTable = {};
  for (const [key, value] of Object.entries(bag)) {
    if (value === null) continue;
    const entryPath = `${path}.${key}`;

    if (Array.isArray(value)) {
      const nested = value.filter((item): item is JsonValue[] => Array.isArray(item));
      table[key] =
        nested.length > 0 && nested.length === value.length
          ? nested.map((item, i) => toTomlList(item, `${entryPath}[${i}]`))
          : toTomlList(value, entryPath);
    } else if (isJsonObject(value)) {
      table[key] = toTomlTable(value, entryPath);
    } else {
      table[key] = value;
    }
  }
  return table;
}

function toTomlList(items: JsonValue[], path: string): TomlList {
  const values = items.filter((item) => item !== null);

  const strings = values.filter((item): item is string => typeof item === "string");
  if (strings.length === values.length) return strings;

  const numbers = values.filter((item): item is number => typeof item === "number");
  if (numbers.length === values.length) return numbers;

  const booleans = values.filter((item): item is boolean => typeof item === "boolean");
  if (booleans.length === values.length) return booleans;

  const tables = values.filter(isJsonObject);
  if (tables.length === values.length) {
    return tables.map((table, i) => toTomlTable(table, `${path}[${i}]`));
  }

  throw new StructureError(`TOML arrays must hold a single value type (at ${path})`);
}

/**
 * Format registry
 */
export const formats: Record<string, ConfigFormat> = {
  yaml: new YamlFormat(),
  json: new JsonFormat(),
  toml: new TomlFormat(),
};

/**
 * Get format by name or auto-detect from file extension
 */
export function getFormat(formatName: string | undefined, filePath: string): ConfigFormat {
  if (formatName) {
    const format = formats[formatName.toLowerCase()];
    if (!format) {
      throw new StructureError(
        `Unknown config format "${formatName}" (expected one of ${Object.keys(formats).join(", ")})`,
      );
    }
    return format;
  }

  const fileName = filePath.toLowerCase();
  const detected = Object.values(formats).find((format) =>
    format.extensions.some((ext) => fileName.endsWith(ext)),
  );
  if (!detected) {
    throw new StructureError(`Cannot detect config format of ${filePath}`, { file: filePath });
  }
  return detected;
}

/**
 * Every extension a registered format reads, e.g. for globbing a defaults directory
 */
export function supportedExtensions(): string[] {
  return Object.values(formats).flatMap((format) => [...format.extensions]);
}
