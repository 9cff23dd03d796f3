/**
 * Document Merger
 *
 * Merges a user's config document onto a newer bundled default. The default
 * is the base; every value the user set wins, mappings merge recursively and
 * keys only the user has are appended. The top-level version always comes
 * from the default. YAML trees keep the user's comments.
 */

import { type Document, type Pair, type YAMLMap, isMap, isNode, isScalar, visit } from "yaml";
import { StructureError } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";
import { findKey, isVersionKey, normalizeKey, VERSION_KEY } from "../core/keys.js";
import { silentLogger } from "../core/Logger.js";
import type { ConfigDocument, ConfigLogger, JsonObject, JsonValue } from "../core/types.js";
import { DEFAULT_VERSION, compareVersions } from "../core/Version.js";

export interface MergeResult {
  document: ConfigDocument;
  /** Whether the merged version differs from the current one */
  changed: boolean;
  fromVersion: string;
  toVersion: string;
}

export interface DocumentMergerOptions {
  logger?: ConfigLogger;
}

type Warn = (message: string) => void;

export class DocumentMerger {
  private logger: ConfigLogger;

  constructor(options: DocumentMergerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  merge(defaults: ConfigDocument, current: ConfigDocument): MergeResult {
    const fromVersion = versionOf(current);
    const document = this.mergeDocuments(defaults, current);
    const toVersion = versionOf(document);

    return {
      document,
      changed: compareVersions(fromVersion, toVersion) !== 0,
      fromVersion,
      toVersion,
    };
  }

  private mergeDocuments(defaults: ConfigDocument, current: ConfigDocument): ConfigDocument {
    const warn: Warn = (message) => this.logger.warn(message);

    if (defaults.kind === "bag" && current.kind === "bag") {
      return { kind: "bag", bag: mergeBags(defaults.bag, current.bag, undefined, warn) };
    }
    if (defaults.kind === "tree" && current.kind === "tree") {
      // Nodes move between documents, so no alias may outlive its anchor
      const tree = inlineAliases(defaults.tree.clone());
      const userTree = inlineAliases(current.tree.clone());
      const base = tree.contents;
      const user = userTree.contents;
      if (!isMap(base) || !isMap(user)) {
        throw new StructureError("Both documents must have a mapping root");
      }

      mergeMaps(base, user, undefined, warn);
      copyComments(userTree, tree);
      copyComments(user, base);
      return { kind: "tree", tree };
    }

    throw new StructureError(
      `Cannot merge a ${current.kind} document onto a ${defaults.kind} document`,
    );
  }
}

/**
 * Version declared by the top-level `version` key, `1.0.0` when absent
 */
export function versionOf(document: ConfigDocument): string {
  if (document.kind === "bag") {
    const key = findKey(Object.keys(document.bag), VERSION_KEY);
    return key === undefined ? DEFAULT_VERSION : versionText(document.bag[key]);
  }

  const root = document.tree.contents;
  if (!isMap(root)) return DEFAULT_VERSION;

  const pair = findPair(root, VERSION_KEY);
  if (!pair) return DEFAULT_VERSION;
  if (!isScalar(pair.value)) return versionText(pair.value);
  // Plain `1.10` parses to the number 1.1; the text as written is the version
  const { source, value } = pair.value;
  return versionText(typeof source === "string" && value !== null ? source : value);
}

function versionText(value: unknown): string {
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  return DEFAULT_VERSION;
}

/**
 * `prefix` is the dotted path of the mapping, undefined at the root
 */
function mergeBags(
  base: JsonObject,
  current: JsonObject,
  prefix: string | undefined,
  warn: Warn,
): JsonObject {
  const entries: Array<[string, JsonValue]> = Object.entries(base);
  warnCollisions(Object.keys(current), prefix, warn);

  for (const [key, value] of Object.entries(current)) {
    if (prefix === undefined && isVersionKey(key)) continue;

    const match = findKey(
      entries.map(([existing]) => existing),
      key,
    );
    const index = entries.findIndex(([existing]) => existing === match);
    if (match === undefined || index < 0) {
      entries.push([key, value]);
      continue;
    }

    const baseValue = entries[index][1];
    entries[index] = [
      key,
      isJsonObject(baseValue) && isJsonObject(value)
        ? mergeBags(baseValue, value, childPath(prefix, key), warn)
        : value,
    ];
  }

  return Object.fromEntries(entries);
}

function mergeMaps(
  base: YAMLMap,
  current: YAMLMap,
  prefix: string | undefined,
  warn: Warn,
): void {
  warnCollisions(
    current.items.map((pair) => keyText(pair.key)),
    prefix,
    warn,
  );

  for (const pair of current.items) {
    const key = keyText(pair.key);
    const match = findPair(base, key);

    if (prefix === undefined && isVersionKey(key)) {
      // A header comment without a blank line below it sits on the first key
      if (match && isNode(pair.key) && isNode(match.key)) copyComments(pair.key, match.key);
      continue;
    }

    if (!match) {
      base.items.push(pair.clone());
      continue;
    }

    if (isMap(match.value) && isMap(pair.value)) {
      mergeMaps(match.value, pair.value, childPath(prefix, key), warn);
      copyComments(pair.value, match.value);
    } else {
      match.value = isNode(pair.value) ? pair.value.clone() : pair.value;
    }

    if (isScalar(match.key)) {
      match.key.value = key;
      if (isNode(pair.key)) copyComments(pair.key, match.key);
    } else {
      match.key = isNode(pair.key) ? pair.key.clone() : pair.key;
    }
  }
}

/**
 * Replace every alias with a copy of the node it points to
 */
function inlineAliases(document: Document): Document {
  visit(document, {
    Alias(_, alias) {
      const target = alias.resolve(document);
      if (!target) return undefined;
      const copy = target.clone();
      copy.anchor = undefined;
      return copy;
    },
  });
  return document;
}

/**
 * Keys that differ in YAML but are one key under the key policy collapse
 * into the last of them.
 */
function warnCollisions(keys: string[], prefix: string | undefined, warn: Warn): void {
  const seen = new Map<string, string>();
  for (const key of keys) {
    const normalized = normalizeKey(key);
    const earlier = seen.get(normalized);
    if (earlier !== undefined) {
      warn(
        `Keys '${childPath(prefix, earlier)}' and '${childPath(prefix, key)}' are the same key; keeping '${key}'`,
      );
    }
    seen.set(normalized, key);
  }
}

function childPath(prefix: string | undefined, key: string): string {
  return prefix === undefined ? key : `${prefix}.${key}`;
}

function findPair(map: YAMLMap, wanted: string): Pair | undefined {
  const key = findKey(
    map.items.map((pair) => keyText(pair.key)),
    wanted,
  );
  return key === undefined ? undefined : map.items.find((pair) => keyText(pair.key) === key);
}

function keyText(key: unknown): string {
  return String(isScalar(key) ? key.value : key);
}

interface Commented {
  commentBefore?: string | null;
  comment?: string | null;
  spaceBefore?: boolean;
}

/**
 * Comments present on `from` replace those on `to`; absent ones leave `to` alone
 */
function copyComments(from: Commented, to: Commented): void {
  if (from.commentBefore) to.commentBefore = from.commentBefore;
  if (from.comment) to.comment = from.comment;
  if (from.spaceBefore) to.spaceBefore = true;
}
