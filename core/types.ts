/**
 * Core type definitions for the typed configuration loader
 */

import type { Document } from "yaml";

/**
 * JSON-compatible value types
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A parsed configuration file.
 *
 * `tree` documents keep comments and layout (YAML); `bag` documents are plain
 * objects (JSON, TOML). The root of either is always a mapping.
 */
export type ConfigDocument =
  | { kind: "tree"; tree: Document }
  | { kind: "bag"; bag: JsonObject };

export enum ErrorSeverity {
  ERROR = "error",
  WARNING = "warning",
  INFO = "info",
}

/**
 * A reportable, non-fatal condition raised while loading or comparing config
 */
export interface ConfigIssue {
  severity: ErrorSeverity;
  code: string;
  message: string;
  /** Schema field the issue belongs to */
  field?: string;
  file?: string;
  suggestion?: string;
}

export interface ConfigLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

export type LoaderState = "unbootstrapped" | "loaded" | "reloading" | "updating";
