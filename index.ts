/**
 * configsmith
 *
 * Typed configuration loading with versioned defaults
 */

export { ConfigLoader } from "./core/ConfigLoader.js";
export type { ConfigLoaderOptions, WatchOptions } from "./core/ConfigLoader.js";
export { createLoaderScope } from "./core/LoaderScope.js";
export type { LoaderScope, LoaderSettings } from "./core/LoaderScope.js";
export { DefaultRegistry, createDefaultRegistry } from "./core/DefaultRegistry.js";
export type { DefaultParser } from "./core/DefaultRegistry.js";
export {
  ConfigLoadError,
  ConstructionError,
  CustomValidationError,
  RangeViolationError,
  RequiredFieldMissingError,
  StructureError,
} from "./core/errors.js";
export { FileWatcher } from "./core/FileWatcher.js";
export type { FileWatcherOptions } from "./core/FileWatcher.js";
export { normalizeKey, sameKey } from "./core/keys.js";
export { createConsoleLogger, silentLogger } from "./core/Logger.js";
export { fileResources, inlineResources, moduleResources } from "./core/resources.js";
export type { ResourceReader } from "./core/resources.js";
export { ErrorSeverity } from "./core/types.js";
export type {
  ConfigDocument,
  ConfigIssue,
  ConfigLogger,
  JsonObject,
  JsonValue,
  LoaderState,
} from "./core/types.js";
export { compareVersions, DEFAULT_VERSION } from "./core/Version.js";
export { BackupManager } from "./migration/BackupManager.js";
export type { BackupManifest } from "./migration/BackupManager.js";
export { DocumentMerger, versionOf } from "./migration/DocumentMerger.js";
export type { MergeResult } from "./migration/DocumentMerger.js";
export { DriftAnalyzer } from "./migration/DriftAnalyzer.js";
export type { DriftReport } from "./migration/DriftAnalyzer.js";
export { UpdateCoordinator } from "./migration/UpdateCoordinator.js";
export type { UpdateCoordinatorOptions, UpdatePlan } from "./migration/UpdateCoordinator.js";
export { field, FieldBuilder, LONG_MAX, LONG_MIN } from "./schema/Field.js";
export type { FieldRule, FieldValidator, MissingHandler } from "./schema/Field.js";
export { customKind } from "./schema/kinds.js";
export type { FieldKind } from "./schema/kinds.js";
export { defineSchema } from "./schema/Schema.js";
export type { FieldMap, InferFields, Schema } from "./schema/Schema.js";
export { formats, getFormat } from "./strategies/index.js";
export type { ConfigFormat } from "./strategies/index.js";
export { FieldResolver } from "./validation/FieldResolver.js";
export type { Resolution } from "./validation/FieldResolver.js";
export { formatIssueReport, printIssueReport } from "./validation/IssueReport.js";
