/**
 * Update Coordinator
 *
 * Brings an on-disk config file up to the version of its bundled default:
 * reads both, compares versions, merges and writes the result atomically.
 */

import * as path from "node:path";
import { fileExists, readConfigFile, writeFileAtomic } from "../core/FileSystem.js";
import { silentLogger } from "../core/Logger.js";
import type { ResourceReader } from "../core/resources.js";
import type { ConfigDocument, ConfigLogger } from "../core/types.js";
import { isOlderVersion } from "../core/Version.js";
import { type ConfigFormat, getFormat } from "../strategies/index.js";
import { BackupManager } from "./BackupManager.js";
import { DocumentMerger, versionOf } from "./DocumentMerger.js";
import { type DriftReport, DriftAnalyzer } from "./DriftAnalyzer.js";

export interface UpdateCoordinatorOptions {
  resources: ResourceReader;
  logger?: ConfigLogger;
  /** Copy the old file aside before overwriting it */
  backup?: boolean;
  /** Report what would change without writing */
  dryRun?: boolean;
}

export interface UpdatePlan {
  currentVersion: string;
  defaultVersion: string;
  /** Whether the file is older than its default */
  outdated: boolean;
  drift: DriftReport;
}

interface LoadedPair {
  format: ConfigFormat;
  defaults: ConfigDocument;
  current: ConfigDocument;
}

export class UpdateCoordinator {
  private resources: ResourceReader;
  private logger: ConfigLogger;
  private merger: DocumentMerger;
  private analyzer = new DriftAnalyzer();

  constructor(private options: UpdateCoordinatorOptions) {
    this.resources = options.resources;
    this.logger = options.logger ?? silentLogger;
    this.merger = new DocumentMerger({ logger: this.logger });
  }

  /**
   * Copy the bundled default verbatim when the target file does not exist.
   * Returns whether the file was created.
   */
  async bootstrap(resourcePath: string, targetFile: string): Promise<boolean> {
    if (await fileExists(targetFile)) return false;

    const content = await this.resources.read(resourcePath);
    if (this.options.dryRun) {
      this.logger.info(`Would create ${targetFile} from ${resourcePath}`);
      return false;
    }
    await writeFileAtomic(targetFile, content);
    this.logger.info(`Created ${targetFile} from ${resourcePath}`);
    return true;
  }

  /**
   * Merge the target file onto the newer bundled default and write it back.
   * Returns whether the file was rewritten.
   */
  async reconcile(resourcePath: string, targetFile: string, formatName?: string): Promise<boolean> {
    const { format, defaults, current } = await this.loadPair(resourcePath, targetFile, formatName);
    const currentVersion = versionOf(current);
    const defaultVersion = versionOf(defaults);

    if (!isOlderVersion(currentVersion, defaultVersion)) {
      this.logger.info(`${targetFile} is up to date (version ${currentVersion})`);
      return false;
    }

    const result = this.merger.merge(defaults, current);

    if (this.options.dryRun) {
      const drift = this.drift(format, defaults, current, targetFile);
      this.logger.info(
        `Would update ${targetFile} from ${result.fromVersion} to ${result.toVersion} ` +
          `(${drift.addedKeys.length} added, ${drift.overriddenKeys.length} kept overrides)`,
      );
      return false;
    }

    if (this.options.backup) {
      await new BackupManager(path.dirname(targetFile), this.logger).createBackup([targetFile]);
    }

    await writeFileAtomic(targetFile, format.emit(result.document));
    this.logger.info(`Updated ${targetFile} from ${result.fromVersion} to ${result.toVersion}`);
    return true;
  }

  /**
   * Compare the target file with its bundled default without writing anything
   */
  async plan(resourcePath: string, targetFile: string, formatName?: string): Promise<UpdatePlan> {
    const { format, defaults, current } = await this.loadPair(resourcePath, targetFile, formatName);
    const currentVersion = versionOf(current);
    const defaultVersion = versionOf(defaults);

    return {
      currentVersion,
      defaultVersion,
      outdated: isOlderVersion(currentVersion, defaultVersion),
      drift: this.drift(format, defaults, current, targetFile),
    };
  }

  private drift(
    format: ConfigFormat,
    defaults: ConfigDocument,
    current: ConfigDocument,
    targetFile: string,
  ): DriftReport {
    return this.analyzer.analyze(
      format.toBag(defaults, "default"),
      format.toBag(current, targetFile),
    );
  }

  private async loadPair(
    resourcePath: string,
    targetFile: string,
    formatName: string | undefined,
  ): Promise<LoadedPair> {
    const format = getFormat(formatName, targetFile);

    const defaultText = (await this.resources.read(resourcePath)).toString("utf-8");
    const defaults = format.parse(defaultText, resourcePath);
    const current = format.parse(await readConfigFile(targetFile), targetFile);

    return { format, defaults, current };
  }
}
