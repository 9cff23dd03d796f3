/**
 * Backup Manager
 *
 * Copies config files aside before a reconcile overwrites them, under
 * `<dir>/.config-backups/<timestamp>/` next to a manifest of SHA-256 hashes.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StructureError, describeError, isNotFound } from "../core/errors.js";
import { hashFile } from "../core/FileSystem.js";
import { isJsonObject } from "../core/json.js";
import { silentLogger } from "../core/Logger.js";
import type { ConfigLogger } from "../core/types.js";

export const BACKUP_DIR = ".config-backups";

export interface BackupEntry {
  original: string;
  backup: string;
  hash: string;
}

export interface BackupManifest {
  timestamp: string;
  files: BackupEntry[];
}

export class BackupManager {
  private backupRoot: string;

  constructor(
    directory: string,
    private logger: ConfigLogger = silentLogger,
  ) {
    this.backupRoot = path.join(directory, BACKUP_DIR);
  }

  /**
   * Create a timestamped backup of the specified files. Files that do not
   * exist are skipped.
   */
  async createBackup(files: string[]): Promise<BackupManifest> {
    const timestamp = await this.nextTimestamp();
    const backupDir = path.join(this.backupRoot, timestamp);
    await fs.mkdir(backupDir, { recursive: true });

    const manifest: BackupManifest = { timestamp, files: [] };

    for (const file of files) {
      const original = path.resolve(file);
      const backup = path.join(backupDir, path.basename(original));
      try {
        await fs.copyFile(original, backup);
      } catch (error: unknown) {
        if (isNotFound(error)) {
          this.logger.info(`Skipped ${original} (does not exist)`);
          continue;
        }
        throw error;
      }

      manifest.files.push({ original, backup, hash: await hashFile(backup) });
      this.logger.info(`Backed up ${original} to ${backup}`);
    }

    await fs.writeFile(
      path.join(backupDir, "manifest.json"),
      `${JSON.stringify(manifest, null, 2)}\n`,
    );
    return manifest;
  }

  /**
   * Restore every file recorded in a backup. A backup whose content no longer
   * matches its manifest hash is restored with a warning.
   */
  async restore(timestamp: string): Promise<BackupManifest> {
    const manifest = await this.readManifest(timestamp);

    for (const entry of manifest.files) {
      const currentHash = await hashFile(entry.backup);
      if (currentHash !== entry.hash) {
        this.logger.warn(`Hash mismatch for ${entry.backup}, continuing anyway`);
      }

      await fs.mkdir(path.dirname(entry.original), { recursive: true });
      await fs.copyFile(entry.backup, entry.original);
      this.logger.info(`Restored ${entry.original}`);
    }

    return manifest;
  }

  /**
   * List all available backups, most recent first
   */
  async listBackups(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.backupRoot, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory())
        .map((e) => e.name)
        .sort()
        .reverse();
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Remove old backups, keeping the `retention` most recent. Returns the
   * removed timestamps.
   */
  async cleanup(retention: number): Promise<string[]> {
    const backups = await this.listBackups();
    const toDelete = backups.slice(Math.max(retention, 0));

    for (const backup of toDelete) {
      await fs.rm(path.join(this.backupRoot, backup), { recursive: true, force: true });
      this.logger.info(`Removed backup ${backup}`);
    }
    return toDelete;
  }

  private async readManifest(timestamp: string): Promise<BackupManifest> {
    const manifestPath = path.join(this.backupRoot, timestamp, "manifest.json");

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(manifestPath, "utf-8"));
    } catch (error: unknown) {
      throw new StructureError(
        `Cannot read backup manifest ${manifestPath}: ${describeError(error)}`,
        { file: manifestPath, cause: error },
      );
    }

    if (!isBackupManifest(parsed)) {
      throw new StructureError(`Malformed backup manifest ${manifestPath}`, {
        file: manifestPath,
      });
    }
    return parsed;
  }

  /**
   * ISO timestamp safe for file names; a numeric suffix keeps two backups
   * taken within the same second apart.
   */
  private async nextTimestamp(): Promise<string> {
    const base = new Date().toISOString().replace(/[:.]/g, "-").slice(0, -5);
    const existing = new Set(await this.listBackups());

    let timestamp = base;
    for (let n = 1; existing.has(timestamp); n++) {
      timestamp = `${base}-${String(n).padStart(2, "0")}`;
    }
    return timestamp;
  }
}

function isBackupManifest(value: unknown): value is BackupManifest {
  if (!isJsonObject(value)) return false;
  const { timestamp, files } = value;
  return (
    typeof timestamp === "string" &&
    Array.isArray(files) &&
    files.every(
      (entry) =>
        isJsonObject(entry) &&
        typeof entry.original === "string" &&
        typeof entry.backup === "string" &&
        typeof entry.hash === "string",
    )
  );
}
