/**
 * File helpers for the config files the loader owns
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StructureError, isNotFound } from "./errors.js";

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a config file, turning a missing file into a StructureError
 */
export async function readConfigFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error: unknown) {
    if (isNotFound(error)) {
      throw new StructureError(`Config file not found: ${filePath}`, {
        file: filePath,
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Replace a file's content in one step: the full content goes to a temp file
 * in the same directory, which is then renamed over the target.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string | Buffer,
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const suffix = crypto.randomBytes(6).toString("hex");
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${suffix}.tmp`);

  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Calculate SHA-256 hash of a file
 */
export async function hashFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return crypto.createHash("sha256").update(content).digest("hex");
}
