/**
 * Readers for the default config files bundled with an application
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { StructureError, isNotFound } from "./errors.js";

export interface ResourceReader {
  /**
   * Read a bundled resource. Rejects with StructureError when it does not exist.
   */
  read(resourcePath: string): Promise<Buffer>;
}

/**
 * Resolve resources against a directory on disk
 */
export function fileResources(root: string): ResourceReader {
  return {
    async read(resourcePath) {
      const absolutePath = path.resolve(root, resourcePath.replace(/^[/\\]+/, ""));
      try {
        return await fs.readFile(absolutePath);
      } catch (error: unknown) {
        if (isNotFound(error)) {
          throw new StructureError(`Resource ${resourcePath} not found in ${root}`, {
            file: absolutePath,
            cause: error,
          });
        }
        throw error;
      }
    },
  };
}

/**
 * Resolve resources relative to the calling module, e.g.
 * `moduleResources(import.meta.url).read("defaults/config.yml")`
 */
export function moduleResources(moduleUrl: string): ResourceReader {
  return fileResources(path.dirname(fileURLToPath(moduleUrl)));
}

/**
 * Serve resources from memory
 */
export function inlineResources(entries: Record<string, string>): ResourceReader {
  const resources = new Map(Object.entries(entries));
  return {
    async read(resourcePath) {
      const content = resources.get(resourcePath);
      if (content === undefined) {
        throw new StructureError(`Resource ${resourcePath} not found`);
      }
      return Buffer.from(content, "utf-8");
    },
  };
}
