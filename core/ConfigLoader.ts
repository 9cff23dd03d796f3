/**
 * Config Loader
 *
 * Main entry point: owns one config file, creates it from its bundled default
 * on first use, optionally brings it up to the default's version, and keeps
 * the resolved object current across reloads.
 */

import { FieldResolver, type Resolution } from "../validation/FieldResolver.js";
import { UpdateCoordinator } from "../migration/UpdateCoordinator.js";
import type { FieldMap, Schema } from "../schema/Schema.js";
import { type ConfigFormat, getFormat } from "../strategies/index.js";
import type { DefaultRegistry } from "./DefaultRegistry.js";
import { ConfigLoadError } from "./errors.js";
import { readConfigFile } from "./FileSystem.js";
import { FileWatcher } from "./FileWatcher.js";
import { silentLogger } from "./Logger.js";
import { type ResourceReader, fileResources } from "./resources.js";
import type { ConfigIssue, ConfigLogger, LoaderState } from "./types.js";

export interface ConfigLoaderOptions<T> {
  schema: Schema<T, FieldMap>;
  /** Config file on disk */
  targetFile: string;
  /** Bundled default, read through `resources` */
  resourcePath: string;
  /** Defaults to files relative to the working directory */
  resources?: ResourceReader;
  /** Format name; detected from the target file extension when omitted */
  format?: string;
  logger?: ConfigLogger;
  registry?: DefaultRegistry;
  /** Reconcile the file against its default before the first resolve */
  autoUpdate?: boolean;
  /** Back up the file before a reconcile overwrites it */
  backup?: boolean;
}

export interface WatchOptions<T> {
  /** Called with the new config after each successful reload */
  onReload?: (config: T) => void;
  /** Called when a reload fails; the previous config stays in place */
  onError?: (error: unknown) => void;
}

export class ConfigLoader<T> {
  private resolution: Resolution<T> | undefined;
  private currentState: LoaderState = "unbootstrapped";
  private queue: Promise<void> = Promise.resolve();
  private watchers: FileWatcher[] = [];

  private format: ConfigFormat;
  private logger: ConfigLogger;
  private resolver: FieldResolver;
  private coordinator: UpdateCoordinator;

  private constructor(private options: ConfigLoaderOptions<T>) {
    this.format = getFormat(options.format, options.targetFile);
    this.logger = options.logger ?? silentLogger;
    this.resolver = new FieldResolver({ registry: options.registry, logger: this.logger });
    this.coordinator = new UpdateCoordinator({
      resources: options.resources ?? fileResources(process.cwd()),
      logger: this.logger,
      backup: options.backup,
    });
  }

  /**
   * Create the config file if needed, update it when `autoUpdate` is set, and
   * resolve it. Rejects on the first fatal error.
   */
  static async load<T>(options: ConfigLoaderOptions<T>): Promise<ConfigLoader<T>> {
    const loader = new ConfigLoader(options);
    await loader.initialize();
    return loader;
  }

  get config(): T {
    if (!this.resolution) {
      throw new ConfigLoadError("NOT_LOADED", `${this.options.targetFile} has not been loaded`);
    }
    return this.resolution.value;
  }

  /**
   * Soft issues raised by the last successful resolve
   */
  get issues(): readonly ConfigIssue[] {
    return this.resolution?.issues ?? [];
  }

  get state(): LoaderState {
    return this.currentState;
  }

  get targetFile(): string {
    return this.options.targetFile;
  }

  /**
   * Read and resolve the file again. On failure the previous config is kept
   * and the error is rethrown.
   */
  reload(): Promise<T> {
    return this.enqueue(async () => {
      this.currentState = "reloading";
      try {
        this.resolution = await this.resolveFile();
        this.logger.info(`Reloaded ${this.options.targetFile}`);
        return this.resolution.value;
      } catch (error) {
        this.logger.error(
          `Failed to reload ${this.options.targetFile}, keeping the previous config`,
          error,
        );
        throw error;
      } finally {
        this.currentState = "loaded";
      }
    });
  }

  /**
   * Reconcile the file against its bundled default. Returns whether the file
   * was rewritten; call reload() to pick up the result.
   */
  updateConfig(): Promise<boolean> {
    return this.enqueue(async () => {
      this.currentState = "updating";
      try {
        return await this.reconcile();
      } finally {
        this.currentState = "loaded";
      }
    });
  }

  /**
   * Reload whenever the file changes on disk
   */
  watch(options: WatchOptions<T> = {}): FileWatcher {
    const watcher = new FileWatcher(
      this.options.targetFile,
      async () => {
        const config = await this.reload();
        options.onReload?.(config);
      },
      { logger: this.logger, onError: options.onError },
    );
    this.watchers.push(watcher);
    return watcher;
  }

  /**
   * Stop all watchers and wait for queued work
   */
  async close(): Promise<void> {
    const watchers = this.watchers;
    this.watchers = [];
    await Promise.all(watchers.map((watcher) => watcher.close()));
    await this.queue;
  }

  private async initialize(): Promise<void> {
    await this.coordinator.bootstrap(this.options.resourcePath, this.options.targetFile);
    if (this.options.autoUpdate) {
      await this.reconcile();
    }
    this.resolution = await this.resolveFile();
    this.currentState = "loaded";
  }

  private reconcile(): Promise<boolean> {
    const { resourcePath, targetFile } = this.options;
    return this.coordinator.reconcile(resourcePath, targetFile, this.format.name);
  }

  private async resolveFile(): Promise<Resolution<T>> {
    const { targetFile, schema } = this.options;
    const document = this.format.parse(await readConfigFile(targetFile), targetFile);
    const bag = this.format.toBag(document, targetFile);
    return this.resolver.resolve(bag, schema, { source: targetFile });
  }

  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
