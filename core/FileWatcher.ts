/**
 * File Watcher
 *
 * Runs a callback whenever a watched file is added or changed. Runs never
 * overlap: a change seen during a run schedules exactly one more run.
 */

import { type FSWatcher, watch } from "chokidar";
import { silentLogger } from "./Logger.js";
import type { ConfigLogger } from "./types.js";

export interface FileWatcherOptions {
  logger?: ConfigLogger;
  /** Called when a run rejects; the watcher keeps going */
  onError?: (error: unknown) => void;
}

export class FileWatcher {
  private watcher: FSWatcher;
  private listening: Promise<void>;
  private running = false;
  private pending = false;
  private idle: Promise<void> = Promise.resolve();
  private logger: ConfigLogger;

  constructor(
    paths: string | string[],
    private run: (file: string) => Promise<void>,
    private options: FileWatcherOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.watcher = watch(paths, {
      persistent: true,
      ignoreInitial: true,
    });
    this.listening = new Promise((resolve) => {
      this.watcher.once("ready", () => resolve());
    });

    this.watcher
      .on("add", (file: string) => this.onEvent("Added", file))
      .on("change", (file: string) => this.onEvent("Changed", file))
      .on("error", (error: unknown) => {
        this.logger.error("Watcher error", error);
        this.notify(error);
      });
  }

  /**
   * Resolves once the watcher is listening
   */
  ready(): Promise<void> {
    return this.listening;
  }

  /**
   * Resolves once no run is in progress
   */
  settled(): Promise<void> {
    return this.idle;
  }

  async close(): Promise<void> {
    await this.watcher.close();
    await this.idle;
  }

  private onEvent(label: string, file: string): void {
    this.logger.info(`${label}: ${file}`);
    if (this.running) {
      this.pending = true;
      return;
    }
    this.idle = this.drain(file);
  }

  private notify(error: unknown): void {
    try {
      this.options.onError?.(error);
    } catch (handlerError) {
      this.logger.error("onError handler failed", handlerError);
    }
  }

  private async drain(file: string): Promise<void> {
    this.running = true;
    try {
      do {
        this.pending = false;
        try {
          await this.run(file);
        } catch (error) {
          this.logger.error(`Failed to process ${file}`, error);
          this.notify(error);
        }
      } while (this.pending);
    } finally {
      this.running = false;
    }
  }
}
