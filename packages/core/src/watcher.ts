/**
 * Config file watcher
 *
 * Watches the directory holding the config file, so editors that replace
 * the file instead of writing in place are still noticed. Bursts of events
 * collapse into one "change" event after `delayMs` of quiet.
 */

import { EventEmitter } from "node:events";
import { watch, type FSWatcher } from "node:fs";
import path from "node:path";

import type { Logger } from "pino";

import { makeNoopLogger } from "./logger.js";

export interface ConfigWatcherOptions {
  /** Quiet period before a change is reported (default: 500ms) */
  delayMs?: number;
  logger?: Logger;
}

const DEFAULT_DELAY_MS = 500;

export class ConfigWatcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly delayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly configPath: string,
    options: ConfigWatcherOptions = {}
  ) {
    super();
    this.delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
    this.logger = options.logger ?? makeNoopLogger();
  }

  /**
   * Start watching. Returns false, after logging a warning, when the watch
   * could not be set up; changes to the file then go unnoticed.
   */
  start(): boolean {
    if (this.watcher) return true;

    const dir = path.dirname(path.resolve(this.configPath));
    const filename = path.basename(this.configPath);

    try {
      this.watcher = watch(dir, (eventType, changed) => {
        if (changed && changed !== filename) return;
        this.logger.trace(`Saw ${eventType} event for ${this.configPath}`);
        this.schedule();
      });
    } catch (error) {
      this.logger.warn(
        `Couldn't watch ${this.configPath}: ${error instanceof Error ? error.message : String(error)}. Changes to this file won't be seen!`
      );
      return false;
    }

    this.watcher.on("error", (error) => {
      this.logger.warn(`Watcher for ${this.configPath} failed: ${error.message}`);
      this.stop();
    });

    this.logger.info(`Watcher is now watching ${this.configPath}`);
    return true;
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.watcher?.close();
    this.watcher = null;
  }

  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.emit("change");
    }, this.delayMs);
  }
}
