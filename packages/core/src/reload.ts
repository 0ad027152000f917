/**
 * Reload Trigger
 *
 * Re-reads the config file and publishes a fresh snapshot. A failed reload
 * leaves the current snapshot in place.
 */

import type { Logger } from "pino";

import { readConfig, type ReadConfigOptions } from "./config.js";
import { makeNoopLogger } from "./logger.js";
import { createSnapshot, type SnapshotStore } from "./snapshot.js";

export interface ConfigReloaderOptions extends ReadConfigOptions {
  logger?: Logger;
}

export class ConfigReloader {
  private readonly logger: Logger;
  /** Tail of the reload queue; each reload starts after the previous one settles */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: SnapshotStore,
    private readonly configPath: string,
    private readonly options: ConfigReloaderOptions = {}
  ) {
    this.logger = options.logger ?? makeNoopLogger();
  }

  /**
   * Queue a reload. Resolves true when a new snapshot was published and
   * false when the reload failed; never rejects.
   */
  reload(): Promise<boolean> {
    const run = this.queue.then(() => this.reloadNow());
    this.queue = run;
    return run;
  }

  private async reloadNow(): Promise<boolean> {
    try {
      const config = await readConfig(this.configPath, this.options);
      this.store.publish(createSnapshot(config, this.logger));
      this.logger.info("Successfully updated active state");
      return true;
    } catch (error) {
      this.logger.warn(
        { err: error },
        `Failed to update config file: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }
}
