/**
 * Startup
 *
 * Locates and reads the config, publishes the first snapshot, wires the
 * file watcher to the reloader and starts listening on bind_address.
 */

import http from "node:http";
import type { AddressInfo } from "node:net";

import {
  ConfigReloader,
  ConfigWatcher,
  SnapshotStore,
  createSnapshot,
  findConfigPath,
  loadCustomPathConfig,
  readConfig,
  type Logger,
} from "@keyhop/core";

import { parseBindAddress } from "./bind-address.js";
import { createServer } from "./server.js";

export interface StartOptions {
  logger: Logger;
  /** Explicit config file; skips discovery */
  configPath?: string;
  /** Candidate locations for discovery, highest priority first */
  configLocations?: string[];
  largeConfig?: boolean;
  verbose?: boolean;
  /** Quiet period for the config watcher */
  watchDelayMs?: number;
}

export interface KeyhopInstance {
  configPath: string;
  store: SnapshotStore;
  reloader: ConfigReloader;
  watcher: ConfigWatcher;
  server: http.Server;
  /** Address actually bound, useful when the config asks for port 0 */
  address: AddressInfo;
  close(): Promise<void>;
}

export async function startKeyhop(options: StartOptions): Promise<KeyhopInstance> {
  const { logger } = options;
  const largeConfig = options.largeConfig ?? false;

  const configPath =
    options.configPath !== undefined
      ? await loadCustomPathConfig(options.configPath)
      : await findConfigPath(options.configLocations, logger);
  logger.info(`Using config at ${configPath}`);

  const config = await readConfig(configPath, { largeConfig });
  const { host, port } = parseBindAddress(config.bindAddress);
  const store = new SnapshotStore(createSnapshot(config, logger));
  const app = createServer({ store, logger, verbose: options.verbose });

  // Nothing below may throw without stopping the watcher
  const reloader = new ConfigReloader(store, configPath, { largeConfig, logger });
  const watcher = new ConfigWatcher(configPath, { logger, delayMs: options.watchDelayMs });
  // reload() never rejects
  watcher.on("change", () => void reloader.reload());
  watcher.start();

  let server: http.Server;
  try {
    server = await listen(http.createServer(app), port, host);
  } catch (error) {
    watcher.stop();
    throw error;
  }

  const address = server.address();
  if (address === null || typeof address === "string") {
    watcher.stop();
    server.close();
    throw new Error("Server is not listening on a TCP address");
  }
  logger.info(`Listening on ${address.address}:${address.port}`);

  return {
    configPath,
    store,
    reloader,
    watcher,
    server,
    address,
    close: () =>
      new Promise<void>((resolve, reject) => {
        watcher.stop();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function listen(server: http.Server, port: number, host?: string): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen({ port, host }, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
