#!/usr/bin/env tsx
/**
 * CLI Interface
 *
 * Entry point for the keyhop server.
 */

import { logLevelFromFlags, makeLogger } from "@keyhop/core";

import { startKeyhop } from "./app.js";
import { createProgram, type CliOptions } from "./program.js";

const program = createProgram();
program.parse();

const options = program.opts<CliOptions>();

async function main(): Promise<void> {
  const logger = makeLogger({ level: logLevelFromFlags(options.verbose, options.quiet) });

  try {
    const instance = await startKeyhop({
      logger,
      configPath: options.config,
      largeConfig: options.largeConfig,
      verbose: options.verbose > 0,
    });

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}, shutting down`);
      instance.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "Failed to close the server cleanly");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    logger.fatal({ err: error }, "Failed to start");
    console.error(`keyhop: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

void main();
