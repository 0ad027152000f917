/**
 * Config file discovery
 *
 * Without an explicit --config path, the service looks through a fixed list
 * of locations. The first readable file wins; if none exists yet, the
 * bundled default config is written to the first location that accepts a
 * new file.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Logger } from "pino";

import { InvalidConfigPathError, NoValidConfigPathError } from "./errors.js";
import { makeNoopLogger } from "./logger.js";

export const CONFIG_FILENAME = "keyhop.yaml";

const DEFAULT_CONFIG_URL = new URL("../assets/default-config.yaml", import.meta.url);

/**
 * Candidate locations, highest priority first: the system-wide config
 * folder, the user's config folder, then the home folder.
 */
export function defaultConfigLocations(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): string[] {
  const folders = ["/etc"];

  const configDir = env.XDG_CONFIG_HOME || (homeDir ? path.join(homeDir, ".config") : "");
  if (configDir) folders.push(configDir);
  if (homeDir) folders.push(homeDir);

  return folders.map((folder) => path.join(folder, CONFIG_FILENAME));
}

export async function readDefaultConfig(): Promise<Buffer> {
  return fs.readFile(DEFAULT_CONFIG_URL);
}

/**
 * Find a config file to load, creating one from the default config when
 * none of the locations holds a readable file.
 */
export async function findConfigPath(
  locations: string[] = defaultConfigLocations(),
  logger: Logger = makeNoopLogger()
): Promise<string> {
  logger.debug(`Checking locations for config file: ${locations.join(", ")}`);

  for (const location of locations) {
    try {
      await fs.access(location, fs.constants.R_OK);
      logger.debug(`Found file at ${location}.`);
      return location;
    } catch (error) {
      logger.debug(`Tried to read '${location}' but failed due to error: ${errorMessage(error)}`);
    }
  }

  logger.debug("Failed to find any config. Now trying to find first writable path");

  const defaultConfig = await readDefaultConfig();
  for (const location of locations) {
    try {
      await fs.writeFile(location, defaultConfig, { flag: "wx" });
      logger.info(`Creating new config file at ${location}.`);
      return location;
    } catch (error) {
      logger.debug(
        `Tried to open a new file at '${location}' but failed due to error: ${errorMessage(error)}`
      );
    }
  }

  throw new NoValidConfigPathError(locations);
}

/**
 * Use exactly the given path; fail if it cannot be read.
 */
export async function loadCustomPathConfig(configPath: string): Promise<string> {
  try {
    await fs.access(configPath, fs.constants.R_OK);
  } catch (error) {
    throw new InvalidConfigPathError(configPath, error);
  }
  return configPath;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
