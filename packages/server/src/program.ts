/**
 * Command-line options for the keyhop server.
 */

import { Command, Option } from "commander";

export const VERSION = "0.1.0";

export interface CliOptions {
  verbose: number;
  quiet: number;
  config?: string;
  largeConfig: boolean;
}

function increase(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(): Command {
  return new Command()
    .name("keyhop")
    .description("Keyword-based redirect and dispatch server")
    .version(VERSION)
    .addOption(
      new Option("-v, --verbose", "Increase the log level (info, debug, trace); repeatable")
        .argParser(increase)
        .default(0)
        .conflicts("quiet")
    )
    .addOption(
      new Option("-q, --quiet", "Decrease the log level (error, silent); repeatable")
        .argParser(increase)
        .default(0)
    )
    .option("-c, --config <path>", "Use this config file instead of searching for one")
    .option("--large-config", "Load the config even when it exceeds the size limit", false);
}
