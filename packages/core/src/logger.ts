/**
 * Logger factory
 *
 * Pino loggers for the service. The CLI picks the level from its
 * -v / -q flags; library code takes an optional logger and falls back
 * to a silent one.
 */

import pino, { type Level, type Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = Level | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Extra fields bound to every line */
  bindings?: Record<string, unknown>;
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "warn";

  return pino({
    level,
    enabled: level !== "silent",
    base: { ...options.bindings, app: "keyhop" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let noopLogger: Logger | null = null;

/**
 * For tests and library defaults - pino with enabled:false. Shared, since
 * the per-request code paths fall back to it.
 */
export function makeNoopLogger(): Logger {
  noopLogger ??= pino({ enabled: false, level: "silent" });
  return noopLogger;
}

/**
 * Maps repeated -v / -q flags to a level. Verbosity is clamped to 3 and
 * quietness to 2 before they are combined.
 */
export function logLevelFromFlags(verbose: number, quiet: number): LogLevel {
  const score = Math.min(verbose, 3) - Math.min(quiet, 2);
  switch (score) {
    case -2:
      return "silent";
    case -1:
      return "error";
    case 0:
      return "warn";
    case 1:
      return "info";
    case 2:
      return "debug";
    default:
      return "trace";
  }
}
