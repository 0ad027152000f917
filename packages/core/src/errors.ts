/**
 * Error types
 *
 * Every failure the core raises is a KeyhopError subclass with a stable
 * `code`, so callers can branch on the kind without string matching.
 */

export type KeyhopErrorCode =
  | "IO_ERROR"
  | "CONFIG_PARSE_ERROR"
  | "CONFIG_TOO_LARGE"
  | "CONFIG_EMPTY"
  | "PROGRAM_OUTPUT_ERROR"
  | "CUSTOM_PROGRAM_ERROR"
  | "INVALID_CONFIG_PATH"
  | "NO_VALID_CONFIG_PATH"
  | "INVALID_ROUTE";

export class KeyhopError extends Error {
  constructor(
    public readonly code: KeyhopErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "KeyhopError";
  }
}

/**
 * Filesystem or process failure. `syscallCode` holds the errno name
 * (ENOENT, EACCES, ...) when the underlying error carried one.
 */
export class IoError extends KeyhopError {
  public readonly syscallCode?: string;

  constructor(message: string, cause?: unknown) {
    super("IO_ERROR", message, { cause });
    this.name = "IoError";
    this.syscallCode = errnoCode(cause);
  }
}

export class ConfigParseError extends KeyhopError {
  constructor(message: string, cause?: unknown) {
    super("CONFIG_PARSE_ERROR", message, { cause });
    this.name = "ConfigParseError";
  }
}

export class ConfigTooLargeError extends KeyhopError {
  constructor(
    public readonly size: number,
    public readonly maxSize: number
  ) {
    super(
      "CONFIG_TOO_LARGE",
      `Config is ${size} bytes, over the ${maxSize} byte limit. Pass --large-config to load it anyway.`
    );
    this.name = "ConfigTooLargeError";
  }
}

export class ConfigEmptyError extends KeyhopError {
  constructor(public readonly path: string) {
    super("CONFIG_EMPTY", `Config at ${path} is empty (zero bytes)`);
    this.name = "ConfigEmptyError";
  }
}

export class ProgramOutputError extends KeyhopError {
  constructor(message: string, cause?: unknown) {
    super("PROGRAM_OUTPUT_ERROR", message, { cause });
    this.name = "ProgramOutputError";
  }
}

/**
 * A route program exited non-zero. The message is its stderr, verbatim.
 */
export class CustomProgramError extends KeyhopError {
  constructor(
    public readonly stderr: string,
    public readonly exitCode: number | null
  ) {
    super("CUSTOM_PROGRAM_ERROR", stderr);
    this.name = "CustomProgramError";
  }
}

export class InvalidConfigPathError extends KeyhopError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super("INVALID_CONFIG_PATH", `Failed to access ${path}: ${describeCause(cause)}`, { cause });
    this.name = "InvalidConfigPathError";
  }
}

export class NoValidConfigPathError extends KeyhopError {
  constructor(public readonly candidates: string[]) {
    super("NO_VALID_CONFIG_PATH", "No valid config path was found!");
    this.name = "NoValidConfigPathError";
  }
}

export class InvalidRouteError extends KeyhopError {
  constructor(message: string) {
    super("INVALID_ROUTE", message);
    this.name = "InvalidRouteError";
  }
}

export function isKeyhopError(error: unknown): error is KeyhopError {
  return error instanceof KeyhopError;
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
