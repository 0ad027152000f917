/**
 * Executor
 *
 * Runs the program behind an internal route and turns its output into an
 * action. The program receives the residual arguments as separate argv
 * entries (no shell) and must print a single JSON object:
 *
 *   {"redirect": "<destination>"}  or  {"body": "<text>"}
 *
 * A non-zero exit reports stderr instead, whatever stdout held.
 */

import { spawn, type ChildProcessByStdio } from "node:child_process";
import fs from "node:fs/promises";
import type { Readable } from "node:stream";

import type { Logger } from "pino";
import { z } from "zod";

import { CustomProgramError, IoError, ProgramOutputError } from "./errors.js";
import { makeNoopLogger } from "./logger.js";

export type HopAction = { type: "redirect"; target: string } | { type: "body"; body: string };

const programOutputSchema = z.union([
  z.object({ redirect: z.string() }).strict(),
  z.object({ body: z.string() }).strict(),
]);

export interface ExecuteOptions {
  logger?: Logger;
}

interface ProgramResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
}

/**
 * Canonicalize `path`, run it with `args` split on single spaces, and map
 * the result. Rejects with IoError when the program cannot be found or
 * started, CustomProgramError on a non-zero exit, and ProgramOutputError
 * when a successful run prints something other than the expected object.
 */
export async function executeRoute(
  path: string,
  args: string,
  options: ExecuteOptions = {}
): Promise<HopAction> {
  const logger = options.logger ?? makeNoopLogger();

  let executable: string;
  try {
    executable = await fs.realpath(path);
  } catch (error) {
    throw new IoError(`Failed to resolve ${path}: ${errorMessage(error)}`, error);
  }

  const argv = args === "" ? [] : args.split(" ");
  const result = await runProgram(executable, argv);

  if (result.exitCode !== 0) {
    logger.error(
      `Program ${path} exited with ${result.signal ?? `code ${result.exitCode}`}, dumping standard error`
    );
    throw new CustomProgramError(result.stderr.toString("utf-8"), result.exitCode);
  }

  return parseProgramOutput(result.stdout);
}

/**
 * Decode and validate the stdout of a successful run.
 */
export function parseProgramOutput(stdout: Uint8Array): HopAction {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(stdout);
  } catch (error) {
    throw new ProgramOutputError("Program output is not valid UTF-8", error);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ProgramOutputError(`Program output is not valid JSON: ${errorMessage(error)}`, error);
  }

  const parsed = programOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProgramOutputError(
      'Program output must be exactly one of {"redirect": string} or {"body": string}',
      parsed.error
    );
  }

  return "redirect" in parsed.data
    ? { type: "redirect", target: parsed.data.redirect }
    : { type: "body", body: parsed.data.body };
}

function runProgram(executable: string, argv: string[]): Promise<ProgramResult> {
  return new Promise((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    let proc: ChildProcessByStdio<null, Readable, Readable>;
    try {
      proc = spawn(executable, argv, {
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
      });
    } catch (err) {
      reject(new IoError(`Failed to run ${executable}: ${errorMessage(err)}`, err));
      return;
    }

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (err) => {
      reject(new IoError(`Failed to run ${executable}: ${err.message}`, err));
    });

    proc.on("close", (code, signal) => {
      resolve({
        exitCode: code,
        signal,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
      });
    });
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
