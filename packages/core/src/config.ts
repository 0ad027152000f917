/**
 * Config Loader
 *
 * Reads the YAML configuration document, validates it and turns it into
 * route groups. Size and emptiness are checked from the file's size before
 * any parsing happens.
 */

import fs, { type FileHandle } from "node:fs/promises";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import {
  ConfigEmptyError,
  ConfigParseError,
  ConfigTooLargeError,
  InvalidRouteError,
  IoError,
  isKeyhopError,
} from "./errors.js";
import {
  classifyRoutePath,
  createRoute,
  createRouteGroup,
  type Route,
  type RouteGroup,
  type RouteKind,
} from "./route.js";

/** Default upper bound on the config file size, in bytes */
export const LARGE_FILE_SIZE_THRESHOLD = 100_000_000;

const argCountSchema = z.number().int().nonnegative();

/**
 * The document is parsed with every mapping as a Map, so route keywords
 * keep their document order and any name. Fixed-shape mappings go through
 * this before their object schema.
 */
function mapping<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value instanceof Map ? Object.fromEntries(value) : value), schema);
}

/** Unquoted numeric keys parse as numbers */
const keywordSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * Long form of a route. `type` is optional; without it the route kind is
 * decided by probing the filesystem for `path`.
 */
export const routeObjectSchema = mapping(
  z
    .object({
      path: z.string(),
      type: z.enum(["url", "path"]).nullish(),
      hidden: z.boolean().default(false),
      description: z.string().nullish(),
      min_args: argCountSchema.nullish(),
      max_args: argCountSchema.nullish(),
    })
    .refine(
      (route) => route.min_args == null || route.max_args == null || route.min_args <= route.max_args,
      { message: "min_args must not exceed max_args" }
    )
);

/** A bare string is shorthand for `{ path: <string> }` */
export const routeSchema = z.union([z.string(), routeObjectSchema]);

export const routeGroupSchema = mapping(
  z.object({
    name: z.string(),
    description: z.string().nullish(),
    hidden: z.boolean().default(false),
    routes: z.map(keywordSchema, routeSchema),
  })
);

export const configDocumentSchema = mapping(
  z.object({
    bind_address: z.string(),
    public_address: z.string(),
    default_route: z.string().nullish(),
    groups: z.array(routeGroupSchema),
  })
);

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type RouteDocument = z.infer<typeof routeSchema>;

export interface Config {
  bindAddress: string;
  publicAddress: string;
  /** Keyword used when the first token does not resolve; not checked at load time */
  defaultRoute?: string;
  groups: RouteGroup[];
}

export interface ParseConfigOptions {
  /** Decides the kind of routes without an explicit `type` */
  classify?: (path: string) => RouteKind;
}

export interface ReadConfigOptions extends ParseConfigOptions {
  /** Defaults to LARGE_FILE_SIZE_THRESHOLD */
  maxSize?: number;
  /** Skips the size limit entirely */
  largeConfig?: boolean;
}

/**
 * Parse and validate a configuration document.
 */
export function parseConfig(source: string, options: ParseConfigOptions = {}): Config {
  let raw: unknown;
  try {
    raw = parseYaml(source, { mapAsMap: true });
  } catch (error) {
    throw new ConfigParseError(`Invalid YAML: ${errorMessage(error)}`, error);
  }

  const result = configDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigParseError(`Invalid config: ${formatIssues(result.error)}`, result.error);
  }

  return toConfig(result.data, options.classify ?? classifyRoutePath);
}

/**
 * Read a configuration file from disk and parse it.
 */
export async function readConfig(path: string, options: ReadConfigOptions = {}): Promise<Config> {
  const contents = await readConfigBytes(path, options);

  let source: string;
  try {
    source = new TextDecoder("utf-8", { fatal: true }).decode(contents);
  } catch (error) {
    throw new ConfigParseError(`Config at ${path} is not valid UTF-8`, error);
  }
  return parseConfig(source, options);
}

async function readConfigBytes(path: string, options: ReadConfigOptions): Promise<Buffer> {
  const maxSize = options.maxSize ?? LARGE_FILE_SIZE_THRESHOLD;

  let handle: FileHandle;
  try {
    handle = await fs.open(path, "r");
  } catch (error) {
    throw new IoError(`Failed to open config at ${path}: ${errorMessage(error)}`, error);
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) {
      throw new ConfigEmptyError(path);
    }
    if (!options.largeConfig && size > maxSize) {
      throw new ConfigTooLargeError(size, maxSize);
    }
    return await handle.readFile();
  } catch (error) {
    if (isKeyhopError(error)) throw error;
    throw new IoError(`Failed to read config at ${path}: ${errorMessage(error)}`, error);
  } finally {
    await handle.close();
  }
}

function toConfig(document: ConfigDocument, classify: (path: string) => RouteKind): Config {
  const groups = document.groups.map((group) =>
    createRouteGroup({
      name: group.name,
      description: group.description ?? undefined,
      hidden: group.hidden,
      routes: [...group.routes].map(
        ([keyword, route]) => [keyword, toRoute(keyword, route, classify)] as const
      ),
    })
  );

  const config: Config = {
    bindAddress: document.bind_address,
    publicAddress: document.public_address,
    groups,
  };
  if (document.default_route != null) config.defaultRoute = document.default_route;
  return config;
}

function toRoute(keyword: string, route: RouteDocument, classify: (path: string) => RouteKind): Route {
  if (typeof route === "string") {
    return createRoute({ path: route, kind: classify(route) });
  }

  let kind: RouteKind;
  if (route.type === "url") kind = "external";
  else if (route.type === "path") kind = "internal";
  else kind = classify(route.path);

  try {
    return createRoute({
      path: route.path,
      kind,
      hidden: route.hidden,
      description: route.description ?? undefined,
      minArgs: route.min_args ?? undefined,
      maxArgs: route.max_args ?? undefined,
    });
  } catch (error) {
    if (error instanceof InvalidRouteError) {
      throw new ConfigParseError(`Invalid route "${keyword}": ${error.message}`, error);
    }
    throw error;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
