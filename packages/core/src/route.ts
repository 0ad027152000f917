/**
 * Route Model
 *
 * A route maps one keyword to either an external redirect template or a
 * local program. Groups bundle routes under a name for the listing page;
 * resolution only ever sees the flattened index (see route-index.ts).
 */

import fs from "node:fs";

import { InvalidRouteError } from "./errors.js";

/**
 * - `external`: `path` is a redirect template, possibly holding `{{query}}`
 * - `internal`: `path` names an executable run per request
 */
export type RouteKind = "external" | "internal";

export interface Route {
  kind: RouteKind;
  path: string;
  /** Omitted from the listing page */
  hidden: boolean;
  /** Shown on the listing page instead of the raw path */
  description?: string;
  minArgs?: number;
  maxArgs?: number;
}

export interface RouteGroup {
  name: string;
  description?: string;
  /** Hides every route of the group from the listing page */
  hidden: boolean;
  /** Keyword → route, in document order */
  routes: ReadonlyMap<string, Route>;
}

export interface RouteInit {
  path: string;
  /** Skips the filesystem probe when set */
  kind?: RouteKind;
  hidden?: boolean;
  description?: string;
  minArgs?: number;
  maxArgs?: number;
}

/**
 * Best-effort classification: a path that exists on disk is a program,
 * anything else is treated as a URL template. The probe runs once, when
 * the route is built.
 */
export function classifyRoutePath(path: string): RouteKind {
  return fs.existsSync(path) ? "internal" : "external";
}

export function createRoute(init: RouteInit): Route {
  assertBound("minArgs", init.minArgs);
  assertBound("maxArgs", init.maxArgs);
  if (init.minArgs !== undefined && init.maxArgs !== undefined && init.minArgs > init.maxArgs) {
    throw new InvalidRouteError(
      `min_args (${init.minArgs}) must not exceed max_args (${init.maxArgs}) for route ${init.path}`
    );
  }

  const route: Route = {
    kind: init.kind ?? classifyRoutePath(init.path),
    path: init.path,
    hidden: init.hidden ?? false,
  };
  if (init.description !== undefined) route.description = init.description;
  if (init.minArgs !== undefined) route.minArgs = init.minArgs;
  if (init.maxArgs !== undefined) route.maxArgs = init.maxArgs;

  return Object.freeze(route);
}

export function createRouteGroup(group: {
  name: string;
  description?: string;
  hidden?: boolean;
  routes: Iterable<readonly [string, Route]>;
}): RouteGroup {
  const result: RouteGroup = {
    name: group.name,
    hidden: group.hidden ?? false,
    routes: new Map(group.routes),
  };
  if (group.description !== undefined) result.description = group.description;
  return Object.freeze(result);
}

/**
 * Human-readable form used in log lines, e.g. `raw (https://…)`.
 */
export function describeRoute(route: Route): string {
  return route.kind === "internal" ? `file (${route.path})` : `raw (${route.path})`;
}

function assertBound(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidRouteError(`${name} must be a non-negative integer, got ${value}`);
  }
}
