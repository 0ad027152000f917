/**
 * Resolver
 *
 * Maps a free-text query onto a route. The first token is the keyword; the
 * rest are the route's arguments. When the keyword is unknown, or its
 * argument-count constraints fail, the whole query goes to the default
 * route instead.
 */

import type { Logger } from "pino";

import { makeNoopLogger } from "./logger.js";
import { describeRoute, type Route } from "./route.js";
import type { RouteIndex } from "./route-index.js";

export type HopResolution =
  | {
      status: "resolved";
      route: Route;
      /** Remaining tokens joined by single spaces; empty when none remain */
      args: string;
    }
  | {
      status: "unresolved";
    };

const UNRESOLVED: HopResolution = Object.freeze({ status: "unresolved" });

/** Space, tab, line feed, form feed and carriage return */
const ASCII_WHITESPACE = /[ \t\n\f\r]+/;

/**
 * Split a query on ASCII whitespace, dropping empty runs.
 */
export function tokenizeQuery(query: string): string[] {
  return query.split(ASCII_WHITESPACE).filter((token) => token.length > 0);
}

/**
 * Attempts to resolve the query into its route and arguments, falling back
 * to the default route before giving up.
 */
export function resolveHop(
  query: string,
  routes: RouteIndex,
  defaultRoute: string | undefined,
  logger: Logger = makeNoopLogger()
): HopResolution {
  const tokens = tokenizeQuery(query);
  if (tokens.length === 0) {
    logger.debug("Found empty query, returning no route.");
    return UNRESOLVED;
  }

  const [keyword, ...rest] = tokens;
  const matched = routes.get(keyword);
  if (matched && checkRoute(matched, rest.length)) {
    const args = rest.join(" ");
    logger.debug(`Resolved ${describeRoute(matched)} with args ${args}`);
    return { status: "resolved", route: matched, args };
  }

  if (defaultRoute !== undefined) {
    const fallback = routes.get(defaultRoute);
    if (fallback && checkRoute(fallback, tokens.length)) {
      const args = tokens.join(" ");
      logger.debug(`Using default route ${describeRoute(fallback)} with args ${args}`);
      return { status: "resolved", route: fallback, args };
    }
  }

  return UNRESOLVED;
}

/**
 * Both bounds are inclusive; a missing bound does not constrain.
 */
export function checkRoute(route: Route, argCount: number): boolean {
  if (route.minArgs !== undefined && argCount < route.minArgs) {
    return false;
  }
  if (route.maxArgs !== undefined && argCount > route.maxArgs) {
    return false;
  }
  return true;
}
