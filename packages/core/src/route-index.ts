/**
 * Route Index Builder
 *
 * Flattens grouped routes into one keyword → route map. Groups are applied
 * in configured order, so a keyword defined in a later group replaces the
 * earlier definition.
 */

import type { Logger } from "pino";

import { makeNoopLogger } from "./logger.js";
import { describeRoute, type Route, type RouteGroup } from "./route.js";

export type RouteIndex = ReadonlyMap<string, Route>;

export function buildRouteIndex(
  groups: readonly RouteGroup[],
  logger: Logger = makeNoopLogger()
): RouteIndex {
  const mapping = new Map<string, Route>();

  for (const group of groups) {
    for (const [keyword, route] of group.routes) {
      const previous = mapping.get(keyword);
      if (previous) {
        logger.debug(
          `Overriding ${keyword} route from ${describeRoute(previous)} to ${describeRoute(route)}.`
        );
      } else {
        logger.trace(`Inserting ${keyword} into mapping.`);
      }
      mapping.set(keyword, route);
    }
  }

  return mapping;
}
