/**
 * Snapshot Store
 *
 * Holds the active route configuration as one immutable value. Readers take
 * the current reference and keep using it for as long as they like; a
 * reload builds a complete new snapshot and swaps the reference. Because the
 * swap is a single assignment on the event loop, no reader can see a half
 * updated configuration.
 */

import type { Logger } from "pino";

import type { Config } from "./config.js";
import { buildRouteIndex, type RouteIndex } from "./route-index.js";
import type { RouteGroup } from "./route.js";

export interface Snapshot {
  readonly publicAddress: string;
  readonly defaultRoute?: string;
  readonly groups: readonly RouteGroup[];
  /** Always buildRouteIndex(groups) */
  readonly routes: RouteIndex;
}

/**
 * The only way to build a Snapshot: the index is derived from the groups
 * here, so the two cannot drift apart.
 */
export function createSnapshot(config: Config, logger?: Logger): Snapshot {
  const groups = Object.freeze([...config.groups]);
  const snapshot: Snapshot = {
    publicAddress: config.publicAddress,
    groups,
    routes: buildRouteIndex(groups, logger),
    ...(config.defaultRoute !== undefined ? { defaultRoute: config.defaultRoute } : {}),
  };
  return Object.freeze(snapshot);
}

export class SnapshotStore {
  private snapshot: Snapshot;

  constructor(initial: Snapshot) {
    this.snapshot = initial;
  }

  /**
   * Latest published snapshot.
   */
  current(): Snapshot {
    return this.snapshot;
  }

  /**
   * Replace the current snapshot. The previous value is left untouched for
   * anyone still holding it.
   */
  publish(snapshot: Snapshot): void {
    this.snapshot = snapshot;
  }
}
