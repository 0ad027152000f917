/**
 * Snapshot store tests
 */

import { describe, it, expect } from "vitest";

import type { Config } from "../config.js";
import { createRoute, createRouteGroup } from "../route.js";
import { createSnapshot, SnapshotStore } from "../snapshot.js";

function config(publicAddress: string, routes: Record<string, string>, defaultRoute?: string): Config {
  return {
    bindAddress: "127.0.0.1:0",
    publicAddress,
    ...(defaultRoute !== undefined ? { defaultRoute } : {}),
    groups: [
      createRouteGroup({
        name: "Routes",
        routes: Object.entries(routes).map(
          ([keyword, path]) => [keyword, createRoute({ path, kind: "external" })] as const
        ),
      }),
    ],
  };
}

describe("createSnapshot", () => {
  it("derives the route index from the groups", () => {
    const snapshot = createSnapshot(config("hop.test", { a: "https://a.test", b: "https://b.test" }, "a"));

    expect(snapshot.publicAddress).toBe("hop.test");
    expect(snapshot.defaultRoute).toBe("a");
    expect(snapshot.groups).toHaveLength(1);
    expect([...snapshot.routes.keys()]).toEqual(["a", "b"]);
    expect(snapshot.routes.get("b")?.path).toBe("https://b.test");
  });

  it("omits an unset default route", () => {
    const snapshot = createSnapshot(config("hop.test", {}));
    expect(snapshot.defaultRoute).toBeUndefined();
    expect("defaultRoute" in snapshot).toBe(false);
  });

  it("freezes the snapshot and its group list", () => {
    const snapshot = createSnapshot(config("hop.test", { a: "https://a.test" }));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.groups)).toBe(true);
  });

  it("is not affected by later changes to the config's group list", () => {
    const source = config("hop.test", { a: "https://a.test" });
    const snapshot = createSnapshot(source);
    source.groups.push(
      createRouteGroup({ name: "Late", routes: [["z", createRoute({ path: "z", kind: "external" })]] })
    );

    expect(snapshot.groups).toHaveLength(1);
    expect(snapshot.routes.has("z")).toBe(false);
  });
});

describe("SnapshotStore", () => {
  it("returns the initial snapshot", () => {
    const s1 = createSnapshot(config("one.test", { a: "https://a.test" }));
    const store = new SnapshotStore(s1);
    expect(store.current()).toBe(s1);
  });

  it("returns the newest snapshot after publish", () => {
    const s1 = createSnapshot(config("one.test", { a: "https://a.test" }));
    const s2 = createSnapshot(config("two.test", { b: "https://b.test" }));
    const store = new SnapshotStore(s1);

    store.publish(s2);

    expect(store.current()).toBe(s2);
  });

  it("leaves a previously read snapshot intact", () => {
    const s1 = createSnapshot(config("one.test", { a: "https://a.test" }, "a"));
    const s2 = createSnapshot(config("two.test", { b: "https://b.test" }, "b"));
    const store = new SnapshotStore(s1);

    const held = store.current();
    store.publish(s2);

    expect(held).toBe(s1);
    expect(held.publicAddress).toBe("one.test");
    expect(held.defaultRoute).toBe("a");
    expect([...held.routes.keys()]).toEqual(["a"]);
    expect(held.groups[0].routes.has("a")).toBe(true);
  });

  it("keeps the last published snapshot", () => {
    const store = new SnapshotStore(createSnapshot(config("one.test", {})));
    const s2 = createSnapshot(config("two.test", {}));
    const s3 = createSnapshot(config("three.test", {}));

    store.publish(s2);
    store.publish(s3);

    expect(store.current().publicAddress).toBe("three.test");
  });
});
