/**
 * Config loader tests
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { parseConfig, readConfig, LARGE_FILE_SIZE_THRESHOLD } from "../config.js";
import { ConfigEmptyError, ConfigParseError, ConfigTooLargeError, IoError } from "../errors.js";
import type { RouteKind } from "../route.js";

const allExternal = (): RouteKind => "external";

const SAMPLE = `
bind_address: "127.0.0.1:8080"
public_address: "localhost:8080"
default_route: "g"
groups:
  - name: "Meta commands"
    description: "Commands for keyhop"
    routes:
      ls: &ls
        path: "/ls"
        max_args: 0
      help:
        path: "/ls"
        max_args: 0
        hidden: true
      list: *ls
  - name: "Search"
    routes:
      g: "https://search.test/?q={{query}}"
      yt:
        path: "https://video.test/results?q={{query}}"
        description: "Search videos"
        min_args: 1
  - name: "Hidden group"
    hidden: true
    routes:
      sneaky: "https://example.org"
`;

describe("parseConfig", () => {
  it("parses addresses and the default route", () => {
    const config = parseConfig(SAMPLE, { classify: allExternal });

    expect(config.bindAddress).toBe("127.0.0.1:8080");
    expect(config.publicAddress).toBe("localhost:8080");
    expect(config.defaultRoute).toBe("g");
  });

  it("keeps groups in order with their metadata", () => {
    const config = parseConfig(SAMPLE, { classify: allExternal });

    expect(config.groups.map((group) => group.name)).toEqual([
      "Meta commands",
      "Search",
      "Hidden group",
    ]);
    expect(config.groups[0].description).toBe("Commands for keyhop");
    expect(config.groups[0].hidden).toBe(false);
    expect(config.groups[1].description).toBeUndefined();
    expect(config.groups[2].hidden).toBe(true);
    expect([...config.groups[0].routes.keys()]).toEqual(["ls", "help", "list"]);
  });

  it("expands the string shorthand", () => {
    const config = parseConfig(SAMPLE, { classify: allExternal });

    expect(config.groups[1].routes.get("g")).toEqual({
      kind: "external",
      path: "https://search.test/?q={{query}}",
      hidden: false,
    });
  });

  it("reads the long form", () => {
    const config = parseConfig(SAMPLE, { classify: allExternal });

    expect(config.groups[1].routes.get("yt")).toEqual({
      kind: "external",
      path: "https://video.test/results?q={{query}}",
      hidden: false,
      description: "Search videos",
      minArgs: 1,
    });
    expect(config.groups[0].routes.get("help")).toEqual({
      kind: "external",
      path: "/ls",
      hidden: true,
      maxArgs: 0,
    });
  });

  it("resolves YAML aliases", () => {
    const config = parseConfig(SAMPLE, { classify: allExternal });
    expect(config.groups[0].routes.get("list")).toEqual(config.groups[0].routes.get("ls"));
  });

  it("classifies routes with the given probe", () => {
    const config = parseConfig(SAMPLE, {
      classify: (routePath) => (routePath === "/ls" ? "internal" : "external"),
    });

    expect(config.groups[0].routes.get("ls")?.kind).toBe("internal");
    expect(config.groups[1].routes.get("g")?.kind).toBe("external");
  });

  it("lets an explicit type override the probe", () => {
    const config = parseConfig(
      `
bind_address: "a"
public_address: "b"
groups:
  - name: "Typed"
    routes:
      url: { path: "/bin/sh", type: url }
      prog: { path: "https://example.com", type: path }
`,
      { classify: () => "internal" }
    );

    expect(config.groups[0].routes.get("url")?.kind).toBe("external");
    expect(config.groups[0].routes.get("prog")?.kind).toBe("internal");
  });

  it("accepts an empty group list and no default route", () => {
    const config = parseConfig(`bind_address: "a"\npublic_address: "b"\ngroups: []\n`);

    expect(config.groups).toEqual([]);
    expect(config.defaultRoute).toBeUndefined();
  });

  it("treats null optional fields as absent", () => {
    const config = parseConfig(
      `
bind_address: "a"
public_address: "b"
default_route:
groups:
  - name: "G"
    description:
    routes:
      r: { path: "https://r.test", min_args: null }
`,
      { classify: allExternal }
    );

    expect(config.defaultRoute).toBeUndefined();
    expect(config.groups[0].description).toBeUndefined();
    expect(config.groups[0].routes.get("r")).toEqual({
      kind: "external",
      path: "https://r.test",
      hidden: false,
    });
  });

  it("keeps numeric keywords in document order", () => {
    const source = `
bind_address: "a"
public_address: "b"
groups:
  - name: "G"
    routes:
      b: "https://b.test"
      "2": "https://two.test"
      3: "https://three.test"
      a: "https://a.test"
`;
    const config = parseConfig(source, { classify: allExternal });

    expect([...config.groups[0].routes.keys()]).toEqual(["b", "2", "3", "a"]);
    expect(config.groups[0].routes.get("3")?.path).toBe("https://three.test");
  });

  it("keeps keywords that collide with object properties", () => {
    const source = `
bind_address: "a"
public_address: "b"
groups:
  - name: "G"
    routes:
      __proto__: "https://proto.test"
      constructor: "https://ctor.test"
      a: "https://a.test"
`;
    const config = parseConfig(source, { classify: allExternal });

    expect([...config.groups[0].routes.keys()]).toEqual(["__proto__", "constructor", "a"]);
    expect(config.groups[0].routes.get("__proto__")?.path).toBe("https://proto.test");
  });

  it("rejects invalid YAML", () => {
    expect(() => parseConfig("groups: [")).toThrow(ConfigParseError);
  });

  it("rejects duplicate keywords within a group", () => {
    const source = `
bind_address: "a"
public_address: "b"
groups:
  - name: "G"
    routes:
      a: "https://one.test"
      a: "https://two.test"
`;
    expect(() => parseConfig(source, { classify: allExternal })).toThrow(ConfigParseError);
  });

  it("rejects missing required fields", () => {
    expect(() => parseConfig(`public_address: "b"\ngroups: []\n`)).toThrow(
      "Invalid config: bind_address: Required"
    );
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => parseConfig("just a string")).toThrow(ConfigParseError);
  });

  it("rejects min_args above max_args", () => {
    const source = `
bind_address: "a"
public_address: "b"
groups:
  - name: "G"
    routes:
      r: { path: "https://r.test", min_args: 3, max_args: 2 }
`;
    expect(() => parseConfig(source, { classify: allExternal })).toThrow(
      "min_args must not exceed max_args"
    );
  });

  it("rejects negative argument bounds", () => {
    const source = `
bind_address: "a"
public_address: "b"
groups:
  - name: "G"
    routes:
      r: { path: "https://r.test", max_args: -1 }
`;
    expect(() => parseConfig(source, { classify: allExternal })).toThrow(ConfigParseError);
  });
});

describe("readConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "keyhop-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("reads and parses a config file", async () => {
    const file = path.join(tempDir, "keyhop.yaml");
    await fs.writeFile(file, SAMPLE);

    const config = await readConfig(file, { classify: allExternal });

    expect(config.publicAddress).toBe("localhost:8080");
    expect(config.groups).toHaveLength(3);
  });

  it("rejects a file that is not valid UTF-8", async () => {
    const file = path.join(tempDir, "binary.yaml");
    const head = Buffer.from(
      'bind_address: "a"\npublic_address: "b"\ngroups:\n  - name: "G"\n    routes:\n      g: "https://g.test/'
    );
    await fs.writeFile(file, Buffer.concat([head, Buffer.from([0xff, 0xfe]), Buffer.from('"\n')]));

    await expect(readConfig(file, { classify: allExternal })).rejects.toThrow(
      `Config at ${file} is not valid UTF-8`
    );
    await expect(readConfig(file, { classify: allExternal })).rejects.toBeInstanceOf(ConfigParseError);
  });

  it("rejects a zero-byte file", async () => {
    const file = path.join(tempDir, "empty.yaml");
    await fs.writeFile(file, "");

    await expect(readConfig(file)).rejects.toBeInstanceOf(ConfigEmptyError);
  });

  it("rejects a file above the size limit before parsing", async () => {
    const file = path.join(tempDir, "large.yaml");
    await fs.writeFile(file, "{ not yaml at all");

    const error = await readConfig(file, { maxSize: 4 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigTooLargeError);
    if (error instanceof ConfigTooLargeError) {
      expect(error.size).toBe(17);
      expect(error.maxSize).toBe(4);
    }
  });

  it("skips the size limit for large configs", async () => {
    const file = path.join(tempDir, "large.yaml");
    await fs.writeFile(file, SAMPLE);

    const config = await readConfig(file, { maxSize: 4, largeConfig: true, classify: allExternal });

    expect(config.groups).toHaveLength(3);
  });

  it("uses a 100 MB default limit", () => {
    expect(LARGE_FILE_SIZE_THRESHOLD).toBe(100_000_000);
  });

  it("fails with an I/O error for a missing file", async () => {
    const error = await readConfig(path.join(tempDir, "missing.yaml")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(IoError);
    if (error instanceof IoError) {
      expect(error.syscallCode).toBe("ENOENT");
    }
  });
});
