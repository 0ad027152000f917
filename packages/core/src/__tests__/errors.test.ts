/**
 * Error type tests
 */

import { describe, it, expect } from "vitest";

import {
  ConfigEmptyError,
  ConfigTooLargeError,
  CustomProgramError,
  InvalidConfigPathError,
  IoError,
  KeyhopError,
  isKeyhopError,
} from "../errors.js";

describe("KeyhopError subclasses", () => {
  it("carry a code and a name", () => {
    const error = new ConfigEmptyError("/etc/keyhop.yaml");

    expect(error).toBeInstanceOf(KeyhopError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("CONFIG_EMPTY");
    expect(error.name).toBe("ConfigEmptyError");
    expect(error.message).toBe("Config at /etc/keyhop.yaml is empty (zero bytes)");
  });

  it("describe oversized configs", () => {
    expect(new ConfigTooLargeError(200, 100).message).toBe(
      "Config is 200 bytes, over the 100 byte limit. Pass --large-config to load it anyway."
    );
  });

  it("use stderr verbatim for program failures", () => {
    expect(new CustomProgramError("line one\nline two\n", 2).message).toBe("line one\nline two\n");
  });

  it("pick up the errno code of the cause", () => {
    const cause = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    const error = new IoError("Failed to run /x", cause);

    expect(error.syscallCode).toBe("EACCES");
    expect(error.cause).toBe(cause);
  });

  it("leave syscallCode unset without an errno cause", () => {
    expect(new IoError("Failed").syscallCode).toBeUndefined();
  });

  it("include the cause in path errors", () => {
    expect(new InvalidConfigPathError("/x.yaml", new Error("nope")).message).toBe(
      "Failed to access /x.yaml: nope"
    );
  });
});

describe("isKeyhopError", () => {
  it("narrows keyhop errors only", () => {
    expect(isKeyhopError(new IoError("x"))).toBe(true);
    expect(isKeyhopError(new Error("x"))).toBe(false);
    expect(isKeyhopError("x")).toBe(false);
  });
});
