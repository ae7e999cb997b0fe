import { describe, expect, it } from "vitest";
import { ConfigError, errorMessage, LinelogError, toLinelogError, UsageError } from "./errors.js";

describe("errors", () => {
  it("names each error after its class and sets its code", () => {
    const config = new ConfigError("bad level");
    const usage = new UsageError("missing message");

    expect(config).toBeInstanceOf(LinelogError);
    expect(config).toBeInstanceOf(Error);
    expect([config.name, config.code, config.message]).toEqual([
      "ConfigError",
      "CONFIG",
      "bad level",
    ]);
    expect([usage.name, usage.code]).toEqual(["UsageError", "USAGE"]);
    expect(new LinelogError("x", "UNEXPECTED").name).toBe("LinelogError");
  });

  it("keeps the cause", () => {
    const cause = new Error("zod failed");
    expect(new ConfigError("invalid", { cause }).cause).toBe(cause);
  });
});

describe("toLinelogError", () => {
  it("returns linelog errors unchanged", () => {
    const err = new UsageError("x");
    expect(toLinelogError(err)).toBe(err);
  });

  it("wraps anything else as unexpected, keeping it as the cause", () => {
    const plain = new TypeError("plain");
    const wrapped = toLinelogError(plain);

    expect(wrapped.code).toBe("UNEXPECTED");
    expect(wrapped.message).toBe("plain");
    expect(wrapped.cause).toBe(plain);
    expect(toLinelogError("text").message).toBe("text");
    expect(toLinelogError(42).message).toBe("42");
  });
});

describe("errorMessage", () => {
  it("reads the message of errors and stringifies other values", () => {
    expect(errorMessage(new ConfigError("typed"))).toBe("typed");
    expect(errorMessage("text")).toBe("text");
    expect(errorMessage(undefined)).toBe("undefined");
  });
});
