import { describe, expect, it } from "vitest";
import { Attr } from "../core/attr.js";
import { Level } from "../core/level.js";
import { UsageError } from "../errors.js";
import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("parses level, message and pairs", () => {
    const command = parseArgs(["info", "Deploy started", "env=prod", "sha=abc123"]);
    expect(command).toMatchObject({ kind: "log", level: Level.Info, message: "Deploy started" });
    if (command.kind !== "log") throw new Error("expected a log command");
    expect(command.attrs).toEqual([new Attr("env", "prod"), new Attr("sha", "abc123")]);
    expect(command.options).toEqual([]);
    expect(command.color).toBeUndefined();
  });

  it("keeps everything after the first = in the value", () => {
    const command = parseArgs(["warn", "m", "query=a=b"]);
    if (command.kind !== "log") throw new Error("expected a log command");
    expect(command.attrs).toEqual([new Attr("query", "a=b")]);
  });

  it("collects one option per flag", () => {
    const command = parseArgs([
      "--level",
      "debug",
      "--prefix",
      "ci",
      "--time-layout",
      "Kitchen",
      "debug",
      "hello",
    ]);
    if (command.kind !== "log") throw new Error("expected a log command");
    expect(command.options).toHaveLength(3);
    expect(command.level).toBe(Level.Debug);
  });

  it("reads colour flags", () => {
    const on = parseArgs(["--color", "info", "m"]);
    const off = parseArgs(["--no-color", "info", "m"]);
    expect(on.kind === "log" && on.color).toBe("always");
    expect(off.kind === "log" && off.color).toBe("never");
  });

  it("returns help for --help and -h", () => {
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["info", "-h"])).toEqual({ kind: "help" });
  });

  it("treats everything after -- as positional", () => {
    const command = parseArgs(["--", "error", "--not-a-flag"]);
    expect(command).toMatchObject({ kind: "log", level: Level.Error, message: "--not-a-flag" });
  });

  it("rejects a missing message", () => {
    expect(() => parseArgs(["info"])).toThrow("Expected a level and a message");
  });

  it("rejects an unknown level as a usage error", () => {
    expect(() => parseArgs(["loud", "m"])).toThrow(UsageError);
    expect(() => parseArgs(["--level", "loud", "info", "m"])).toThrow('Unknown log level "loud"');
  });

  it("rejects a flag without its value", () => {
    expect(() => parseArgs(["info", "m", "--prefix"])).toThrow("--prefix requires a value");
    expect(() => parseArgs(["--prefix", "--color", "info", "m"])).toThrow(
      "--prefix requires a value",
    );
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--verbose", "info", "m"])).toThrow("Unknown option: --verbose");
  });

  it("rejects pairs without a key", () => {
    expect(() => parseArgs(["info", "m", "novalue"])).toThrow('Expected key=value, got "novalue"');
    expect(() => parseArgs(["info", "m", "=v"])).toThrow(UsageError);
  });
});
