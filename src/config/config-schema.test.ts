import { describe, expect, it } from "vitest";
import { TimeLayout } from "../core/time-layout.js";
import { ConfigError } from "../errors.js";
import { configFromEnv, DEFAULT_CONFIG, resolveConfig } from "../types/config.js";

describe("config validation", () => {
  it("accepts an empty config and applies defaults", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig()).toEqual({
      level: "info",
      timeLayout: TimeLayout.RFC3339,
      prefix: "",
      color: "auto",
    });
  });

  it("keeps provided fields", () => {
    const config = resolveConfig({ level: "debug", prefix: "build", color: "never" });
    expect(config.level).toBe("debug");
    expect(config.prefix).toBe("build");
    expect(config.color).toBe("never");
    expect(config.timeLayout).toBe(DEFAULT_CONFIG.timeLayout);
  });

  it("treats explicitly undefined fields as omitted", () => {
    expect(resolveConfig({ level: undefined }).level).toBe("info");
  });

  it("rejects an empty time layout", () => {
    expect(() => resolveConfig({ timeLayout: "" })).toThrow("Invalid configuration");
  });

  it("rejects unknown fields in config loaded from JSON", () => {
    const input = JSON.parse('{"level":"info","verbose":true}');
    expect(() => resolveConfig(input)).toThrow(ConfigError);
  });

  it("names the offending field", () => {
    expect(() => resolveConfig({ timeLayout: "" })).toThrow(/timeLayout:/);
  });
});

describe("configFromEnv", () => {
  it("uses defaults for an empty environment", () => {
    expect(configFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads every LINELOG_ variable", () => {
    const config = configFromEnv({
      LINELOG_LEVEL: "DEBUG",
      LINELOG_TIME_LAYOUT: "Kitchen",
      LINELOG_PREFIX: "deploy",
      LINELOG_COLOR: "Always",
    });
    expect(config).toEqual({
      level: "debug",
      timeLayout: "Kitchen",
      prefix: "deploy",
      color: "always",
    });
  });

  it("accepts warning as warn", () => {
    expect(configFromEnv({ LINELOG_LEVEL: "warning" }).level).toBe("warn");
  });

  it("falls back to NO_COLOR and FORCE_COLOR", () => {
    expect(configFromEnv({ NO_COLOR: "1" }).color).toBe("never");
    expect(configFromEnv({ FORCE_COLOR: "1" }).color).toBe("always");
    expect(configFromEnv({ FORCE_COLOR: "0" }).color).toBe("auto");
  });

  it("prefers LINELOG_COLOR over NO_COLOR", () => {
    expect(configFromEnv({ NO_COLOR: "1", LINELOG_COLOR: "always" }).color).toBe("always");
  });

  it("rejects an unknown level", () => {
    expect(() => configFromEnv({ LINELOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });
});
