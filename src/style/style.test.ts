import { afterEach, describe, expect, it } from "vitest";
import { detectStyling, isStylingEnabled, setStylingEnabled, stripStyles, styled } from "./style.js";

describe("styled", () => {
  const initial = isStylingEnabled();

  afterEach(() => {
    setStylingEnabled(initial);
  });

  it("returns text unchanged when styling is disabled", () => {
    setStylingEnabled(false);
    expect(styled("key", "user")).toBe("user");
    expect(styled("error", "ERROR")).toBe("ERROR");
  });

  it("wraps text in SGR codes when styling is enabled", () => {
    setStylingEnabled(true);
    expect(styled("key", "user")).toBe("\x1b[35muser\x1b[0m");
    expect(styled("info", "INFO")).toBe("\x1b[36;1mINFO\x1b[0m");
    expect(styled("prefix", "http")).toBe("\x1b[2;1mhttp\x1b[0m");
  });

  it("leaves empty text alone even when enabled", () => {
    setStylingEnabled(true);
    expect(styled("timestamp", "")).toBe("");
  });

  it("round-trips through stripStyles", () => {
    setStylingEnabled(true);
    const text = `${styled("timestamp", "1:34PM")} ${styled("warn", "WARN")}: hot`;
    expect(stripStyles(text)).toBe("1:34PM WARN: hot");
  });
});

describe("detectStyling", () => {
  it("is disabled by NO_COLOR even on a terminal", () => {
    expect(detectStyling({ NO_COLOR: "1" }, true)).toBe(false);
  });

  it("NO_COLOR beats FORCE_COLOR", () => {
    expect(detectStyling({ NO_COLOR: "1", FORCE_COLOR: "1" }, false)).toBe(false);
  });

  it("is forced on by FORCE_COLOR", () => {
    expect(detectStyling({ FORCE_COLOR: "1" }, false)).toBe(true);
  });

  it("treats FORCE_COLOR=0 as unset", () => {
    expect(detectStyling({ FORCE_COLOR: "0" }, false)).toBe(false);
  });

  it("follows the terminal otherwise", () => {
    expect(detectStyling({}, true)).toBe(true);
    expect(detectStyling({}, false)).toBe(false);
  });
});
