import { describe, expect, it } from "vitest";
import { Duration } from "./duration.js";

describe("Duration", () => {
  it("renders zero as 0s", () => {
    expect(Duration.ms(0).toString()).toBe("0s");
  });

  it("renders sub-second values in ms", () => {
    expect(Duration.ms(57).toString()).toBe("57ms");
    expect(Duration.ms(500).toString()).toBe("500ms");
    expect(Duration.ms(1.25).toString()).toBe("1.25ms");
  });

  it("renders sub-millisecond values in µs and ns", () => {
    expect(Duration.nanoseconds(750_000).toString()).toBe("750µs");
    expect(Duration.nanoseconds(1_500).toString()).toBe("1.5µs");
    expect(Duration.nanoseconds(42).toString()).toBe("42ns");
  });

  it("renders seconds with an optional fraction", () => {
    expect(Duration.seconds(30).toString()).toBe("30s");
    expect(Duration.ms(1500).toString()).toBe("1.5s");
  });

  it("renders minutes and hours with every smaller unit", () => {
    expect(Duration.minutes(2).toString()).toBe("2m0s");
    expect(Duration.seconds(90).toString()).toBe("1m30s");
    expect(Duration.hours(1).toString()).toBe("1h0m0s");
    expect(Duration.seconds(3723).toString()).toBe("1h2m3s");
  });

  it("keeps the sign of negative durations", () => {
    expect(Duration.ms(-57).toString()).toBe("-57ms");
    expect(Duration.seconds(-90).toString()).toBe("-1m30s");
  });

  it("measures the time between two instants", () => {
    const start = new Date("2025-04-01T13:34:03Z");
    const end = new Date("2025-04-01T13:34:05.250Z");
    const elapsed = Duration.between(start, end);
    expect(elapsed.milliseconds).toBe(2250);
    expect(elapsed.toString()).toBe("2.25s");
  });
});
