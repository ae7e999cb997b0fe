/**
 * Elapsed time as an attribute value.
 *
 * Renders compactly with the largest useful units: `57ms`, `1.5s`,
 * `2m0s`, `1h0m0s`. Sub-millisecond values fall back to `µs` and `ns`.
 * @module
 */

const NS_PER_US = 1_000;
const NS_PER_MS = 1_000_000;
const NS_PER_S = 1_000_000_000;

/** Digits of `value` padded to `width`, trailing zeros dropped, with a leading dot. */
function fraction(value: number, width: number): string {
  if (value === 0) return "";
  return `.${String(value).padStart(width, "0").replace(/0+$/, "")}`;
}

export class Duration {
  private constructor(readonly nanoseconds: number) {}

  static nanoseconds(n: number): Duration {
    return new Duration(Math.round(n));
  }

  static ms(n: number): Duration {
    return new Duration(Math.round(n * NS_PER_MS));
  }

  static seconds(n: number): Duration {
    return new Duration(Math.round(n * NS_PER_S));
  }

  static minutes(n: number): Duration {
    return Duration.seconds(n * 60);
  }

  static hours(n: number): Duration {
    return Duration.seconds(n * 3600);
  }

  /** Time from `start` to `end` (defaults to now). */
  static between(start: Date, end: Date = new Date()): Duration {
    return Duration.ms(end.getTime() - start.getTime());
  }

  get milliseconds(): number {
    return this.nanoseconds / NS_PER_MS;
  }

  toString(): string {
    const ns = Math.abs(this.nanoseconds);
    const sign = this.nanoseconds < 0 ? "-" : "";

    if (ns === 0) return "0s";
    if (ns < NS_PER_US) return `${sign}${ns}ns`;
    if (ns < NS_PER_MS) {
      return `${sign}${Math.floor(ns / NS_PER_US)}${fraction(ns % NS_PER_US, 3)}µs`;
    }
    if (ns < NS_PER_S) {
      return `${sign}${Math.floor(ns / NS_PER_MS)}${fraction(ns % NS_PER_MS, 6)}ms`;
    }

    const totalSeconds = Math.floor(ns / NS_PER_S);
    const seconds = `${totalSeconds % 60}${fraction(ns % NS_PER_S, 9)}s`;
    const totalMinutes = Math.floor(totalSeconds / 60);
    if (totalMinutes === 0) return `${sign}${seconds}`;

    const hours = Math.floor(totalMinutes / 60);
    const minutes = `${totalMinutes % 60}m`;
    return hours === 0 ? `${sign}${minutes}${seconds}` : `${sign}${hours}h${minutes}${seconds}`;
  }
}
