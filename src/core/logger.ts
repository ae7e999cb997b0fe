/**
 * Leveled, human-readable line logger for command line programs.
 *
 * Lines look like
 *
 *   2025-04-01T13:34:03Z INFO http: Response from oven status=200 duration=57ms
 *
 * with the timestamp, level, prefix and keys styled for the terminal. The
 * logger is cheap when a line is filtered out: a discarded or disabled
 * call costs one comparison and touches neither the clock nor the
 * buffer pool.
 * @module
 */

import { EventEmitter } from "node:events";
import type { Logger, LogArgs } from "../interfaces/logger.js";
import { discard, type Sink } from "../interfaces/sink.js";
import { styled } from "../style/style.js";
import { defaultPool } from "./buffer-pool.js";
import { formatPairs } from "./format-attr.js";
import { Level, shouldEmit, styledLevel } from "./level.js";
import { SinkLock } from "./sink-lock.js";
import { compileLayout, TimeLayout, type TimeFormatter } from "./time-layout.js";

const SPACE = 0x20;
const COLON = 0x3a;
const NEWLINE = 0x0a;

/** Source of the current instant. */
export type Clock = () => Date;

/** Everything a {@link LoggerOption} may change before the logger is built. */
export interface LoggerSettings {
  level: Level;
  timeLayout: string;
  clock: Clock;
  prefix: string;
}

export type LoggerOption = (settings: LoggerSettings) => void;

/** Minimum level that gets written. Defaults to {@link Level.Info}. */
export function withLevel(level: Level): LoggerOption {
  return (settings) => {
    settings.level = level;
  };
}

/** Timestamp layout, see {@link TimeLayout}. Defaults to RFC 3339. */
export function withTimeLayout(layout: string): LoggerOption {
  return (settings) => {
    settings.timeLayout = layout;
  };
}

/** Replace the clock, e.g. with a fixed instant in tests. */
export function withClock(clock: Clock): LoggerOption {
  return (settings) => {
    settings.clock = clock;
  };
}

export function withPrefix(prefix: string): LoggerOption {
  return (settings) => {
    settings.prefix = prefix;
  };
}

// A Date carries no zone; the layout renders it in UTC.
const systemClock: Clock = () => new Date();

// Streams report failed writes through an 'error' event, which is fatal
// when nobody listens. One listener per sink, however many loggers share it.
const guardedSinks = new WeakSet<EventEmitter>();

function ignoreSinkErrors(): void {}

function guardStreamErrors(sink: Sink): void {
  if (!(sink instanceof EventEmitter) || guardedSinks.has(sink)) return;
  guardedSinks.add(sink);
  sink.on("error", ignoreSinkErrors);
}

interface LoggerState {
  readonly sink: Sink;
  readonly lock: SinkLock;
  readonly isDiscard: boolean;
  readonly level: Level;
  readonly timeLayout: string;
  readonly formatTime: TimeFormatter;
  readonly clock: Clock;
  readonly prefix: string;
  readonly attrs: LogArgs;
}

export class LineLogger implements Logger {
  private constructor(private readonly state: LoggerState) {}

  /** Build a logger writing to `sink`; see {@link createLogger}. */
  static create(sink: Sink, ...options: LoggerOption[]): LineLogger {
    const settings: LoggerSettings = {
      level: Level.Info,
      timeLayout: TimeLayout.RFC3339,
      clock: systemClock,
      prefix: "",
    };
    for (const option of options) {
      option(settings);
    }
    guardStreamErrors(sink);

    return new LineLogger({
      sink,
      lock: new SinkLock(),
      isDiscard: sink === discard,
      level: settings.level,
      timeLayout: settings.timeLayout,
      formatTime: compileLayout(settings.timeLayout),
      clock: settings.clock,
      prefix: settings.prefix,
      attrs: [],
    });
  }

  get level(): Level {
    return this.state.level;
  }

  get prefix(): string {
    return this.state.prefix;
  }

  get timeLayout(): string {
    return this.state.timeLayout;
  }

  /** Whether a line at `level` would be written. */
  enabled(level: Level): boolean {
    return !this.state.isDiscard && shouldEmit(this.state.level, level);
  }

  debug(msg: string, ...args: LogArgs): void {
    this.emit(Level.Debug, msg, args);
  }

  info(msg: string, ...args: LogArgs): void {
    this.emit(Level.Info, msg, args);
  }

  warn(msg: string, ...args: LogArgs): void {
    this.emit(Level.Warn, msg, args);
  }

  error(msg: string, ...args: LogArgs): void {
    this.emit(Level.Error, msg, args);
  }

  /**
   * A copy of this logger that appends `args` to every line, after the
   * attributes it already carries. Sink and lock are shared.
   */
  with(...args: LogArgs): LineLogger {
    return new LineLogger({ ...this.state, attrs: [...this.state.attrs, ...args] });
  }

  /** A copy of this logger with its prefix replaced. Sink and lock are shared. */
  prefixed(prefix: string): LineLogger {
    return new LineLogger({ ...this.state, prefix });
  }

  private emit(level: Level, msg: string, args: LogArgs): void {
    const state = this.state;
    if (state.isDiscard || !shouldEmit(state.level, level)) return;

    const buf = defaultPool.acquire();
    try {
      buf.writeString(styled("timestamp", state.formatTime(state.clock())));
      buf.writeByte(SPACE);
      buf.writeString(styledLevel(level));
      if (state.prefix !== "") {
        buf.writeByte(SPACE);
        buf.writeString(styled("prefix", state.prefix));
      }
      buf.writeByte(COLON);
      buf.writeByte(SPACE);
      buf.writeString(msg);

      // Persistent and call-site attributes pair up independently, so an
      // unmatched key in one never swallows a key of the other.
      for (const pair of formatPairs(state.attrs)) {
        buf.writeByte(SPACE);
        buf.writeString(pair);
      }
      for (const pair of formatPairs(args)) {
        buf.writeByte(SPACE);
        buf.writeString(pair);
      }
      buf.writeByte(NEWLINE);

      const line = buf.toBytes();
      state.lock.run(() => {
        try {
          state.sink.write(line);
        } catch {
          // Sink failures are never surfaced to the caller.
        }
      });
    } finally {
      defaultPool.release(buf);
    }
  }
}

/**
 * Build a logger writing to `sink`, configured by functional options.
 *
 * ```ts
 * const logger = createLogger(process.stderr, withLevel(Level.Debug));
 * logger.with("user", "ana").prefixed("http").info("Request done", "status", 200);
 * ```
 */
export function createLogger(sink: Sink, ...options: LoggerOption[]): LineLogger {
  return LineLogger.create(sink, ...options);
}
