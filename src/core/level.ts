import { ConfigError } from "../errors.js";
import { styled } from "../style/style.js";

/**
 * Severity of a log line. Values leave gaps so further levels can be
 * slotted in without renumbering.
 */
export enum Level {
  /** Verbose output for `--debug` style modes and internal diagnostics. */
  Debug = -4,
  /** Progress updates and other informational messages. The default. */
  Info = 0,
  /** Recoverable issues worth flagging, e.g. a missing config file with usable defaults. */
  Warn = 4,
  /** Non-recoverable problems, typically followed by an error value or an exit. */
  Error = 8,
}

const LEVEL_LABELS: Record<Level, string> = {
  [Level.Debug]: "DEBUG",
  [Level.Info]: "INFO",
  [Level.Warn]: "WARN",
  [Level.Error]: "ERROR",
};

const LEVEL_ROLES = {
  [Level.Debug]: "debug",
  [Level.Info]: "info",
  [Level.Warn]: "warn",
  [Level.Error]: "error",
} as const;

const LEVEL_NAMES = new Map<string, Level>([
  ["debug", Level.Debug],
  ["info", Level.Info],
  ["warn", Level.Warn],
  ["warning", Level.Warn],
  ["error", Level.Error],
]);

function isLevel(value: number): value is Level {
  return Object.hasOwn(LEVEL_LABELS, value);
}

/** Plain label for a level; anything outside the four levels is "unknown". */
export function levelLabel(level: number): string {
  return isLevel(level) ? LEVEL_LABELS[level] : "unknown";
}

/** Label wrapped in the level's own style. Unknown levels stay unstyled. */
export function styledLevel(level: number): string {
  return isLevel(level) ? styled(LEVEL_ROLES[level], LEVEL_LABELS[level]) : "unknown";
}

/** Whether a line at `attempted` passes a logger configured at `configured`. */
export function shouldEmit(configured: Level, attempted: Level): boolean {
  return attempted >= configured;
}

/** Parse a case-insensitive level name such as "debug" or "WARNING". */
export function parseLevel(text: string): Level {
  const level = LEVEL_NAMES.get(text.trim().toLowerCase());
  if (level === undefined) {
    throw new ConfigError(`Unknown log level "${text}" (expected debug, info, warn or error)`);
  }
  return level;
}
