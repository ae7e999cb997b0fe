/**
 * Terminal styling for log line components.
 *
 * Each part of a line (timestamp, level label, prefix, attribute key) is
 * rendered through a fixed semantic role. Styling is a process-wide switch:
 * when disabled every role returns its text unchanged.
 * @module
 */

const esc = (code: string) => `\x1b[${code}m`;
const RESET = esc("0");

const BOLD = "1";
const DIM = "2";
const RED = "31";
const YELLOW = "33";
const BLUE = "34";
const MAGENTA = "35";
const CYAN = "36";

/** The semantic part of a log line a piece of text belongs to. */
export type StyleRole = "timestamp" | "prefix" | "key" | "debug" | "info" | "warn" | "error";

const ROLE_CODES: Record<StyleRole, string> = {
  timestamp: esc(DIM),
  prefix: esc(`${DIM};${BOLD}`),
  key: esc(MAGENTA),
  debug: esc(`${BLUE};${BOLD}`),
  info: esc(`${CYAN};${BOLD}`),
  warn: esc(`${YELLOW};${BOLD}`),
  error: esc(`${RED};${BOLD}`),
};

/**
 * Decide whether styling starts enabled.
 *
 * `NO_COLOR` (any non-empty value) wins over `FORCE_COLOR`; otherwise
 * styling follows whether the stream is a terminal.
 */
export function detectStyling(
  env: Record<string, string | undefined> = process.env,
  isTTY: boolean = process.stderr.isTTY === true,
): boolean {
  if (env.NO_COLOR) return false;
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") return true;
  return isTTY;
}

let enabled = detectStyling();

/** Turn styling on or off for the whole process. */
export function setStylingEnabled(on: boolean): void {
  enabled = on;
}

export function isStylingEnabled(): boolean {
  return enabled;
}

/** Wrap `text` in the codes for `role`, or return it as is when styling is off. */
export function styled(role: StyleRole, text: string): string {
  if (!enabled || text === "") return text;
  return `${ROLE_CODES[role]}${text}${RESET}`;
}

// SGR sequences only; cursor movement never appears in our own output.
const SGR_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripStyles(text: string): string {
  return text.replace(SGR_PATTERN, "");
}
