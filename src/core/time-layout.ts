/**
 * Token-based timestamp layouts.
 *
 * Tokens: `YYYY` year, `MM` month, `DD` day, `HH` 24-hour, `hh`/`h`
 * 12-hour padded/unpadded, `mm` minutes, `ss` seconds, `SSS`
 * milliseconds, `A` AM/PM, `Z` zone designator. Text in `[...]` is
 * literal, as is anything that is not a token. Instants always render in
 * UTC, so `Z` is always the literal `Z`.
 * @module
 */

export const TimeLayout = {
  RFC3339: "YYYY-MM-DDTHH:mm:ssZ",
  RFC3339Milli: "YYYY-MM-DDTHH:mm:ss.SSSZ",
  Kitchen: "h:mmA",
  TimeOnly: "HH:mm:ss",
  DateTime: "YYYY-MM-DD HH:mm:ss",
  StampMilli: "HH:mm:ss.SSS",
} as const;

export type TimeLayoutName = keyof typeof TimeLayout;

const TOKEN_PATTERN = /\[([^\]]*)]|YYYY|SSS|MM|DD|HH|hh|mm|ss|h|A|Z/g;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

const hour12 = (d: Date) => d.getUTCHours() % 12 || 12;

const TOKENS: Record<string, (d: Date) => string> = {
  YYYY: (d) => pad(d.getUTCFullYear(), 4),
  MM: (d) => pad(d.getUTCMonth() + 1),
  DD: (d) => pad(d.getUTCDate()),
  HH: (d) => pad(d.getUTCHours()),
  hh: (d) => pad(hour12(d)),
  h: (d) => String(hour12(d)),
  mm: (d) => pad(d.getUTCMinutes()),
  ss: (d) => pad(d.getUTCSeconds()),
  SSS: (d) => pad(d.getUTCMilliseconds(), 3),
  A: (d) => (d.getUTCHours() < 12 ? "AM" : "PM"),
  Z: () => "Z",
};

type Part = string | ((d: Date) => string);

/** A layout compiled once so formatting does no parsing per call. */
export type TimeFormatter = (date: Date) => string;

export function compileLayout(layout: string): TimeFormatter {
  const parts: Part[] = [];
  let last = 0;

  for (const match of layout.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    if (index > last) parts.push(layout.slice(last, index));

    const literal = match[1];
    const token = TOKENS[match[0]];
    parts.push(literal !== undefined ? literal : token);
    last = index + match[0].length;
  }
  if (last < layout.length) parts.push(layout.slice(last));

  return (date) => {
    let out = "";
    for (const part of parts) {
      out += typeof part === "string" ? part : part(date);
    }
    return out;
  };
}

function isLayoutName(name: string): name is TimeLayoutName {
  return Object.hasOwn(TimeLayout, name);
}

/** Resolve a layout name such as "Kitchen" to its pattern; other text is a pattern already. */
export function resolveLayout(nameOrPattern: string): string {
  return isLayoutName(nameOrPattern) ? TimeLayout[nameOrPattern] : nameOrPattern;
}
