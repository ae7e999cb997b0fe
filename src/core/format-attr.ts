/**
 * Rendering of attributes as `key=value` text.
 *
 * Every value kind goes through the same path: stringify it, then quote
 * the result if it would otherwise be ambiguous on a log line.
 * @module
 */

import { styled } from "../style/style.js";
import { Attr, type AttrValue, Group } from "./attr.js";
import { Duration } from "./duration.js";

/** Stands in for the value of a key that was never given one. */
export const MISSING_VALUE = "<MISSING>";

// Whitespace, control, format, private-use, unassigned, lone surrogates and
// the replacement character left behind by a bad decode.
const NEEDS_QUOTES = /[\s\p{C}\p{Z}\uFFFD]/u;

// What JSON.stringify leaves raw but a terminal would not show faithfully.
const EXTRA_ESCAPES = /[\u007f-\u009f\p{Cf}\p{Co}\p{Cn}\p{Zl}\p{Zp}]/gu;

function escapeUnits(char: string): string {
  let out = "";
  for (let i = 0; i < char.length; i++) {
    out += `\\u${char.charCodeAt(i).toString(16).padStart(4, "0")}`;
  }
  return out;
}

/** Whether `text` must be quoted to stay a single unambiguous token. */
export function needsQuotes(text: string): boolean {
  return text === "" || NEEDS_QUOTES.test(text);
}

/**
 * Double-quote `text`, escaping quotes, backslashes and every character
 * that is not visibly printable. The result is also a valid JSON string.
 */
export function quote(text: string): string {
  return JSON.stringify(text).replace(EXTRA_ESCAPES, escapeUnits);
}

/** Default text representation of a value, before any quoting. */
export function stringifyValue(value: AttrValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Duration) return value.toString();
  if (value instanceof Error) return value.message;
  if (value instanceof Attr) return `${value.key}=${stringifyValue(value.value)}`;
  if (value instanceof Group) {
    const members = value.members.map((member) => `${member.key}=${formatValue(member.value)}`);
    return `{${members.join(" ")}}`;
  }
  return `[${value.join(" ")}]`;
}

/** Stringified value, quoted when {@link needsQuotes} says so. */
export function formatValue(value: AttrValue): string {
  const text = stringifyValue(value);
  return needsQuotes(text) ? quote(text) : text;
}

/** A single `key=value` with a styled key. Keys are never quoted. */
export function formatAttr(key: string, value: AttrValue): string {
  return `${styled("key", key)}=${formatValue(value)}`;
}

/**
 * Walk an argument list, yielding each rendered pair.
 *
 * An {@link Attr} is a pair by itself; anything else is a key whose value
 * is the next argument. A trailing key with nothing after it gets
 * {@link MISSING_VALUE}.
 */
export function* formatPairs(args: readonly AttrValue[]): Generator<string> {
  let i = 0;
  while (i < args.length) {
    const item = args[i];
    if (item instanceof Attr) {
      yield formatAttr(item.key, item.value);
      i += 1;
      continue;
    }

    const key = stringifyValue(item);
    if (i + 1 === args.length) {
      yield `${styled("key", key)}=${MISSING_VALUE}`;
      return;
    }

    yield formatAttr(key, args[i + 1]);
    i += 2;
  }
}
