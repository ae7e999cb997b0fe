/**
 * Leveled line logger interface.
 * {@link LineLogger} implements it; code that only logs should program to it.
 * @module
 */

import type { AttrValue } from "../core/attr.js";

/**
 * Trailing arguments of every log call: loose `key, value` pairs and
 * complete {@link Attr} values, in any mix.
 */
export type LogArgs = readonly AttrValue[];

export interface Logger {
  debug(msg: string, ...args: LogArgs): void;
  info(msg: string, ...args: LogArgs): void;
  warn(msg: string, ...args: LogArgs): void;
  error(msg: string, ...args: LogArgs): void;

  /** A logger that appends `args` to every line, after this logger's own. */
  with(...args: LogArgs): Logger;

  /** A logger that prints `prefix` between the level and the message. */
  prefixed(prefix: string): Logger;
}
