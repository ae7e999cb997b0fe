/**
 * Carry a logger along with an operation's own scope object instead of
 * threading it through every call.
 *
 * Binding derives a new scope that inherits everything from the original
 * (its prototype is the original), so the caller's scope is never mutated
 * and nested operations can rebind without affecting their parents.
 * @module
 */

import { createLogger, LineLogger } from "./logger.js";

/** Property under which a bound logger lives on a scope. */
export const LOGGER_KEY = Symbol("linelog.logger");

export interface LoggerScope {
  readonly [LOGGER_KEY]?: LineLogger;
}

/** A scope derived from `scope` that carries `logger`. */
export function bindToScope<S extends object>(scope: S, logger: LineLogger): S & LoggerScope {
  const bound: S & LoggerScope = Object.create(scope, {
    [LOGGER_KEY]: { value: logger, enumerable: false },
  });
  return bound;
}

/**
 * The logger bound to `scope` or any scope it was derived from. Without
 * one, a default logger writing to stderr.
 */
export function loggerFromScope(scope: object | undefined): LineLogger {
  const logger: unknown = scope === undefined ? undefined : Reflect.get(scope, LOGGER_KEY);
  if (logger instanceof LineLogger) return logger;
  return createLogger(process.stderr);
}
