/**
 * linelog public API barrel.
 *
 * Re-exports the logger, its options and value types, configuration
 * helpers and errors that make up the public surface of the package.
 * @module
 */

// Config
export { colorModeSchema, levelNameSchema, loggerConfigSchema } from "./config/config-schema.js";
export {
  applyColorMode,
  createLoggerFromConfig,
  createLoggerFromEnv,
  optionsFromConfig,
} from "./config/logger-factory.js";
// Core
export type { AttrValue } from "./core/attr.js";
export { Attr, attr, Group } from "./core/attr.js";
export { BufferPool, defaultPool, LineBuffer, MAX_POOLED_CAPACITY } from "./core/buffer-pool.js";
export { Duration } from "./core/duration.js";
export {
  formatAttr,
  formatValue,
  MISSING_VALUE,
  needsQuotes,
  quote,
  stringifyValue,
} from "./core/format-attr.js";
export { Level, levelLabel, parseLevel, shouldEmit } from "./core/level.js";
export type { Clock, LoggerOption, LoggerSettings } from "./core/logger.js";
export {
  createLogger,
  LineLogger,
  withClock,
  withLevel,
  withPrefix,
  withTimeLayout,
} from "./core/logger.js";
export type { LoggerScope } from "./core/scope.js";
export { bindToScope, loggerFromScope } from "./core/scope.js";
export { SinkLock } from "./core/sink-lock.js";
export type { TimeFormatter, TimeLayoutName } from "./core/time-layout.js";
export { compileLayout, resolveLayout, TimeLayout } from "./core/time-layout.js";
// Errors
export type { ErrorCode } from "./errors.js";
export { ConfigError, errorMessage, LinelogError, toLinelogError, UsageError } from "./errors.js";
// Interfaces
export type { Logger, LogArgs } from "./interfaces/logger.js";
export type { Sink } from "./interfaces/sink.js";
export { discard } from "./interfaces/sink.js";
// Style
export type { StyleRole } from "./style/style.js";
export {
  detectStyling,
  isStylingEnabled,
  setStylingEnabled,
  stripStyles,
  styled,
} from "./style/style.js";
// Types
export type { ColorMode, LevelName, LoggerConfig, ResolvedConfig } from "./types/config.js";
export { configFromEnv, DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
