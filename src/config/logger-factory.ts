/**
 * Build loggers from declarative configuration rather than option calls.
 * @module
 */

import { parseLevel } from "../core/level.js";
import {
  createLogger,
  type LineLogger,
  type LoggerOption,
  withLevel,
  withPrefix,
  withTimeLayout,
} from "../core/logger.js";
import { resolveLayout } from "../core/time-layout.js";
import type { Sink } from "../interfaces/sink.js";
import { detectStyling, setStylingEnabled } from "../style/style.js";
import {
  type ColorMode,
  configFromEnv,
  type LoggerConfig,
  type ResolvedConfig,
  resolveConfig,
} from "../types/config.js";

/** Switch process-wide styling to match `mode`. */
export function applyColorMode(mode: ColorMode): void {
  setStylingEnabled(mode === "auto" ? detectStyling() : mode === "always");
}

export function optionsFromConfig(config: ResolvedConfig): LoggerOption[] {
  return [
    withLevel(parseLevel(config.level)),
    withTimeLayout(resolveLayout(config.timeLayout)),
    withPrefix(config.prefix),
  ];
}

/**
 * Validate `config`, apply its colour mode and build a logger. Options in
 * `extra` run after the configured ones and so take precedence.
 */
export function createLoggerFromConfig(
  sink: Sink,
  config: LoggerConfig = {},
  ...extra: LoggerOption[]
): LineLogger {
  const resolved = resolveConfig(config);
  applyColorMode(resolved.color);
  return createLogger(sink, ...optionsFromConfig(resolved), ...extra);
}

/** Like {@link createLoggerFromConfig}, reading the configuration from `env`. */
export function createLoggerFromEnv(
  sink: Sink = process.stderr,
  env: Record<string, string | undefined> = process.env,
  ...extra: LoggerOption[]
): LineLogger {
  const resolved = configFromEnv(env);
  applyColorMode(resolved.color);
  return createLogger(sink, ...optionsFromConfig(resolved), ...extra);
}
