import type { z } from "zod";
import type { colorModeSchema, levelNameSchema } from "../config/config-schema.js";
import { loggerConfigSchema } from "../config/config-schema.js";
import { TimeLayout } from "../core/time-layout.js";
import { ConfigError } from "../errors.js";

export type LevelName = z.infer<typeof levelNameSchema>;
export type ColorMode = z.infer<typeof colorModeSchema>;

/** Declarative logger configuration; every field is optional. */
export interface LoggerConfig {
  level?: LevelName; // default: "info"
  timeLayout?: string; // default: TimeLayout.RFC3339
  prefix?: string; // default: ""
  color?: ColorMode; // default: "auto"
}

export type ResolvedConfig = Required<LoggerConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  level: "info",
  timeLayout: TimeLayout.RFC3339,
  prefix: "",
  color: "auto",
};

/** Validate `config` and fill in defaults. Throws {@link ConfigError} when invalid. */
export function resolveConfig(config: LoggerConfig = {}): ResolvedConfig {
  return validateConfig(config);
}

function validateConfig(input: unknown): ResolvedConfig {
  const validation = loggerConfigSchema.safeParse(input);
  if (!validation.success) {
    const issues = validation.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: validation.error });
  }

  const data = validation.data;
  return {
    level: data.level ?? DEFAULT_CONFIG.level,
    timeLayout: data.timeLayout ?? DEFAULT_CONFIG.timeLayout,
    prefix: data.prefix ?? DEFAULT_CONFIG.prefix,
    color: data.color ?? DEFAULT_CONFIG.color,
  };
}

/**
 * Read configuration from environment variables:
 *
 * - `LINELOG_LEVEL` debug | info | warn | error (case-insensitive)
 * - `LINELOG_TIME_LAYOUT` layout pattern or built-in layout name
 * - `LINELOG_PREFIX`
 * - `LINELOG_COLOR` auto | always | never, else `NO_COLOR` / `FORCE_COLOR`
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): ResolvedConfig {
  const config: Record<string, string> = {};

  const level = env.LINELOG_LEVEL?.trim().toLowerCase();
  if (level) config.level = level === "warning" ? "warn" : level;

  if (env.LINELOG_TIME_LAYOUT) config.timeLayout = env.LINELOG_TIME_LAYOUT;
  if (env.LINELOG_PREFIX !== undefined) config.prefix = env.LINELOG_PREFIX;

  const color = env.LINELOG_COLOR?.trim().toLowerCase();
  if (color) {
    config.color = color;
  } else if (env.NO_COLOR) {
    config.color = "never";
  } else if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") {
    config.color = "always";
  }

  return validateConfig(config);
}
