/** Category of a {@link LinelogError}; the CLI maps it to an exit code. */
export type ErrorCode = "CONFIG" | "USAGE" | "UNEXPECTED";

/**
 * Base of every error linelog throws. Logging calls themselves never
 * throw; these come from configuration and the command line.
 */
export class LinelogError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid options, config object or environment. */
export class ConfigError extends LinelogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
  }
}

/** Command line misuse. */
export class UsageError extends LinelogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "USAGE", options);
  }
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/** `value` itself if it is a {@link LinelogError}, else wrapped as `UNEXPECTED`. */
export function toLinelogError(value: unknown): LinelogError {
  if (value instanceof LinelogError) return value;
  return new LinelogError(errorMessage(value), "UNEXPECTED", { cause: value });
}
