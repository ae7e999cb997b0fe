import { applyColorMode, optionsFromConfig } from "../config/logger-factory.js";
import { Level } from "../core/level.js";
import { type Clock, createLogger, type LineLogger, withClock } from "../core/logger.js";
import { toLinelogError } from "../errors.js";
import type { Sink } from "../interfaces/sink.js";
import { configFromEnv } from "../types/config.js";
import { parseArgs, USAGE } from "./args.js";

export interface CliIO {
  env: Record<string, string | undefined>;
  stdout: Sink;
  stderr: Sink;
  clock?: Clock;
}

const EXIT_OK = 0;
const EXIT_CONFIG = 1;
const EXIT_USAGE = 2;

const encoder = new TextEncoder();

function emit(logger: LineLogger, level: Level): LineLogger["info"] {
  switch (level) {
    case Level.Debug:
      return logger.debug.bind(logger);
    case Level.Info:
      return logger.info.bind(logger);
    case Level.Warn:
      return logger.warn.bind(logger);
    case Level.Error:
      return logger.error.bind(logger);
  }
}

/**
 * Run the CLI with `argv` (arguments after the program name) and return
 * the exit code. A line filtered out by the level is still a success.
 */
export function run(argv: readonly string[], io: CliIO): number {
  try {
    const command = parseArgs(argv);
    if (command.kind === "help") {
      io.stdout.write(encoder.encode(USAGE));
      return EXIT_OK;
    }

    const config = configFromEnv(io.env);
    applyColorMode(command.color ?? config.color);

    const logger = createLogger(
      io.stderr,
      ...optionsFromConfig(config),
      ...command.options,
      ...(io.clock ? [withClock(io.clock)] : []),
    );
    emit(logger, command.level)(command.message, ...command.attrs);
    return EXIT_OK;
  } catch (err) {
    const error = toLinelogError(err);
    const hint = error.code === "USAGE" ? "\nRun with --help for usage." : "";
    io.stderr.write(encoder.encode(`linelog: ${error.message}${hint}\n`));
    return error.code === "USAGE" ? EXIT_USAGE : EXIT_CONFIG;
  }
}
