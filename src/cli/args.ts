import { attr, type Attr } from "../core/attr.js";
import { Level, parseLevel } from "../core/level.js";
import { type LoggerOption, withLevel, withPrefix, withTimeLayout } from "../core/logger.js";
import { resolveLayout } from "../core/time-layout.js";
import { errorMessage, UsageError } from "../errors.js";
import type { ColorMode } from "../types/config.js";

export const USAGE = `
  linelog: write a leveled log line from the shell

  Usage: linelog [options] <level> <message> [key=value ...]

  Levels: debug, info, warn, error

  Options:
    --level <name>          Minimum level to write (default: $LINELOG_LEVEL or info)
    --prefix <text>         Prefix between level and message
    --time-layout <layout>  Timestamp layout or name, e.g. Kitchen (default: RFC3339)
    --color, --no-color     Force styling on or off
    --help, -h              Show this help
`;

export type CliCommand =
  | { kind: "help" }
  | {
      kind: "log";
      level: Level;
      message: string;
      attrs: Attr[];
      options: LoggerOption[];
      color?: ColorMode;
    };

function levelArg(text: string): Level {
  try {
    return parseLevel(text);
  } catch (err) {
    throw new UsageError(errorMessage(err), { cause: err });
  }
}

function valueFor(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function pairArg(text: string): Attr {
  const eq = text.indexOf("=");
  if (eq < 1) {
    throw new UsageError(`Expected key=value, got "${text}"`);
  }
  return attr.string(text.slice(0, eq), text.slice(eq + 1));
}

/** Parse arguments that follow the program name. */
export function parseArgs(argv: readonly string[]): CliCommand {
  const options: LoggerOption[] = [];
  const positional: string[] = [];
  let color: ColorMode | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--level":
        options.push(withLevel(levelArg(valueFor(arg, argv[++i]))));
        break;
      case "--prefix":
        options.push(withPrefix(valueFor(arg, argv[++i])));
        break;
      case "--time-layout":
        options.push(withTimeLayout(resolveLayout(valueFor(arg, argv[++i]))));
        break;
      case "--color":
        color = "always";
        break;
      case "--no-color":
        color = "never";
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--":
        positional.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [level, message, ...pairs] = positional;
  if (level === undefined || message === undefined) {
    throw new UsageError("Expected a level and a message");
  }

  return {
    kind: "log",
    level: levelArg(level),
    message,
    attrs: pairs.map(pairArg),
    options,
    color,
  };
}
