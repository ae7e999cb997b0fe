/**
 * Example: a cooking session at debug level
 *
 * Shows every level, typed attributes and loose key/value pairs.
 *
 * Usage: npm run demo
 */

import { setTimeout as sleep } from "node:timers/promises";
import { attr, createLogger, Duration, Level, withLevel } from "../src/index.js";

const pause = () => sleep(300 + Math.random() * 700);

const logger = createLogger(process.stderr, withLevel(Level.Debug));

logger.debug(
  "Searing steak",
  attr.string("cook", "rare"),
  attr.int("temp", 42),
  attr.duration("time", Duration.minutes(2)),
);
await pause();

logger.info("Choosing wine pairing", attr.strings("choices", ["merlot", "malbec", "rioja"]));
await pause();

logger.error("No malbec left!");
await pause();

logger.warn("Falling back to second choice", "fallback", "rioja");

const kitchen = logger.prefixed("kitchen").with("table", 4);
kitchen.info("Eating steak", attr.string("cut", "sirloin"), attr.bool("enjoying", true));
kitchen.info("Response from oven API", "status", 200, "duration", Duration.ms(57));
