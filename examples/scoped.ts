/**
 * Example: carrying a logger with a per-request scope
 *
 * Usage: npx tsx examples/scoped.ts
 */

import { bindToScope, createLoggerFromEnv, Duration, loggerFromScope } from "../src/index.js";

interface RequestScope {
  requestId: string;
  startedAt: Date;
}

function handle(scope: RequestScope): void {
  const log = loggerFromScope(scope);
  log.info("Handling request", "path", "/users");
  log.info("Done", "elapsed", Duration.between(scope.startedAt));
}

const base = createLoggerFromEnv().prefixed("http");

for (const requestId of ["req-1", "req-2"]) {
  const scope = { requestId, startedAt: new Date() };
  handle(bindToScope(scope, base.with("request", requestId)));
}

// Nothing bound: falls back to a default stderr logger.
loggerFromScope({}).warn("No logger bound to this scope");
