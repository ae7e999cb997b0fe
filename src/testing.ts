/**
 * Public test utilities, exported from the `"linelog/testing"` entry point.
 * Consumers can import these helpers to assert on what their code logs.
 */
export { FailingSink, MemorySink } from "./adapters/memory-sink.js";
