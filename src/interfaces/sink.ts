/**
 * Byte-stream destination for rendered log lines.
 * `process.stdout`, `process.stderr` and any Node.js `Writable` satisfy it.
 * @module
 */

export interface Sink {
  write(chunk: Uint8Array): unknown;
}

/**
 * Sink that drops everything. A logger built on it short-circuits before
 * doing any formatting work.
 */
export const discard: Sink = Object.freeze({
  write: () => true,
});
