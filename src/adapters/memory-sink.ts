import type { Sink } from "../interfaces/sink.js";

const decoder = new TextDecoder();

/**
 * In-memory sink for testing. Keeps every chunk exactly as written.
 */
export class MemorySink implements Sink {
  readonly chunks: Uint8Array[] = [];

  write(chunk: Uint8Array): boolean {
    // Copy so a caller reusing its buffer cannot rewrite history
    this.chunks.push(chunk.slice());
    return true;
  }

  /** Everything written so far, decoded. */
  text(): string {
    return this.chunks.map((chunk) => decoder.decode(chunk)).join("");
  }

  /** Complete lines written so far, without their newlines. */
  lines(): string[] {
    const text = this.text();
    if (text === "") return [];
    return text.replace(/\n$/, "").split("\n");
  }

  /** For testing: clear all stored output. */
  clear(): void {
    this.chunks.length = 0;
  }
}

/** Sink whose every write throws. */
export class FailingSink implements Sink {
  attempts = 0;

  constructor(private readonly reason = "sink closed") {}

  write(): never {
    this.attempts++;
    throw new Error(this.reason);
  }
}
