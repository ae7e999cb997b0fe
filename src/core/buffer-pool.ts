/**
 * Reusable byte buffers for rendering log lines.
 *
 * Building a line is the hot path of an enabled logger, so lines are
 * encoded straight into pooled, growable buffers instead of allocating
 * a fresh string and byte array per call.
 * @module
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const DEFAULT_CAPACITY = 256;

/** Buffers that grew past this many bytes are dropped instead of pooled. */
export const MAX_POOLED_CAPACITY = 64 * 1024;

/** Growable UTF-8 byte buffer. */
export class LineBuffer {
  private bytes: Uint8Array;
  private length = 0;

  constructor(initialCapacity = DEFAULT_CAPACITY) {
    this.bytes = new Uint8Array(initialCapacity);
  }

  get capacity(): number {
    return this.bytes.byteLength;
  }

  get size(): number {
    return this.length;
  }

  reset(): void {
    this.length = 0;
  }

  writeString(text: string): void {
    // A UTF-16 code unit never encodes to more than 3 bytes.
    this.ensure(text.length * 3);
    const { written } = encoder.encodeInto(text, this.bytes.subarray(this.length));
    this.length += written;
  }

  writeByte(byte: number): void {
    this.ensure(1);
    this.bytes[this.length++] = byte;
  }

  /** Copy of the written bytes; the buffer itself goes back to the pool. */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }

  toString(): string {
    return decoder.decode(this.bytes.subarray(0, this.length));
  }

  private ensure(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.bytes.byteLength) return;

    const grown = new Uint8Array(Math.max(this.bytes.byteLength * 2, needed));
    grown.set(this.bytes.subarray(0, this.length));
    this.bytes = grown;
  }
}

/**
 * Free list of {@link LineBuffer}s shared by every logger in the process.
 *
 * Acquire and release are synchronous and never yield, so the free list
 * needs no lock of its own.
 */
export class BufferPool {
  private readonly free: LineBuffer[] = [];

  constructor(readonly maxRetained = 16) {
    if (!Number.isInteger(maxRetained) || maxRetained < 0) {
      throw new RangeError("BufferPool maxRetained must be a non-negative integer");
    }
  }

  /** An empty buffer, reused when one is free. */
  acquire(): LineBuffer {
    const buf = this.free.pop();
    if (buf === undefined) return new LineBuffer();
    buf.reset();
    return buf;
  }

  release(buf: LineBuffer): void {
    // One oversized line must not keep its memory alive for every later call.
    if (buf.capacity > MAX_POOLED_CAPACITY) return;
    if (this.free.length >= this.maxRetained) return;
    buf.reset();
    this.free.push(buf);
  }

  /** Number of buffers waiting to be reused. */
  get available(): number {
    return this.free.length;
  }
}

export const defaultPool = new BufferPool();
