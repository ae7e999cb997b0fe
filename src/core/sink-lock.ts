/**
 * Exclusive access to a sink, shared by a logger and everything derived
 * from it.
 *
 * Critical sections are synchronous, so the lock can only ever be seen
 * held by code running inside one: a sink that logs from within its own
 * `write`. Such nested sections are queued and run, in order, as soon as
 * the current holder finishes, so lines never interleave.
 */
export class SinkLock {
  private held = false;
  private readonly pending: Array<() => void> = [];

  run(critical: () => void): void {
    if (this.held) {
      this.pending.push(critical);
      return;
    }

    this.held = true;
    try {
      critical();
      for (let next = this.pending.shift(); next; next = this.pending.shift()) {
        next();
      }
    } finally {
      this.held = false;
    }
  }

  get locked(): boolean {
    return this.held;
  }

  /** Sections waiting for the current holder. */
  get queued(): number {
    return this.pending.length;
  }
}
