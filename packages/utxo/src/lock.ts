// packages/utxo/src/lock.ts

/**
 * Exclusive guard around a synchronous critical section.
 *
 * Node runs one callback at a time, so a synchronous section is never
 * interleaved with another caller. A re-entrant call throws. Work passed to
 * `run` must not be async.
 */
export class ExclusiveLock {
  private held = false;

  constructor(private readonly label: string) {}

  get locked(): boolean {
    return this.held;
  }

  run<T>(fn: () => T): T {
    if (this.held) throw new Error(`${this.label}: lock already held (re-entrant call)`);
    this.held = true;
    try {
      const result = fn();
      if (result instanceof Promise) {
        // the section is refused; its rejection is not reported twice
        result.catch(() => undefined);
        throw new Error(`${this.label}: critical section must be synchronous`);
      }
      return result;
    } finally {
      this.held = false;
    }
  }
}
