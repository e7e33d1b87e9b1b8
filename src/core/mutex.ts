/**
 * FIFO async mutex.
 *
 * Stage handlers run concurrently. Plugins that keep mutable state shared
 * across calls (counters, caches) guard each such resource with its own
 * Mutex; the runtime itself shares nothing mutable between calls.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of callers holding or waiting for the lock. */
  get waiting(): number {
    return this.pending;
  }

  get locked(): boolean {
    return this.pending > 0;
  }

  /**
   * Run `fn` once every earlier caller has finished. The lock is released
   * whether `fn` resolves or throws; its outcome is returned unchanged.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}
