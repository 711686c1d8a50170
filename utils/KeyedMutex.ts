/**
 * Keyed Mutex
 * In-process mutual exclusion per key (e.g., "account:<uuid>").
 * Each key holds a promise chain; callers for different keys never wait on each other.
 */

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run fn while holding the lock for key.
   * Waiters are served in FIFO order. The lock is released even if fn throws.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
