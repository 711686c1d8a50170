/**
 * Bounded FIFO with awaitable reads. put() never blocks: when the queue is
 * full the new item is dropped.
 */
export class AsyncEventQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private dropped = 0;
  private closed = false;

  constructor(readonly maxSize: number) {}

  put(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    if (this.items.length >= this.maxSize) {
      this.dropped++;
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Next item, or null after timeoutMs. Without a timeout, waits until an
   * item arrives or the queue is closed. A closed queue answers null at once.
   */
  get(timeoutMs?: number): Promise<T | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const waiter = (value: T | null) => {
        if (timer) clearTimeout(timer);
        resolve(value);
      };
      this.waiters.push(waiter);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs);
      }
    });
  }

  /**
   * Wake every pending reader with null and drop buffered items
   */
  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    this.items = [];
    waiters.forEach((waiter) => waiter(null));
  }

  /** Accept items again after close() */
  reopen(): void {
    this.closed = false;
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }
}
