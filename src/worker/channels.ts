/**
 * Unbounded FIFO with an awaitable take(), used to hand listen commands to the
 * capture worker.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private takers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  /**
   * Enqueue without blocking. Returns false once the queue is closed.
   */
  put(item: T): boolean {
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Resolves with the next item, or undefined when the queue is closed and empty.
   */
  take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
