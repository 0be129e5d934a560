/**
 * Unbounded-by-default FIFO queue with a blocking (awaitable) dequeue for a single consumer
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];

  constructor(private readonly maxSize: number = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.items.length;
  }

  /**
   * Enqueue without blocking. When the queue is full the oldest item is dropped and returned.
   */
  push(item: T): T | undefined {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return undefined;
    }

    this.items.push(item);
    if (this.items.length > this.maxSize) {
      return this.items.shift();
    }
    return undefined;
  }

  /**
   * Enqueue ignoring the size bound
   */
  pushUnbounded(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Resolves with the next item, waiting for one when the queue is empty
   */
  shift(): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) {
        return Promise.resolve(item);
      }
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Remove and return everything still queued
   */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}
