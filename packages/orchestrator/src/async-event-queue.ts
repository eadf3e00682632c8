/**
 * Bridges push-based callbacks (coordinator outcome events) into a pull-based
 * async iterator. No polling; uses promise-based signaling.
 */
export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((value: IteratorResult<T>) => void) | null = null;
  private done = false;

  /** Producer: enqueue an item (or resolve a waiting consumer). */
  push(item: T): void {
    if (this.done) return;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  /** Signal end of stream. Buffered items are still delivered. */
  complete(): void {
    if (this.done) return;
    this.done = true;
    this.settleWaiting();
  }

  /** True once completed or abandoned by the consumer. */
  get closed(): boolean {
    return this.done;
  }

  /** Items pushed but not yet consumed. */
  get pendingCount(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.buffer.length > 0) {
          const [item] = this.buffer.splice(0, 1);
          if (item !== undefined) {
            return Promise.resolve({ value: item, done: false });
          }
        }
        if (this.done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiting = resolve;
        });
      },

      return: (): Promise<IteratorResult<T>> => {
        this.done = true;
        this.buffer.length = 0;
        this.settleWaiting();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private settleWaiting(): void {
    if (!this.waiting) return;
    const resolve = this.waiting;
    this.waiting = null;
    resolve({ value: undefined, done: true });
  }
}
