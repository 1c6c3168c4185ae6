/**
 * Single-consumer async channel. Producers push without waiting; the consumer
 * iterates with for-await until the channel is closed or failed.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private waitingReject: ((error: Error) => void) | null = null;
  private closed: boolean = false;
  private failure: Error | null = null;

  push(item: T): void {
    if (this.closed) {
      return;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.clearWaiter();
      resolve({ value: item, done: false });
      return;
    }

    this.items.push(item);
  }

  /**
   * End the stream; buffered items are still delivered
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.clearWaiter();
      resolve({ value: undefined, done: true });
    }
  }

  /**
   * Break the stream; the consumer sees the error after the buffered items
   */
  fail(error: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.failure = error;

    if (this.waitingReject) {
      const reject = this.waitingReject;
      this.clearWaiter();
      reject(error);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private clearWaiter(): void {
    this.waiting = null;
    this.waitingReject = null;
  }

  private next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiting = resolve;
      this.waitingReject = reject;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        this.items = [];
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
