/**
 * Bounded FIFO used as the handoff between the chunk scheduler and the session.
 * offer() never blocks; a full queue is reported to the caller.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  readonly capacity: number;

  constructor(capacity: number) {
    if (!(capacity > 0)) {
      throw new Error(`Queue capacity must be positive (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  /**
   * @returns false when the queue is full
   */
  offer(item: T): boolean {
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  poll(): T | undefined {
    return this.items.shift();
  }

  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Remove everything, oldest first
   */
  clear(): T[] {
    return this.items.splice(0, this.items.length);
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }
}
