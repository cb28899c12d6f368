/**
 * Bounded single-consumer queue.
 *
 * `offer()` never waits: when the mailbox is full the item is refused and
 * the caller moves on. The consumer alternates between `poll()` and
 * `wait()`.
 */
export class Mailbox<T> {
  private readonly items: T[] = [];
  private waiter: (() => void) | null = null;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Mailbox capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Enqueues `item`, or returns `false` if the mailbox is full. */
  offer(item: T): boolean {
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    this.wake();
    return true;
  }

  poll(): T | undefined {
    return this.items.shift();
  }

  get size(): number {
    return this.items.length;
  }

  /** Resolves once an item is available or `wake()` is called. */
  wait(): Promise<void> {
    if (this.items.length > 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
