/**
 * FIFO queue with an atomic drain.
 *
 * Backs both the transport outbox and the pending ICE candidate buffer:
 * items come out of `drain()` in exactly the order they were enqueued,
 * and a drained item is never returned twice.
 */
export class OrderedQueue<T> implements Iterable<T> {
  private items: T[] = [];

  constructor(initial: Iterable<T> = []) {
    for (const item of initial) {
      this.items.push(item);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item.
   */
  dequeue(): T | undefined {
    return this.items.shift();
  }

  /**
   * Remove and return every queued item, oldest first.
   *
   * Items enqueued while the caller walks the returned array stay in the
   * queue for the next drain.
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear(): void {
    this.items = [];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
