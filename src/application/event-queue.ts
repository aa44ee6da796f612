/** Distinguished item that tells the consumer to exit. */
export const STOP_SIGNAL: unique symbol = Symbol('stop');

export type QueueItem<T> = T | typeof STOP_SIGNAL;

/**
 * Unbounded FIFO hand-off channel: many producers, one consumer.
 *
 * `push()` never waits. `pull()` resolves with the oldest item, waiting
 * for the next push when the queue is empty. Producers and the consumer
 * share one event loop, so the order items are pushed in is the order
 * they are pulled without any locking.
 */
export class EventQueue<T> {
  // Boxed so a pushed `undefined` is not mistaken for an empty queue.
  private items: { readonly item: QueueItem<T> }[] = [];
  private waiters: ((item: QueueItem<T>) => void)[] = [];

  push(item: T): void {
    this.enqueue(item);
  }

  pushAll(items: Iterable<T>): void {
    for (const item of items) this.enqueue(item);
  }

  /** Places the stop signal behind everything already queued. */
  pushStop(): void {
    this.enqueue(STOP_SIGNAL);
  }

  pull(): Promise<QueueItem<T>> {
    const next = this.items.shift();
    if (next) return Promise.resolve(next.item);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Items (events and stop signals) waiting to be pulled. */
  get size(): number {
    return this.items.length;
  }

  private enqueue(item: QueueItem<T>): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push({ item });
  }
}
