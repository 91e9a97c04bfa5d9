export const DEFAULT_QUEUE_CAPACITY = 256;

export type SerialDispatchQueueOptions<T> = {
  consume: (item: T) => Promise<void>;
  onError: (err: unknown, item: T) => void;
  capacity?: number;
};

/**
 * Bounded FIFO drained by a single consumer, one item at a time. Items are
 * handled in arrival order and never concurrently.
 */
export class SerialDispatchQueue<T> {
  private readonly items: T[] = [];
  private readonly capacity: number;
  private running: Promise<void> | null = null;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly options: SerialDispatchQueueOptions<T>) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_QUEUE_CAPACITY);
  }

  /** Returns false when the item was rejected (queue full or closed). */
  push(item: T): boolean {
    if (this.closed || this.items.length >= this.capacity) return false;

    this.items.push(item);
    if (!this.running) {
      this.running = this.drain();
    }
    return true;
  }

  get pending(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  onIdle(): Promise<void> {
    if (!this.running) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stops accepting items, drops queued ones and waits for the running one. */
  async close(): Promise<void> {
    this.closed = true;
    this.items.length = 0;
    await this.onIdle();
  }

  private async drain(): Promise<void> {
    let item = this.items.shift();
    while (item !== undefined) {
      try {
        await this.options.consume(item);
      } catch (err) {
        this.options.onError(err, item);
      }
      item = this.items.shift();
    }

    this.running = null;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
