/**
 * Bounded multi-consumer queue between the enumeration producer and the workers.
 *
 * `pop` hands each item to exactly one caller. Waiting producers and consumers
 * are woken in FIFO order.
 */
export class JobQueue<T> {
  private items: T[] = [];
  private capacity: number;
  private closed = false;
  private waitingConsumers: Array<(item: T | undefined) => void> = [];
  private waitingProducers: Array<(accepted: boolean) => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Enqueue an item, waiting while the queue is full.
   * Resolves to false if the queue was closed before the item was accepted.
   */
  async push(item: T): Promise<boolean> {
    while (!this.closed) {
      const consumer = this.waitingConsumers.shift();
      if (consumer) {
        consumer(item);
        return true;
      }

      if (this.items.length < this.capacity) {
        this.items.push(item);
        return true;
      }

      const accepted = await new Promise<boolean>((resolve) => {
        this.waitingProducers.push(resolve);
      });
      if (!accepted) {
        return false;
      }
    }
    return false;
  }

  /**
   * Take the next item. Resolves to undefined once the queue is closed and empty.
   */
  async pop(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.waitingProducers.shift()?.(true);
      return item;
    }

    if (this.closed) {
      return undefined;
    }

    return new Promise<T | undefined>((resolve) => {
      this.waitingConsumers.push(resolve);
    });
  }

  /**
   * Stop accepting items. With `discard`, buffered items are dropped too and
   * are never handed to a consumer.
   */
  close(options: { discard?: boolean } = {}): T[] {
    this.closed = true;
    const dropped = options.discard ? this.items.splice(0) : [];

    for (const producer of this.waitingProducers.splice(0)) {
      producer(false);
    }
    if (this.items.length === 0) {
      for (const consumer of this.waitingConsumers.splice(0)) {
        consumer(undefined);
      }
    }
    return dropped;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get waitingConsumerCount(): number {
    return this.waitingConsumers.length;
  }
}
