/**
 * Work Queue
 * FIFO shared by racing producers and consumers of one crawl
 */

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  cleanup: () => void;
}

/**
 * Async FIFO queue
 *
 * - push() waits while the queue is full (capacity 0 = unbounded)
 * - tryShift() never waits
 * - shift(signal) waits for the next item or for the signal, whichever comes first
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private readonly consumers: Waiter<T>[] = [];
  private readonly producers: Array<() => void> = [];

  constructor(readonly capacity: number = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.capacity > 0 && this.items.length >= this.capacity;
  }

  /**
   * Add an item, waiting for space when the queue is full
   */
  async push(item: T): Promise<void> {
    // Hand over straight to a waiting consumer
    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.cleanup();
      consumer.resolve(item);
      return;
    }

    while (this.isFull()) {
      await new Promise<void>((resolve) => this.producers.push(resolve));
    }
    this.items.push(item);

    // A consumer may have started waiting while we waited for space
    this.handOff();
  }

  /**
   * Take the next item without waiting
   */
  tryShift(): T | undefined {
    if (this.items.length === 0) {
      return undefined;
    }
    const item = this.items.shift();
    this.releaseProducer();
    return item;
  }

  /**
   * Wait for the next item
   *
   * @returns The item, or undefined once the signal is aborted
   */
  shift(signal: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.tryShift());
    }
    if (signal.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = () => {
        const index = this.consumers.indexOf(waiter);
        if (index !== -1) {
          this.consumers.splice(index, 1);
        }
        resolve(undefined);
      };
      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => signal.removeEventListener('abort', onAbort),
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.consumers.push(waiter);
    });
  }

  private handOff(): void {
    while (this.items.length > 0 && this.consumers.length > 0) {
      const consumer = this.consumers.shift();
      const item = this.items.shift();
      if (consumer === undefined || item === undefined) {
        break;
      }
      consumer.cleanup();
      consumer.resolve(item);
      this.releaseProducer();
    }
  }

  private releaseProducer(): void {
    const producer = this.producers.shift();
    producer?.();
  }
}
