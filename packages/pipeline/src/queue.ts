import { ConfigError, QueueClosedError } from '@logsink/shared';

export type DequeueResult<T> = { closed: false; item: T } | { closed: true };

interface PendingProducer<T> {
  item: T;
  resolve: () => void;
  reject: (reason: Error) => void;
}

/**
 * Bounded multi-producer/multi-consumer FIFO queue.
 *
 * Producers wait in `enqueue` while `capacity` items are buffered and are
 * admitted in the order they started waiting. A capacity of 0 makes every
 * `enqueue` wait for a consumer to take the item directly.
 *
 * After `close()` no further pushes are accepted; consumers keep draining
 * buffered items and then receive `{ closed: true }`.
 */
export class WorkQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly producers: PendingProducer<T>[] = [];
  private readonly consumers: Array<(result: DequeueResult<T>) => void> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new ConfigError(`Invalid queue capacity ${capacity} (expected a non-negative integer)`, 'capacity');
    }
  }

  /**
   * Push `item`, waiting for room when the queue is full.
   *
   * @throws QueueClosedError if the queue is closed before the item is accepted
   */
  enqueue(item: T): Promise<void> {
    if (this.isClosed) return Promise.reject(new QueueClosedError());
    if (this.offer(item)) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      this.producers.push({ item, resolve, reject });
    });
  }

  /**
   * Push `item` only if it can be accepted without waiting.
   *
   * @returns false when the queue is full
   * @throws QueueClosedError if the queue is closed
   */
  tryEnqueue(item: T): boolean {
    if (this.isClosed) throw new QueueClosedError();
    return this.offer(item);
  }

  /**
   * Take the oldest item, waiting while the queue is empty. Resolves with
   * `{ closed: true }` once the queue is closed and drained.
   */
  dequeue(): Promise<DequeueResult<T>> {
    const next = this.take();
    if (next) return Promise.resolve(next);
    if (this.isClosed) return Promise.resolve({ closed: true });

    return new Promise<DequeueResult<T>>((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /**
   * Stop accepting items. Producers still waiting for room are rejected with
   * QueueClosedError; idle consumers are released.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const producer of this.producers.splice(0)) {
      producer.reject(new QueueClosedError());
    }
    for (const consumer of this.consumers.splice(0)) {
      consumer({ closed: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.dequeue();
      if (result.closed) return;
      yield result.item;
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Items buffered and not yet taken by a consumer. */
  get size(): number {
    return this.buffer.length;
  }

  get pendingProducers(): number {
    return this.producers.length;
  }

  get waitingConsumers(): number {
    return this.consumers.length;
  }

  private offer(item: T): boolean {
    const consumer = this.consumers.shift();
    if (consumer) {
      consumer({ closed: false, item });
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return true;
    }
    return false;
  }

  private take(): DequeueResult<T> | undefined {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      const producer = this.producers.shift();
      if (producer) {
        this.buffer.push(producer.item);
        producer.resolve();
      }
      return { closed: false, item };
    }

    const producer = this.producers.shift();
    if (producer) {
      producer.resolve();
      return { closed: false, item: producer.item };
    }
    return undefined;
  }
}
