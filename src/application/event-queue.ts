import { QueueClosedError } from '../domain/index.js';

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Bounded FIFO handoff between the bridge (producer) and the engine
 * forwarder (consumer).
 *
 * `push()` waits while the queue is full instead of dropping, which is
 * where backpressure reaches the bridge. `take()` waits while it is empty.
 * After `close()`, queued items still drain; further pushes reject.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly items: { value: T }[] = [];
  private readonly takers: Waiter<T>[] = [];
  private readonly pushers: (() => void)[] = [];
  private readonly capacity: number;
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.pushers.push(resolve));
    }

    if (this.closed) {
      throw new QueueClosedError();
    }

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value: item });
      return;
    }

    this.items.push({ value: item });
  }

  take(): Promise<IteratorResult<T, undefined>> {
    const head = this.items.shift();
    if (head) {
      this.pushers.shift()?.();
      return Promise.resolve({ done: false, value: head.value });
    }

    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => this.takers.push(resolve));
  }

  /** Stops accepting items. Pending takers finish; waiting pushers reject. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker({ done: true, value: undefined });
    }
    for (const pusher of this.pushers.splice(0)) {
      pusher();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.take() };
  }
}
