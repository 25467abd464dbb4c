/**
 * Bounded FIFO channel
 *
 * A single-consumer queue with a non-blocking producer side. Producers call
 * `tryPush`, which refuses rather than waits when the buffer is full. The
 * consumer awaits `receive()` or iterates with `for await`.
 *
 * Closing is idempotent and carries a reason. Items already buffered are
 * still delivered; after the last one the consumer sees `done`.
 */

export class Channel<T, R = string> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private reason: R | null = null;
  private readonly resolveClosed: (reason: R) => void;

  /** Resolves with the close reason once `close()` has been called. */
  readonly closed: Promise<R>;

  constructor(readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity > 0)) {
      throw new RangeError(`Channel capacity must be positive, got ${capacity}`);
    }
    let resolveClosed: (reason: R) => void = () => undefined;
    this.closed = new Promise<R>((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.reason !== null;
  }

  get closeReason(): R | null {
    return this.reason;
  }

  /**
   * Enqueue without waiting. Returns false when the channel is full or closed.
   */
  tryPush(item: T): boolean {
    if (this.reason !== null) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(item);
    return true;
  }

  tryReceive(): T | undefined {
    return this.buffer.shift();
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.reason !== null) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Returns true for the call that actually closed the channel.
   */
  close(reason: R): boolean {
    if (this.reason !== null) return false;
    this.reason = reason;

    // Waiters only exist while the buffer is empty
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.resolveClosed(reason);
    return true;
  }

  /** Drop everything still buffered. */
  clear(): number {
    return this.buffer.splice(0).length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
