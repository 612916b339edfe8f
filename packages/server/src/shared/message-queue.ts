export interface QueuedMessage {
  /** Serialized payload, ready for the wire. */
  readonly data: string;
  readonly enqueuedAt: number;
}

/**
 * Unbounded FIFO backlog of messages waiting for a live connection.
 * A message that fails to go out is put back at the front so later messages
 * never overtake it.
 */
export class RetryQueue {
  private items: QueuedMessage[] = [];

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(message: QueuedMessage): void {
    this.items.push(message);
  }

  /** Reinserts messages at the head, keeping their relative order. */
  requeueFront(messages: readonly QueuedMessage[]): void {
    if (messages.length === 0) {
      return;
    }
    this.items = [...messages, ...this.items];
  }

  shift(): QueuedMessage | undefined {
    return this.items.shift();
  }

  /** Removes every message matching `predicate`; returns what was removed. */
  discard(predicate: (message: QueuedMessage) => boolean): QueuedMessage[] {
    const removed: QueuedMessage[] = [];
    this.items = this.items.filter((message) => {
      if (predicate(message)) {
        removed.push(message);
        return false;
      }
      return true;
    });
    return removed;
  }

  clear(): QueuedMessage[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  toArray(): QueuedMessage[] {
    return [...this.items];
  }
}

type Taker<T> = (item: T | null) => void;

type Offerer<T> = {
  item: T;
  resolve: (accepted: boolean) => void;
  timeoutHandle: ReturnType<typeof setTimeout>;
};

/**
 * Bounded FIFO handed from producers (`offer`) to a single consumer (`take`).
 * A producer facing a full queue waits up to its timeout for space.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private takers: Taker<T>[] = [];
  private offerers: Offerer<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer (got ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Non-blocking insert; false when the queue is full or closed. */
  tryOffer(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Resolves true once accepted, false on timeout or close. When a waiting
   * offer times out, every offer queued behind it is refused too, so items
   * never overtake an earlier one that was turned away.
   */
  offer(item: T, timeoutMs: number): Promise<boolean> {
    if (this.tryOffer(item)) {
      return Promise.resolve(true);
    }
    if (this.closed || timeoutMs <= 0) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      const offerer: Offerer<T> = {
        item,
        resolve,
        timeoutHandle: setTimeout(() => this.expireFrom(offerer), timeoutMs),
      };
      this.offerers.push(offerer);
    });
  }

  /** Resolves with the next item, or null once the queue is closed. */
  take(): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      this.admitWaitingOfferer();
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.takers.push(resolve);
    });
  }

  /** Closes the queue and returns everything not yet taken, oldest first. */
  close(): T[] {
    if (this.closed) {
      return [];
    }
    this.closed = true;
    const remaining = [...this.items];
    this.items = [];
    for (const offerer of this.offerers) {
      clearTimeout(offerer.timeoutHandle);
      offerer.resolve(false);
    }
    this.offerers = [];
    for (const taker of this.takers) {
      taker(null);
    }
    this.takers = [];
    return remaining;
  }

  private expireFrom(offerer: Offerer<T>): void {
    const index = this.offerers.indexOf(offerer);
    if (index === -1) {
      return;
    }
    const expired = this.offerers.splice(index);
    for (const waiting of expired) {
      clearTimeout(waiting.timeoutHandle);
      waiting.resolve(false);
    }
  }

  private admitWaitingOfferer(): void {
    const offerer = this.offerers.shift();
    if (!offerer) {
      return;
    }
    clearTimeout(offerer.timeoutHandle);
    this.items.push(offerer.item);
    offerer.resolve(true);
  }
}
