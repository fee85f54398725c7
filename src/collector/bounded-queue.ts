/**
 * Bounded single-producer / multi-consumer hand-off queue.
 *
 * `push` waits while the queue holds `capacity` items; `pull` waits while it
 * is empty. Closing wakes every waiter: producers get `false`, consumers
 * drain what is left and then receive `{ done: true }`.
 */

export type QueueResult<T> = { done: false; value: T } | { done: true };

export class BoundedQueue<T> {
  private readonly capacity: number;
  private readonly items: Array<{ value: T }> = [];
  private readonly pullWaiters: Array<(result: QueueResult<T>) => void> = [];
  private readonly pushWaiters: Array<() => void> = [];
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Enqueues an item, waiting for space when full.
   * @returns false when the queue was closed before the item could be enqueued
   */
  async push(item: T): Promise<boolean> {
    if (this.closed) return false;

    const waiting = this.pullWaiters.shift();
    if (waiting) {
      waiting({ done: false, value: item });
      return true;
    }

    while (this.items.length >= this.capacity) {
      await new Promise<void>(resolve => {
        this.pushWaiters.push(resolve);
      });
      if (this.closed) return false;
    }

    this.items.push({ value: item });
    return true;
  }

  /** Takes the next item, waiting while the queue is empty and open. */
  pull(): Promise<QueueResult<T>> {
    const entry = this.items.shift();
    if (entry) {
      this.pushWaiters.shift()?.();
      return Promise.resolve({ done: false, value: entry.value });
    }

    if (this.closed) {
      return Promise.resolve({ done: true });
    }

    return new Promise(resolve => {
      this.pullWaiters.push(resolve);
    });
  }

  /** Stops accepting items. Queued items can still be pulled. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.pullWaiters.splice(0)) {
      waiter({ done: true });
    }
    for (const waiter of this.pushWaiters.splice(0)) {
      waiter();
    }
  }

  /** Closes the queue and discards everything still queued. */
  abandon(): void {
    this.items.length = 0;
    this.close();
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
