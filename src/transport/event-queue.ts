/**
 * Push/pull queue bridging callback-style producers to async iteration.
 *
 * Producers call enqueue() from event handlers; a single consumer pulls with
 * next() or `for await`. Items that arrive before they are requested are
 * buffered, and requests that arrive first wait for the next item.
 */

import { TimeoutError } from '../exceptions';

interface PendingResolver<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

export class EventQueue<T> implements AsyncIterableIterator<T> {
  private queue: T[] = [];
  private pendingResolvers: PendingResolver<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  /**
   * Add an item to the queue.
   *
   * If a consumer is waiting, resolve the oldest one immediately; otherwise
   * buffer the item. Items pushed after close() are dropped.
   */
  enqueue(item: T): void {
    if (this.closed) {
      return;
    }

    const pending = this.pendingResolvers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.resolve({ value: item, done: false });
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Get the next item.
   *
   * Buffered items are returned first, then a recorded failure is thrown
   * once, then the queue reports done.
   *
   * @param timeoutMs - Maximum time to wait; waits indefinitely when omitted
   * @throws {TimeoutError} If timeout expires before an item arrives
   */
  async next(timeoutMs?: number): Promise<IteratorResult<T, undefined>> {
    const buffered = this.queue.shift();
    if (buffered !== undefined) {
      return { value: buffered, done: false };
    }

    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      throw error;
    }

    if (this.closed) {
      return { value: undefined, done: true };
    }

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      const pending: PendingResolver<T> = { resolve, reject };

      if (timeoutMs !== undefined) {
        pending.timeoutId = setTimeout(() => {
          const index = this.pendingResolvers.indexOf(pending);
          if (index !== -1) {
            this.pendingResolvers.splice(index, 1);
            reject(new TimeoutError(`Nothing received within ${timeoutMs}ms timeout`));
          }
        }, timeoutMs);
      }

      this.pendingResolvers.push(pending);
    });
  }

  /**
   * Stop the queue: drop buffered items and end every waiting request.
   */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.queue = [];
    this.close();
    return { value: undefined, done: true };
  }

  /**
   * Mark the end of input. Buffered items stay available.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const pending of this.pendingResolvers) {
      clearTimeout(pending.timeoutId);
      pending.resolve({ value: undefined, done: true });
    }
    this.pendingResolvers = [];
  }

  /**
   * End the queue with an error, delivered to the consumer after any
   * buffered items.
   */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }

    const pending = this.pendingResolvers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.reject(error);
    } else {
      this.failure = { error };
    }
    this.close();
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  /**
   * Number of buffered items.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Number of consumers waiting for an item.
   */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
