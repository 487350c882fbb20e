/**
 * Ordered handoff queue between the stream pump and its consumer.
 *
 * The pump publishes events as it produces them. This queue buffers events
 * nobody is waiting for yet and provides a Promise-based interface for
 * consuming them in FIFO order, with optional timeout support.
 */

import { HandoffTimeoutError, QueueClosedError } from '../exceptions';

interface PendingResolver<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout> | null;
}

/**
 * FIFO queue with waiting consumers.
 *
 * - Buffers items that arrive before being requested
 * - Queues requests that wait for future items
 * - Never drops or reorders items
 */
export class HandoffQueue<T> {
  private queue: T[] = [];
  private pendingResolvers: PendingResolver<T>[] = [];
  private closed = false;

  /**
   * Add an item to the queue.
   *
   * If consumers are waiting, the oldest one receives the item immediately.
   * Otherwise it is buffered. Items enqueued after {@link clear} are ignored.
   */
  enqueue(item: T): void {
    if (this.closed) {
      return;
    }

    const pending = this.pendingResolvers.shift();
    if (pending) {
      if (pending.timeoutId !== null) {
        clearTimeout(pending.timeoutId);
      }
      pending.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Get the next item from the queue.
   *
   * @param timeoutMs - Maximum time to wait; waits indefinitely when omitted
   * @throws {HandoffTimeoutError} If the timeout expires first
   * @throws {QueueClosedError} If the queue is cleared while waiting
   */
  async dequeue(timeoutMs?: number): Promise<T> {
    if (this.queue.length > 0) {
      return this.queue.shift()!;
    }
    if (this.closed) {
      throw new QueueClosedError('Handoff queue is closed');
    }

    return new Promise<T>((resolve, reject) => {
      const pending: PendingResolver<T> = { resolve, reject, timeoutId: null };

      if (timeoutMs !== undefined) {
        pending.timeoutId = setTimeout(() => {
          const index = this.pendingResolvers.indexOf(pending);
          if (index !== -1) {
            this.pendingResolvers.splice(index, 1);
            reject(new HandoffTimeoutError(`No item received within ${timeoutMs}ms timeout`));
          }
        }, timeoutMs);
      }

      this.pendingResolvers.push(pending);
    });
  }

  /**
   * Close the queue and drop buffered items.
   *
   * @param reason - Reason passed to waiting consumers (default: "Queue closed")
   */
  clear(reason: string = 'Queue closed'): void {
    this.queue = [];
    this.close(reason);
  }

  /**
   * Stop accepting items. Buffered items can still be dequeued; once they are
   * gone, {@link dequeue} throws {@link QueueClosedError}.
   */
  close(reason: string = 'Queue closed'): void {
    this.closed = true;

    // Waiters only exist while the buffer is empty.
    for (const pending of this.pendingResolvers) {
      if (pending.timeoutId !== null) {
        clearTimeout(pending.timeoutId);
      }
      pending.reject(new QueueClosedError(reason));
    }

    this.pendingResolvers = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Get the number of buffered items.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Get the number of pending consumers waiting for items.
   */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
