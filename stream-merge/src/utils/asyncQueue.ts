// Async queue used as the junction's mailbox
// Follows idiomatic TypeScript: simple class with private queue, Promise-based async methods

import { QueueClosedError } from '../errors';

interface Waiter<T> {
  readonly resolve: (item: T) => void;
  readonly reject: (error: Error) => void;
}

/**
 * Unbounded FIFO queue with async takers
 * Implements AsyncIterable for consumption via for-await-of
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiting: Array<Waiter<T>> = [];
  private closed = false;

  /**
   * Offer an item to the queue (non-blocking)
   */
  offer(item: T): void {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      // Someone is waiting for an item - give it to them immediately
      waiter.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Take an item from the queue
   * Returns immediately if an item is available, otherwise waits for one
   */
  async take(): Promise<T> {
    if (this.queue.length > 0) {
      const item = this.queue.shift();
      if (item === undefined) {
        throw new Error('Unexpected: queue item is undefined');
      }
      return item;
    }

    if (this.closed) {
      throw new QueueClosedError('Queue is closed and empty');
    }

    return new Promise<T>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  /**
   * Async iterator implementation for for-await-of support
   * Yields buffered items, then stops once the queue is closed and empty
   */
  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (this.queue.length > 0 || !this.closed) {
      try {
        yield await this.take();
      } catch (err) {
        if (err instanceof QueueClosedError) {
          return;
        }
        throw err;
      }
    }
  }

  /**
   * Get the current size of the queue
   */
  size(): number {
    return this.queue.length;
  }

  /**
   * Close the queue
   * After closing, offer() throws; pending take() calls reject with QueueClosedError
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const error = new QueueClosedError('Queue is closed and empty');
    for (const waiter of this.waiting) {
      waiter.reject(error);
    }
    this.waiting = [];
  }

  /**
   * Remove and return every queued item
   */
  drain(): T[] {
    const items = this.queue;
    this.queue = [];
    return items;
  }

  /**
   * Check if the queue is closed
   */
  isClosed(): boolean {
    return this.closed;
  }
}
