// Source handle - wraps one producer and tracks its lifecycle

import { CleanupError } from '../errors';
import { SourceId, SourceLike } from '../types';

/**
 * Lifecycle of a producer as seen by its handle
 */
export type HandleStatus = 'Idle' | 'Pulling' | 'Closed' | 'Failed' | 'Cancelled';

/**
 * Wraps one producer stream. The iterator is opened lazily on the first pull,
 * so a producer cancelled before it ever ran is never instantiated.
 *
 * At most one pull is in flight at a time. cancel() is idempotent: every
 * call returns the same promise, and the producer receives its cancellation
 * (signal abort + iterator.return()) at most once.
 */
export class SourceHandle<A> {
  private readonly controller = new AbortController();
  private iterator: AsyncIterator<A> | null = null;
  private inFlight: Promise<IteratorResult<A>> | null = null;
  private cancelPromise: Promise<void> | null = null;
  private currentStatus: HandleStatus = 'Idle';

  constructor(
    public readonly id: SourceId,
    private readonly source: SourceLike<A>
  ) {}

  get status(): HandleStatus {
    return this.currentStatus;
  }

  /**
   * Signal handed to factory sources; aborted on cancellation
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  isCancelled(): boolean {
    return this.currentStatus === 'Cancelled';
  }

  isTerminal(): boolean {
    return this.currentStatus === 'Closed' || this.currentStatus === 'Failed';
  }

  /**
   * Request the next value from the producer
   */
  pull(): Promise<IteratorResult<A>> {
    if (this.currentStatus !== 'Idle') {
      return Promise.reject(
        new Error(`Cannot pull source ${SourceId.unwrap(this.id)} while ${this.currentStatus}`)
      );
    }

    this.currentStatus = 'Pulling';
    const pending = this.nextFromIterator().then(
      (result) => {
        if (this.currentStatus === 'Pulling') {
          this.currentStatus = result.done === true ? 'Closed' : 'Idle';
        }
        return result;
      },
      (error: unknown) => {
        if (this.currentStatus === 'Pulling') {
          this.currentStatus = 'Failed';
        }
        throw error;
      }
    );
    this.inFlight = pending;
    return pending;
  }

  /**
   * Cancel the producer
   * Resolves once the in-flight pull (if any) and iterator.return() have settled.
   * Rejects with CleanupError if the producer's return() fails.
   */
  cancel(): Promise<void> {
    if (this.cancelPromise === null) {
      this.cancelPromise = this.runCancel();
    }
    return this.cancelPromise;
  }

  private async nextFromIterator(): Promise<IteratorResult<A>> {
    if (this.iterator === null) {
      this.iterator = this.open();
    }
    return this.iterator.next();
  }

  private open(): AsyncIterator<A> {
    const iterable = typeof this.source === 'function' ? this.source(this.controller.signal) : this.source;
    return iterable[Symbol.asyncIterator]();
  }

  private async runCancel(): Promise<void> {
    if (this.isTerminal()) {
      // Reached Closed or Failed on its own: nothing to cancel
      return;
    }

    const wasPulling = this.currentStatus === 'Pulling';
    this.currentStatus = 'Cancelled';
    this.controller.abort();

    const iterator = this.iterator;
    const inFlight = wasPulling ? this.inFlight : null;

    // return() is issued alongside the in-flight pull: iterators that can
    // unblock a pending next() (streams, queues) rely on it
    const returning = (async () => {
      if (iterator !== null && iterator.return !== undefined) {
        await iterator.return();
      }
    })();

    const [, returned] = await Promise.allSettled([inFlight ?? Promise.resolve(), returning]);
    if (returned.status === 'rejected') {
      throw new CleanupError(this.id, returned.reason);
    }
  }
}
