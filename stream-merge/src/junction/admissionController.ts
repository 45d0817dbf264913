// Admission controller - consumes the source-of-sources and enforces maxOpen

import { MergeConfig, isBounded } from '../config';
import { CleanupError } from '../errors';
import { MergeEventSink } from '../events/eventTypes';
import { SourceId, SourceLike, UpstreamIterable, UpstreamLike } from '../types';
import { debugLog } from '../utils/debug';
import { SourceHandle } from './sourceHandle';
import { JunctionEvent } from './types';

/**
 * State of the source-of-sources
 */
export type UpstreamStatus = 'Idle' | 'Pulling' | 'Exhausted' | 'Failed' | 'Cancelled';

/**
 * What the controller needs from the junction
 */
export interface AdmissionHooks<A> {
  /** Number of currently active sources */
  activeCount(): number;
  /** Register an admitted producer with the merge core */
  admit(handle: SourceHandle<A>): void;
  /** Post an event to the junction's mailbox */
  post(event: JunctionEvent<A>): void;
  /** Report an observability event */
  emit: MergeEventSink;
}

/**
 * Pulls producers from the source-of-sources one at a time, and only while
 * there is capacity for them, so producers are never instantiated eagerly.
 * Producers that arrive while maxOpen sources are active wait in a FIFO.
 */
export class AdmissionController<A> {
  private readonly abortController = new AbortController();
  private readonly pending: Array<SourceLike<A>> = [];
  private iterator: AsyncIterator<SourceLike<A>> | Iterator<SourceLike<A>> | null = null;
  private upstreamStatus: UpstreamStatus = 'Idle';
  private inFlight: Promise<void> | null = null;
  private cancelPromise: Promise<void> | null = null;
  private nextId: SourceId = SourceId.first;

  constructor(
    private readonly upstream: UpstreamLike<A>,
    private readonly config: MergeConfig,
    private readonly hooks: AdmissionHooks<A>
  ) {}

  get status(): UpstreamStatus {
    return this.upstreamStatus;
  }

  /**
   * Signal handed to a factory source-of-sources; aborted on cancellation
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Whether another source may be active right now
   */
  hasCapacity(): boolean {
    return !isBounded(this.config) || this.hooks.activeCount() < this.config.maxOpen;
  }

  /**
   * No producer is queued and none will ever arrive
   */
  isExhausted(): boolean {
    return this.upstreamStatus === 'Exhausted' && this.pending.length === 0;
  }

  /**
   * The source-of-sources produced a producer
   */
  onNewSource(source: SourceLike<A>): void {
    if (this.upstreamStatus === 'Pulling') {
      this.upstreamStatus = 'Idle';
    }

    if (this.hasCapacity()) {
      this.admit(source);
    } else {
      this.pending.push(source);
      this.hooks.emit({ type: 'sourceQueued', pendingCount: this.pending.length, timestamp: new Date() });
    }

    this.requestUpstreamIfReady();
  }

  /**
   * A source became terminal: admit queued producers into the freed slots
   */
  onSlotFreed(): void {
    while (this.pending.length > 0 && this.hasCapacity()) {
      const source = this.pending.shift();
      if (source !== undefined) {
        this.admit(source);
      }
    }

    this.requestUpstreamIfReady();
  }

  onSourceOfSourcesExhausted(): void {
    this.upstreamStatus = 'Exhausted';
    this.hooks.emit({ type: 'upstreamExhausted', timestamp: new Date() });
  }

  onSourceOfSourcesFailed(): void {
    this.upstreamStatus = 'Failed';
  }

  /**
   * Pull the next producer if nothing is in flight, nothing is queued and
   * there is a free slot
   */
  requestUpstreamIfReady(): void {
    if (this.upstreamStatus !== 'Idle' || this.pending.length > 0 || !this.hasCapacity()) {
      return;
    }

    this.upstreamStatus = 'Pulling';
    this.inFlight = new Promise<void>((resolve) => {
      this.config.strategy.execute(() => {
        if (this.upstreamStatus !== 'Pulling') {
          // Cancelled before the pull started
          resolve();
          return;
        }

        void this.nextUpstream()
          .then(
            (result) => {
              if (this.upstreamStatus === 'Cancelled') {
                return;
              }
              this.hooks.post(
                result.done === true ? { type: 'UpstreamDone' } : { type: 'UpstreamNext', source: result.value }
              );
            },
            (error: unknown) => {
              if (this.upstreamStatus === 'Cancelled') {
                debugLog('Source-of-sources failed after cancellation', error);
                return;
              }
              this.hooks.post({ type: 'UpstreamFailed', error });
            }
          )
          .finally(() => resolve());
      });
    });
  }

  /**
   * Cancel the source-of-sources and drop queued producers (never started)
   * Idempotent: every call returns the same promise.
   */
  cancel(): Promise<void> {
    if (this.cancelPromise === null) {
      this.cancelPromise = this.runCancel();
    }
    return this.cancelPromise;
  }

  private admit(source: SourceLike<A>): void {
    const handle = new SourceHandle<A>(this.nextId, source);
    this.nextId = SourceId.next(this.nextId);
    this.hooks.admit(handle);
    this.hooks.emit({
      type: 'sourceAdmitted',
      sourceId: handle.id,
      activeCount: this.hooks.activeCount(),
      timestamp: new Date(),
    });
  }

  private async nextUpstream(): Promise<IteratorResult<SourceLike<A>>> {
    if (this.iterator === null) {
      this.iterator = openUpstream(this.upstream, this.abortController.signal);
    }
    return this.iterator.next();
  }

  private async runCancel(): Promise<void> {
    this.pending.length = 0;

    if (this.upstreamStatus === 'Exhausted' || this.upstreamStatus === 'Failed') {
      return;
    }

    const wasPulling = this.upstreamStatus === 'Pulling';
    this.upstreamStatus = 'Cancelled';
    this.abortController.abort();

    const iterator = this.iterator;
    const returning = (async () => {
      if (iterator !== null && iterator.return !== undefined) {
        await iterator.return();
      }
    })();

    const inFlight = wasPulling ? this.inFlight : null;
    const [, returned] = await Promise.allSettled([inFlight ?? Promise.resolve(), returning]);
    if (returned.status === 'rejected') {
      throw new CleanupError('upstream', returned.reason);
    }
  }
}

function openUpstream<A>(
  upstream: UpstreamLike<A>,
  signal: AbortSignal
): AsyncIterator<SourceLike<A>> | Iterator<SourceLike<A>> {
  const iterable: UpstreamIterable<A> = typeof upstream === 'function' ? upstream(signal) : upstream;
  if (Symbol.asyncIterator in iterable) {
    return iterable[Symbol.asyncIterator]();
  }
  return iterable[Symbol.iterator]();
}
