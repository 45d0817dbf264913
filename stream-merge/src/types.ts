// Branded identifiers and the collaborator shapes the merge engine consumes

/**
 * Source identifier (number-based, monotonically increasing from 1)
 */
export type SourceId = number & { readonly __brand: 'SourceId' };

export const SourceId = {
  first: 1 as SourceId,
  fromNumber: (value: number): SourceId => {
    if (!Number.isInteger(value) || value < 1) {
      throw new Error('SourceId must be a positive integer');
    }
    return value as SourceId;
  },
  next: (id: SourceId): SourceId => ((id as number) + 1) as SourceId,
  unwrap: (id: SourceId): number => id as number,
};

/**
 * A producer: either an async iterable, or a factory that receives the
 * source's cancellation signal and returns one. The factory form lets a
 * producer tie its own resources (file handles, timers, sockets) to the
 * signal the junction aborts on cancellation.
 */
export type SourceLike<A> = AsyncIterable<A> | ((signal: AbortSignal) => AsyncIterable<A>);

/**
 * Iterable forms of the source-of-sources
 */
export type UpstreamIterable<A> = AsyncIterable<SourceLike<A>> | Iterable<SourceLike<A>>;

/**
 * The source-of-sources. Pulled lazily, one producer at a time.
 * As with producers, the factory form receives a signal that is aborted
 * when the merge cancels it, so a pull that is waiting can end early.
 */
export type UpstreamLike<A> = UpstreamIterable<A> | ((signal: AbortSignal) => UpstreamIterable<A>);

/**
 * Where a failure came from
 */
export type FailureOrigin = 'source' | 'upstream' | 'internal';

/**
 * Terminal outcome of a merge
 */
export type Outcome =
  | { readonly type: 'Completed' }
  | { readonly type: 'Failed'; readonly error: unknown }
  | { readonly type: 'Killed' };

export const Outcome = {
  completed: (): Outcome => ({ type: 'Completed' }),
  killed: (): Outcome => ({ type: 'Killed' }),
  failed: (error: unknown): Outcome => ({ type: 'Failed', error }),
};

/**
 * Global lifecycle of a merge
 */
export type JunctionState = 'Running' | 'DownstreamClosing' | 'SourceClosing' | 'Done';

/**
 * Cleanup target: one of the admitted sources or the source-of-sources
 */
export type CleanupTarget = SourceId | 'upstream';
