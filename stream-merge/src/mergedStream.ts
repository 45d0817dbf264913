// MergedStream - public face of a merge
// Idiomatic TypeScript: EventEmitter-based observability, AsyncIterableIterator consumption

import { MergeConfig } from './config';
import { emitMergeEvent, MergeEventEmitter } from './events/eventEmitter';
import { Junction } from './junction/junction';
import { JunctionState, Outcome, UpstreamLike } from './types';

/**
 * The merged output of a source-of-sources
 *
 * Usage:
 * ```typescript
 * import { merge, MergeEvents } from 'stream-merge';
 *
 * const merged = merge(feeds(), 4);
 * merged.on(MergeEvents.SOURCE_ADMITTED, (evt) => console.log('open', evt.sourceId));
 *
 * for await (const item of merged) {
 *   if (item.last) break; // closes every open feed before the loop exits
 * }
 * ```
 *
 * next() is the consumer's pull; return() is the consumer's close and
 * resolves only after every producer has been cleaned up. A failed merge
 * rejects exactly one next() with the original error.
 */
export class MergedStream<A> extends MergeEventEmitter implements AsyncIterableIterator<A> {
  private readonly junction: Junction<A>;

  constructor(upstream: UpstreamLike<A>, config: MergeConfig) {
    super();
    this.junction = new Junction<A>(upstream, config, (event) => emitMergeEvent(this, event));
  }

  /**
   * Current lifecycle state
   */
  get state(): JunctionState {
    return this.junction.state;
  }

  /**
   * Terminal outcome, once the merge is done
   */
  get outcome(): Outcome | undefined {
    return this.junction.outcome;
  }

  next(): Promise<IteratorResult<A>> {
    return this.junction.pull();
  }

  async return(): Promise<IteratorResult<A>> {
    await this.junction.close();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<A> {
    return this;
  }
}
