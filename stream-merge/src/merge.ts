// Entry points: merge a source-of-sources, optionally capping open sources

import { createConfig, MergeConfigInput } from './config';
import { MergedStream } from './mergedStream';
import { UpstreamLike } from './types';

/**
 * Options accepted by merge()
 */
export type MergeOptions = MergeConfigInput;

/**
 * Merge every producer emitted by `source` into one stream
 *
 * Values are delivered as producers make them ready; order is only kept
 * within a single producer. The merge ends when `source` and every producer
 * it emitted have ended, fails with the first failure of any of them, and
 * cancels everything still open when the consumer stops early.
 *
 * @param maxOpen - Max number of producers running at once; <= 0 is unbounded
 * @throws ValidationError if maxOpen is not an integer
 */
export function merge<A>(source: UpstreamLike<A>, options?: MergeOptions): MergedStream<A>;
export function merge<A>(source: UpstreamLike<A>, maxOpen: number, options?: MergeOptions): MergedStream<A>;
export function merge<A>(
  source: UpstreamLike<A>,
  maxOpenOrOptions?: number | MergeOptions,
  options?: MergeOptions
): MergedStream<A> {
  const input: MergeConfigInput =
    typeof maxOpenOrOptions === 'number' ? { ...options, maxOpen: maxOpenOrOptions } : (maxOpenOrOptions ?? {});

  return new MergedStream<A>(source, createConfig(input));
}
