// Utility to merge a fixed set of async iterables into a single stream

import { merge } from '../merge';
import { MergedStream } from '../mergedStream';
import { SourceLike } from '../types';

/**
 * Merge multiple async iterables into a single async iterable
 * Items are yielded as they arrive from any source stream
 */
export function mergeStreams<T>(...sources: Array<SourceLike<T>>): MergedStream<T> {
  return merge<T>(sources);
}
