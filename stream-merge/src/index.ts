// Public API exports for stream-merge
// Main entry point for the library

// Entry points
export { merge } from './merge';
export type { MergeOptions } from './merge';
export { mergeStreams } from './utils/streamMerger';
export { MergedStream } from './mergedStream';

// Configuration
export type { MergeConfig, MergeConfigInput } from './config';
export { createConfig, validateConfig, DEFAULT_MAX_OPEN } from './config';
export { Strategy, setDefaultStrategy } from './strategy';

// Error types
export { StreamMergeError, ValidationError, QueueClosedError, CleanupError } from './errors';

// Core types
export { SourceId, Outcome } from './types';
export type { SourceLike, UpstreamLike, UpstreamIterable, FailureOrigin, JunctionState, CleanupTarget } from './types';

// Events
export { MergeEvents, isMergeEventName } from './events/eventNames';
export type { MergeEventName } from './events/eventNames';
export type { MergeEventMap } from './events/eventEmitter';
export type {
  MergeEvent,
  SourceAdmittedEvent,
  SourceQueuedEvent,
  SourceClosedEvent,
  SourceFailedEvent,
  UpstreamExhaustedEvent,
  StateChangeEvent,
  FailureSuppressedEvent,
  CleanupErrorEvent,
  DoneEvent,
} from './events/eventTypes';

// Debugging
export { setDebugEnabled } from './utils/debug';
