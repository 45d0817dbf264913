// Event types for merge observability
// Uses discriminated unions for type-safe event handling

import { CleanupError } from '../errors';
import { FailureOrigin, JunctionState, Outcome, SourceId } from '../types';

/**
 * All events emitted by a MergedStream
 * Discriminated union for type-safe event handling
 */
export type MergeEvent =
  | SourceAdmittedEvent
  | SourceQueuedEvent
  | SourceClosedEvent
  | SourceFailedEvent
  | UpstreamExhaustedEvent
  | StateChangeEvent
  | FailureSuppressedEvent
  | CleanupErrorEvent
  | DoneEvent;

/**
 * A producer was admitted and its first pull scheduled
 */
export interface SourceAdmittedEvent {
  readonly type: 'sourceAdmitted';
  readonly sourceId: SourceId;
  readonly activeCount: number;
  readonly timestamp: Date;
}

/**
 * A producer arrived while maxOpen sources were active
 */
export interface SourceQueuedEvent {
  readonly type: 'sourceQueued';
  readonly pendingCount: number;
  readonly timestamp: Date;
}

export interface SourceClosedEvent {
  readonly type: 'sourceClosed';
  readonly sourceId: SourceId;
  readonly activeCount: number;
  readonly timestamp: Date;
}

export interface SourceFailedEvent {
  readonly type: 'sourceFailed';
  readonly sourceId: SourceId;
  readonly error: unknown;
  readonly timestamp: Date;
}

/**
 * The source-of-sources signalled that no more producers will arrive
 */
export interface UpstreamExhaustedEvent {
  readonly type: 'upstreamExhausted';
  readonly timestamp: Date;
}

/**
 * Junction lifecycle transition
 */
export interface StateChangeEvent {
  readonly type: 'stateChange';
  readonly oldState: JunctionState;
  readonly newState: JunctionState;
  readonly timestamp: Date;
}

/**
 * A failure that arrived after shutdown had already begun
 */
export interface FailureSuppressedEvent {
  readonly type: 'failureSuppressed';
  readonly error: unknown;
  readonly timestamp: Date;
}

export interface CleanupErrorEvent {
  readonly type: 'cleanupError';
  readonly error: CleanupError;
  readonly timestamp: Date;
}

/**
 * The merge reached its terminal state
 */
export interface DoneEvent {
  readonly type: 'done';
  readonly outcome: Outcome;
  readonly origin?: FailureOrigin;
  readonly timestamp: Date;
}

/**
 * Receives events as the junction produces them
 */
export type MergeEventSink = (event: MergeEvent) => void;
