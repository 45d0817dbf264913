// Junction types: source entries, downstream waiters and mailbox events
// Discriminated unions for type-safe event handling

import { CleanupError } from '../errors';
import { CleanupTarget, SourceId, SourceLike } from '../types';
import { SourceHandle } from './sourceHandle';

// ============================================================================
// Source Entries
// ============================================================================

/**
 * Producer state as tracked by the merge core
 */
export type ProducerState<A> =
  | { readonly kind: 'Requesting' }
  | { readonly kind: 'HasValue'; readonly value: A }
  | { readonly kind: 'Closed' }
  | { readonly kind: 'Failed'; readonly error: unknown };

/**
 * One admitted producer. Owned by the merge core.
 */
export interface SourceEntry<A> {
  readonly id: SourceId;
  readonly handle: SourceHandle<A>;
  state: ProducerState<A>; // Mutable: advanced by the merge core only
}

/**
 * A downstream next() call waiting for a value or for termination
 */
export interface DownstreamWaiter<A> {
  readonly resolve: (result: IteratorResult<A>) => void;
  readonly reject: (error: unknown) => void;
}

// ============================================================================
// Mailbox Events
// ============================================================================

/**
 * Every signal that reaches the junction. Producers, the upstream pump and
 * the consumer only ever post these; the junction's loop applies them one
 * at a time.
 */
export type JunctionEvent<A> =
  | StartEvent
  | DownstreamPullEvent<A>
  | DownstreamCloseEvent
  | UpstreamNextEvent<A>
  | UpstreamDoneEvent
  | UpstreamFailedEvent
  | SourceValueEvent<A>
  | SourceDoneEvent
  | SourceFailedEvent
  | CleanupDoneEvent;

/**
 * First downstream demand: opens the source-of-sources
 */
export interface StartEvent {
  readonly type: 'Start';
}

export interface DownstreamPullEvent<A> {
  readonly type: 'DownstreamPull';
  readonly waiter: DownstreamWaiter<A>;
}

export interface DownstreamCloseEvent {
  readonly type: 'DownstreamClose';
  readonly resolve: () => void;
}

export interface UpstreamNextEvent<A> {
  readonly type: 'UpstreamNext';
  readonly source: SourceLike<A>;
}

export interface UpstreamDoneEvent {
  readonly type: 'UpstreamDone';
}

export interface UpstreamFailedEvent {
  readonly type: 'UpstreamFailed';
  readonly error: unknown;
}

export interface SourceValueEvent<A> {
  readonly type: 'SourceValue';
  readonly id: SourceId;
  readonly value: A;
}

export interface SourceDoneEvent {
  readonly type: 'SourceDone';
  readonly id: SourceId;
}

export interface SourceFailedEvent {
  readonly type: 'SourceFailed';
  readonly id: SourceId;
  readonly error: unknown;
}

/**
 * A cancellation was acknowledged (successfully or not)
 */
export interface CleanupDoneEvent {
  readonly type: 'CleanupDone';
  readonly target: CleanupTarget;
  readonly error?: CleanupError;
}
