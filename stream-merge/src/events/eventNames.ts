// Event name constants for type-safe event handling

/**
 * Event name constants for MergedStream events
 *
 * Usage:
 * ```typescript
 * merged.on(MergeEvents.SOURCE_ADMITTED, (evt) => {
 *   console.log(evt.sourceId, evt.activeCount);
 * });
 * ```
 */
export const MergeEvents = {
  /** Emitted when a producer is admitted and starts running */
  SOURCE_ADMITTED: 'sourceAdmitted',

  /** Emitted when a producer has to wait for a free slot */
  SOURCE_QUEUED: 'sourceQueued',

  /** Emitted when a producer closes normally */
  SOURCE_CLOSED: 'sourceClosed',

  /** Emitted when a producer fails */
  SOURCE_FAILED: 'sourceFailed',

  /** Emitted when the source-of-sources has no more producers */
  UPSTREAM_EXHAUSTED: 'upstreamExhausted',

  /** Emitted on every junction state transition */
  STATE_CHANGE: 'stateChange',

  /** Emitted when a failure loses to an earlier one */
  FAILURE_SUPPRESSED: 'failureSuppressed',

  /** Emitted when cancelling a producer or the source-of-sources fails */
  CLEANUP_ERROR: 'cleanupError',

  /** Emitted once, when the merge is done */
  DONE: 'done',
} as const;

/**
 * Type representing all valid merge event names
 */
export type MergeEventName = (typeof MergeEvents)[keyof typeof MergeEvents];

/**
 * Type guard to check if a string is a valid merge event name
 */
export function isMergeEventName(name: string): name is MergeEventName {
  return Object.values<string>(MergeEvents).includes(name);
}
