// Custom error classes for stream-merge
// Extends Error with type-safe error hierarchy

import { CleanupTarget, SourceId } from './types';

/**
 * Base error class for all stream-merge errors
 */
export class StreamMergeError extends Error {
  public readonly name: string = 'StreamMergeError';

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error - thrown synchronously for invalid configuration
 */
export class ValidationError extends StreamMergeError {
  public readonly name: string = 'ValidationError';

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

/**
 * Queue closed error - offer to, or take from, a closed queue
 */
export class QueueClosedError extends StreamMergeError {
  public readonly name: string = 'QueueClosedError';

  constructor(message = 'Queue is closed') {
    super(message);
  }
}

/**
 * Cleanup error - a producer or the source-of-sources failed while being
 * cancelled. Never replaces the failure that caused the shutdown.
 */
export class CleanupError extends StreamMergeError {
  public readonly name: string = 'CleanupError';
  public readonly target: CleanupTarget;
  public readonly cause: unknown;

  constructor(target: CleanupTarget, cause: unknown) {
    super(`Cleanup of ${describeTarget(target)} failed: ${describeCause(cause)}`);
    this.target = target;
    this.cause = cause;
  }
}

function describeTarget(target: CleanupTarget): string {
  return target === 'upstream' ? 'source-of-sources' : `source ${SourceId.unwrap(target)}`;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
