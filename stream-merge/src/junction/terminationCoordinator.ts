// Termination coordinator - junction lifecycle state machine
//
//   Running -> SourceClosing     -> Done(Failed)
//   Running -> DownstreamClosing -> Done(Killed)
//   Running                      -> Done(Completed)

import { CleanupError } from '../errors';
import { MergeEventSink } from '../events/eventTypes';
import { CleanupTarget, FailureOrigin, JunctionState, Outcome } from '../types';
import { debugLog } from '../utils/debug';

/**
 * Tracks the junction state, the first failure, and every cancellation
 * still waiting for its acknowledgment. Done is only reached once that set
 * is empty.
 */
export class TerminationCoordinator {
  private current: JunctionState = 'Running';
  private finalOutcome: Outcome | undefined;
  private failure: { readonly error: unknown; readonly origin: FailureOrigin } | undefined;
  private readonly outstanding = new Set<CleanupTarget>();
  private failureDelivered = false;

  constructor(private readonly emit: MergeEventSink) {}

  get state(): JunctionState {
    return this.current;
  }

  get outcome(): Outcome | undefined {
    return this.finalOutcome;
  }

  isRunning(): boolean {
    return this.current === 'Running';
  }

  isDone(): boolean {
    return this.current === 'Done';
  }

  /**
   * A source or the source-of-sources failed
   * Returns true if this failure starts the shutdown (first failure wins)
   */
  onFailure(error: unknown, origin: FailureOrigin): boolean {
    if (this.current !== 'Running') {
      debugLog(`Suppressing ${origin} failure while ${this.current}`, error);
      this.emit({ type: 'failureSuppressed', error, timestamp: new Date() });
      return false;
    }

    this.failure = { error, origin };
    this.transition('SourceClosing');
    return true;
  }

  /**
   * The consumer closed the merged stream
   * Returns true if this starts the shutdown
   */
  onDownstreamClose(): boolean {
    if (this.current !== 'Running') {
      return false;
    }

    this.transition('DownstreamClosing');
    return true;
  }

  /**
   * Everything was exhausted and drained
   */
  onCompleted(): void {
    if (this.current !== 'Running') {
      return;
    }
    this.finish(Outcome.completed());
  }

  /**
   * Register a cancellation that must be acknowledged before Done
   */
  trackCleanup(target: CleanupTarget): void {
    this.outstanding.add(target);
  }

  /**
   * A cancellation was acknowledged
   * Cleanup errors are reported, never promoted to the outcome
   */
  onCleanupDone(target: CleanupTarget, error?: CleanupError): void {
    this.outstanding.delete(target);
    if (error !== undefined) {
      debugLog(error.message, error.cause);
      this.emit({ type: 'cleanupError', error, timestamp: new Date() });
    }
  }

  /**
   * Cancellations issued but not yet acknowledged
   */
  outstandingCount(): number {
    return this.outstanding.size;
  }

  /**
   * Reach Done if shutting down and every cancellation was acknowledged
   * Returns true on the transition
   */
  tryFinish(): boolean {
    if (this.outstanding.size > 0) {
      return false;
    }

    if (this.current === 'SourceClosing' && this.failure !== undefined) {
      this.finish(Outcome.failed(this.failure.error), this.failure.origin);
      return true;
    }

    if (this.current === 'DownstreamClosing') {
      this.finish(Outcome.killed());
      return true;
    }

    return false;
  }

  /**
   * Settle a downstream pull once Done
   * Exactly one pull observes a failure; every other one sees the end.
   */
  settle(resolve: (result: IteratorResult<never>) => void, reject: (error: unknown) => void): void {
    const outcome = this.finalOutcome;
    if (outcome !== undefined && outcome.type === 'Failed' && !this.failureDelivered) {
      this.failureDelivered = true;
      reject(outcome.error);
      return;
    }
    resolve({ done: true, value: undefined });
  }

  private finish(outcome: Outcome, origin?: FailureOrigin): void {
    this.finalOutcome = outcome;
    this.transition('Done');
    this.emit({ type: 'done', outcome, origin, timestamp: new Date() });
  }

  private transition(newState: JunctionState): void {
    const oldState = this.current;
    this.current = newState;
    debugLog(`Junction ${oldState} -> ${newState}`);
    this.emit({ type: 'stateChange', oldState, newState, timestamp: new Date() });
  }
}
