// Junction - the single coordination point of a merge
// Actor style: one mailbox, one loop, every state change happens inside handle()

import { MergeConfig } from '../config';
import { CleanupError } from '../errors';
import { MergeEventSink } from '../events/eventTypes';
import { CleanupTarget, FailureOrigin, JunctionState, Outcome, UpstreamLike } from '../types';
import { AsyncQueue } from '../utils/asyncQueue';
import { debugLog } from '../utils/debug';
import { AdmissionController } from './admissionController';
import { MergeCore } from './mergeCore';
import { TerminationCoordinator } from './terminationCoordinator';
import { DownstreamWaiter, JunctionEvent, SourceEntry } from './types';

/**
 * Merge engine behind MergedStream
 *
 * Producers, the upstream pump and the consumer never touch merge state:
 * they post JunctionEvents, and run() applies them one at a time. The loop
 * is started lazily by the first pull (or close) and exits at Done.
 */
export class Junction<A> {
  private readonly mailbox = new AsyncQueue<JunctionEvent<A>>();
  private readonly core: MergeCore<A>;
  private readonly admission: AdmissionController<A>;
  private readonly coordinator: TerminationCoordinator;
  private readonly closeWaiters: Array<() => void> = [];

  private loopPromise: Promise<void> | null = null;
  private started = false;

  constructor(
    upstream: UpstreamLike<A>,
    private readonly config: MergeConfig,
    private readonly emit: MergeEventSink
  ) {
    this.coordinator = new TerminationCoordinator(emit);
    this.core = new MergeCore<A>((entry) => this.schedulePull(entry));
    this.admission = new AdmissionController<A>(upstream, config, {
      activeCount: () => this.core.activeCount(),
      admit: (handle) => this.core.add({ id: handle.id, handle, state: { kind: 'Requesting' } }),
      post: (event) => this.post(event),
      emit,
    });
  }

  get state(): JunctionState {
    return this.coordinator.state;
  }

  get outcome(): Outcome | undefined {
    return this.coordinator.outcome;
  }

  /**
   * Downstream demand for the next value
   */
  pull(): Promise<IteratorResult<A>> {
    return new Promise<IteratorResult<A>>((resolve, reject) => {
      if (this.coordinator.isDone()) {
        this.coordinator.settle(resolve, reject);
        return;
      }

      this.ensureLoop();
      if (!this.started) {
        this.started = true;
        this.post({ type: 'Start' });
      }
      this.post({ type: 'DownstreamPull', waiter: { resolve, reject } });
    });
  }

  /**
   * Downstream close. Resolves once every cleanup has completed.
   */
  close(): Promise<void> {
    return new Promise<void>((resolve) => {
      if (this.coordinator.isDone()) {
        resolve();
        return;
      }

      this.ensureLoop();
      this.post({ type: 'DownstreamClose', resolve });
    });
  }

  private ensureLoop(): void {
    if (this.loopPromise === null) {
      this.loopPromise = this.run();
    }
  }

  private post(event: JunctionEvent<A>): void {
    if (this.mailbox.isClosed()) {
      debugLog(`Dropping ${event.type} posted after Done`);
      return;
    }
    this.mailbox.offer(event);
  }

  // ==========================================================================
  // Event Loop
  // ==========================================================================

  private async run(): Promise<void> {
    for await (const event of this.mailbox) {
      try {
        this.handle(event);
      } catch (err) {
        this.fail(err, 'internal');
      }

      if (this.coordinator.isDone()) {
        break;
      }
    }
  }

  private handle(event: JunctionEvent<A>): void {
    switch (event.type) {
      case 'Start':
        if (this.coordinator.isRunning()) {
          this.admission.requestUpstreamIfReady();
        }
        break;

      case 'DownstreamPull':
        this.onDownstreamPull(event.waiter);
        break;

      case 'DownstreamClose':
        this.onDownstreamClose(event.resolve);
        break;

      case 'UpstreamNext':
        if (this.coordinator.isRunning()) {
          this.admission.onNewSource(event.source);
        }
        break;

      case 'UpstreamDone':
        if (this.coordinator.isRunning()) {
          this.admission.onSourceOfSourcesExhausted();
          this.checkCompletion();
        }
        break;

      case 'UpstreamFailed':
        this.admission.onSourceOfSourcesFailed();
        this.fail(event.error, 'upstream');
        break;

      case 'SourceValue':
        if (this.coordinator.isRunning()) {
          this.core.onValueReady(event.id, event.value);
        }
        break;

      case 'SourceDone': {
        const entry = this.core.onSourceTerminal(event.id, { kind: 'Closed' });
        if (entry !== undefined) {
          this.emit({
            type: 'sourceClosed',
            sourceId: event.id,
            activeCount: this.core.activeCount(),
            timestamp: new Date(),
          });
        }
        if (this.coordinator.isRunning()) {
          this.admission.onSlotFreed();
          this.checkCompletion();
        }
        break;
      }

      case 'SourceFailed':
        this.core.onSourceTerminal(event.id, { kind: 'Failed', error: event.error });
        this.emit({ type: 'sourceFailed', sourceId: event.id, error: event.error, timestamp: new Date() });
        this.fail(event.error, 'source');
        break;

      case 'CleanupDone':
        this.coordinator.onCleanupDone(event.target, event.error);
        this.finishIfCleanedUp();
        break;
    }
  }

  private onDownstreamPull(waiter: DownstreamWaiter<A>): void {
    if (!this.coordinator.isRunning()) {
      // Shutting down: answered at Done
      this.core.park(waiter);
      return;
    }

    this.core.onDownstreamPull(waiter);
    this.checkCompletion();
  }

  private onDownstreamClose(resolve: () => void): void {
    this.closeWaiters.push(resolve);
    if (this.coordinator.onDownstreamClose()) {
      this.shutdown();
    }
  }

  private fail(error: unknown, origin: FailureOrigin): void {
    if (this.coordinator.onFailure(error, origin)) {
      this.shutdown();
    }
  }

  // ==========================================================================
  // Termination
  // ==========================================================================

  /**
   * Everything exhausted and the buffer drained: complete normally
   */
  private checkCompletion(): void {
    if (
      this.coordinator.isRunning() &&
      this.core.isBufferEmpty() &&
      this.core.activeCount() === 0 &&
      this.admission.isExhausted()
    ) {
      this.coordinator.onCompleted();
      this.settleAll();
    }
  }

  /**
   * Cancel every active source and the source-of-sources
   * Done is reached when the last acknowledgment arrives.
   */
  private shutdown(): void {
    for (const entry of this.core.detachAll()) {
      this.cancel(entry.id, () => entry.handle.cancel());
    }
    this.cancel('upstream', () => this.admission.cancel());
    this.finishIfCleanedUp();
  }

  private cancel(target: CleanupTarget, run: () => Promise<void>): void {
    this.coordinator.trackCleanup(target);
    void run().then(
      () => this.post({ type: 'CleanupDone', target }),
      (err: unknown) =>
        this.post({
          type: 'CleanupDone',
          target,
          error: err instanceof CleanupError ? err : new CleanupError(target, err),
        })
    );
  }

  private finishIfCleanedUp(): void {
    if (this.coordinator.tryFinish()) {
      this.settleAll();
    }
  }

  /**
   * Answer every waiting pull and close, then stop accepting events
   */
  private settleAll(): void {
    for (const waiter of this.core.takeWaiters()) {
      this.coordinator.settle(waiter.resolve, waiter.reject);
    }

    for (const resolve of this.closeWaiters.splice(0)) {
      resolve();
    }

    // Demand that raced with the final transition is answered too
    this.mailbox.close();
    for (const event of this.mailbox.drain()) {
      if (event.type === 'DownstreamPull') {
        this.coordinator.settle(event.waiter.resolve, event.waiter.reject);
      } else if (event.type === 'DownstreamClose') {
        event.resolve();
      }
    }
  }

  // ==========================================================================
  // Producers
  // ==========================================================================

  /**
   * Issue the next pull of a source through the configured strategy
   */
  private schedulePull(entry: SourceEntry<A>): void {
    const { id, handle } = entry;
    this.config.strategy.execute(() => {
      if (handle.status !== 'Idle') {
        // Cancelled before the pull started
        return;
      }

      void handle.pull().then(
        (result) => {
          if (handle.isCancelled()) {
            return;
          }
          this.post(result.done === true ? { type: 'SourceDone', id } : { type: 'SourceValue', id, value: result.value });
        },
        (error: unknown) => {
          if (handle.isCancelled()) {
            debugLog(`Source ${id} failed after cancellation`, error);
            return;
          }
          this.post({ type: 'SourceFailed', id, error });
        }
      );
    });
  }
}
