// Merge core - active sources, read-ahead buffer and downstream demand

import { SourceId } from '../types';
import { DownstreamWaiter, ProducerState, SourceEntry } from './types';

/**
 * Buffered value. Boxed so that `undefined` is a legal element value.
 */
interface Buffered<A> {
  readonly value: A;
}

/**
 * Arbiter between many producers and one consumer
 *
 * - The read-ahead buffer accepts a value only while its length is below the
 *   number of active sources.
 * - A source whose value arrives when the buffer is saturated is held in
 *   HasValue and not pulled again until that value enters the buffer.
 * - Held values enter the buffer in the order they arrived.
 */
export class MergeCore<A> {
  private readonly active = new Map<SourceId, SourceEntry<A>>();
  private buffer: Array<Buffered<A>> = [];
  private held: SourceId[] = [];
  private waiters: Array<DownstreamWaiter<A>> = [];

  /**
   * @param requestPull - issues the next pull for an entry (scheduled by the junction)
   */
  constructor(private readonly requestPull: (entry: SourceEntry<A>) => void) {}

  /**
   * Add a newly admitted entry and begin its first pull
   */
  add(entry: SourceEntry<A>): void {
    this.active.set(entry.id, entry);
    this.request(entry);
    // One more slot: a held value may now fit
    this.refill();
  }

  /**
   * A source produced a value
   */
  onValueReady(id: SourceId, value: A): void {
    const entry = this.active.get(id);
    if (entry === undefined) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      // Buffer is empty whenever someone waits: hand over directly
      waiter.resolve({ done: false, value });
      this.request(entry);
      return;
    }

    if (this.buffer.length < this.active.size) {
      this.buffer.push({ value });
      this.request(entry);
      return;
    }

    entry.state = { kind: 'HasValue', value };
    this.held.push(id);
  }

  /**
   * Serve a downstream pull
   * Returns true if a value was delivered, false if the waiter was parked
   */
  onDownstreamPull(waiter: DownstreamWaiter<A>): boolean {
    const next = this.buffer.shift();
    if (next === undefined) {
      this.waiters.push(waiter);
      return false;
    }

    waiter.resolve({ done: false, value: next.value });
    this.refill();
    return true;
  }

  /**
   * A source reached Closed or Failed: remove it from the active set
   */
  onSourceTerminal(id: SourceId, state: ProducerState<A>): SourceEntry<A> | undefined {
    const entry = this.active.get(id);
    if (entry === undefined) {
      return undefined;
    }

    entry.state = state;
    this.active.delete(id);
    this.held = this.held.filter((heldId) => heldId !== id);
    return entry;
  }

  /**
   * Remove and return every active entry, dropping buffered and held values
   * Used when the merge shuts down
   */
  detachAll(): Array<SourceEntry<A>> {
    const entries = Array.from(this.active.values());
    this.active.clear();
    this.buffer = [];
    this.held = [];
    return entries;
  }

  /**
   * Remove and return every waiting downstream pull
   */
  takeWaiters(): Array<DownstreamWaiter<A>> {
    const waiters = this.waiters;
    this.waiters = [];
    return waiters;
  }

  /**
   * Park a downstream pull without trying the buffer
   */
  park(waiter: DownstreamWaiter<A>): void {
    this.waiters.push(waiter);
  }

  activeCount(): number {
    return this.active.size;
  }

  bufferedCount(): number {
    return this.buffer.length;
  }

  heldCount(): number {
    return this.held.length;
  }

  isBufferEmpty(): boolean {
    return this.buffer.length === 0;
  }

  /**
   * The active entry for `id`, if it has not reached a terminal state
   */
  get(id: SourceId): SourceEntry<A> | undefined {
    return this.active.get(id);
  }

  private request(entry: SourceEntry<A>): void {
    entry.state = { kind: 'Requesting' };
    this.requestPull(entry);
  }

  /**
   * Move held values into the buffer while there is room
   */
  private refill(): void {
    while (this.held.length > 0 && this.buffer.length < this.active.size) {
      const id = this.held.shift();
      const entry = id === undefined ? undefined : this.active.get(id);
      if (entry === undefined || entry.state.kind !== 'HasValue') {
        continue;
      }
      this.buffer.push({ value: entry.state.value });
      this.request(entry);
    }
  }
}
