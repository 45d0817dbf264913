// Type-safe event emitter for MergedStream
// Uses Node.js EventEmitter with TypeScript type safety

import { EventEmitter } from 'events';
import type { MergeEvent } from './eventTypes';

/**
 * Event map for type-safe event handling
 * Maps event names to their corresponding event data
 */
export type MergeEventMap = {
  [K in MergeEvent['type']]: Extract<MergeEvent, { type: K }>;
};

/**
 * Type-safe event emitter
 * Extends Node.js EventEmitter with typed event methods
 */
export class MergeEventEmitter extends EventEmitter {
  /**
   * Emit a typed event
   */
  emit<K extends keyof MergeEventMap>(event: K, data: MergeEventMap[K]): boolean {
    return super.emit(event, data);
  }

  /**
   * Add a typed event listener
   */
  on<K extends keyof MergeEventMap>(event: K, listener: (data: MergeEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  /**
   * Add a typed event listener (one-time)
   */
  once<K extends keyof MergeEventMap>(event: K, listener: (data: MergeEventMap[K]) => void): this {
    return super.once(event, listener);
  }

  /**
   * Remove a typed event listener
   */
  off<K extends keyof MergeEventMap>(event: K, listener: (data: MergeEventMap[K]) => void): this {
    return super.off(event, listener);
  }
}

/**
 * Emit a MergeEvent under its own name
 * Listener exceptions are reported and never reach the junction
 */
export function emitMergeEvent(emitter: MergeEventEmitter, event: MergeEvent): void {
  try {
    emitter.emit(event.type, event);
  } catch (err) {
    console.error(`Warning: listener for '${event.type}' threw:`, err);
  }
}
