/**
 * Unit tests for the typed emitter: events reach listeners under their own
 * name, and a throwing listener is reported instead of propagating
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { emitMergeEvent, MergeEventEmitter } from '../../../src/events/eventEmitter';
import { isMergeEventName, MergeEvents } from '../../../src/events/eventNames';
import { SourceAdmittedEvent } from '../../../src/events/eventTypes';
import { SourceId } from '../../../src/types';

const admitted: SourceAdmittedEvent = {
  type: 'sourceAdmitted',
  sourceId: SourceId.fromNumber(1),
  activeCount: 1,
  timestamp: new Date(0),
};

describe('emitMergeEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should route an event to listeners of its type', () => {
    const emitter = new MergeEventEmitter();
    const received: SourceAdmittedEvent[] = [];
    emitter.on(MergeEvents.SOURCE_ADMITTED, (evt) => received.push(evt));

    emitMergeEvent(emitter, admitted);

    expect(received).toEqual([admitted]);
  });

  it('should deliver once() listeners a single time', () => {
    const emitter = new MergeEventEmitter();
    const listener = vi.fn();
    emitter.once(MergeEvents.SOURCE_ADMITTED, listener);

    emitMergeEvent(emitter, admitted);
    emitMergeEvent(emitter, admitted);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should stop delivering after off()', () => {
    const emitter = new MergeEventEmitter();
    const listener = vi.fn();
    emitter.on(MergeEvents.SOURCE_ADMITTED, listener);
    emitter.off(MergeEvents.SOURCE_ADMITTED, listener);

    emitMergeEvent(emitter, admitted);

    expect(listener).not.toHaveBeenCalled();
  });

  it('should report a throwing listener as a warning', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const emitter = new MergeEventEmitter();
    const failure = new Error('listener bug');
    emitter.on(MergeEvents.SOURCE_ADMITTED, () => {
      throw failure;
    });

    expect(() => emitMergeEvent(emitter, admitted)).not.toThrow();
    expect(errorSpy).toHaveBeenCalledWith("Warning: listener for 'sourceAdmitted' threw:", failure);
  });
});

describe('isMergeEventName', () => {
  it('should accept every declared event name', () => {
    for (const name of Object.values(MergeEvents)) {
      expect(isMergeEventName(name)).toBe(true);
    }
  });

  it('should reject anything else', () => {
    expect(isMergeEventName('error')).toBe(false);
    expect(isMergeEventName('SOURCE_ADMITTED')).toBe(false);
  });
});
