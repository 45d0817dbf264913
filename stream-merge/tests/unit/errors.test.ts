// Unit tests for custom error classes

import { describe, it, expect } from 'vitest';
import { CleanupError, QueueClosedError, StreamMergeError, ValidationError } from '../../src/errors';
import { SourceId } from '../../src/types';

describe('Error Classes', () => {
  describe('StreamMergeError', () => {
    it('should maintain instanceof chain through Object.setPrototypeOf', () => {
      const error = new StreamMergeError('test error');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(StreamMergeError);
      expect(error.name).toBe('StreamMergeError');
      expect(error.message).toBe('test error');
    });
  });

  describe('ValidationError', () => {
    it('should extend StreamMergeError and keep the field', () => {
      const error = new ValidationError('bad input', 'maxOpen');

      expect(error).toBeInstanceOf(StreamMergeError);
      expect(error.name).toBe('ValidationError');
      expect(error.field).toBe('maxOpen');
    });

    it('should leave field undefined when not given', () => {
      expect(new ValidationError('bad input').field).toBeUndefined();
    });
  });

  describe('QueueClosedError', () => {
    it('should default its message', () => {
      const error = new QueueClosedError();

      expect(error).toBeInstanceOf(StreamMergeError);
      expect(error.name).toBe('QueueClosedError');
      expect(error.message).toBe('Queue is closed');
    });
  });

  describe('CleanupError', () => {
    it('should name the source and carry the cause', () => {
      const cause = new Error('close failed');
      const error = new CleanupError(SourceId.fromNumber(3), cause);

      expect(error).toBeInstanceOf(StreamMergeError);
      expect(error.name).toBe('CleanupError');
      expect(error.message).toBe('Cleanup of source 3 failed: close failed');
      expect(error.target).toBe(3);
      expect(error.cause).toBe(cause);
    });

    it('should describe the source-of-sources and non-Error causes', () => {
      const error = new CleanupError('upstream', 'socket hang up');

      expect(error.message).toBe('Cleanup of source-of-sources failed: socket hang up');
      expect(error.target).toBe('upstream');
      expect(error.cause).toBe('socket hang up');
    });
  });
});
