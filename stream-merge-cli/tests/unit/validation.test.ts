/**
 * Unit tests for validation functions
 */

import { describe, it, expect } from 'vitest';
import { parseMaxOpen, validateInputs } from '../../src/validation.js';
import { ValidationError } from '../../src/errors.js';

describe('Max-open Validation', () => {
  it('should accept non-negative integers', () => {
    expect(parseMaxOpen('0')).toBe(0);
    expect(parseMaxOpen('4')).toBe(4);
    expect(parseMaxOpen(' 12 ')).toBe(12);
  });

  it.each(['', '-1', '1.5', 'abc', '3x'])('should reject %j', (input) => {
    expect(() => parseMaxOpen(input)).toThrow(ValidationError);
  });

  it('should report what it got and what it expected', () => {
    try {
      parseMaxOpen('-1');
      expect.unreachable('parseMaxOpen should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        field: 'maxOpen',
        message: 'Invalid --max-open',
        actual: '-1',
        expected: 'a non-negative integer',
      });
    }
  });

  it('should reject values beyond the safe integer range', () => {
    expect(() => parseMaxOpen('9007199254740993')).toThrow('--max-open is too large');
  });
});

describe('Input Validation', () => {
  it('should accept files without --stdin-list', () => {
    expect(() => validateInputs(['a.txt'], false)).not.toThrow();
  });

  it('should accept --stdin-list without files', () => {
    expect(() => validateInputs([], true)).not.toThrow();
  });

  it('should reject no input at all', () => {
    expect(() => validateInputs([], false)).toThrow('No input files. Pass file paths or --stdin-list');
  });

  it('should reject a blank path', () => {
    expect(() => validateInputs(['a.txt', '  '], false)).toThrow('File path cannot be empty');
  });
});
