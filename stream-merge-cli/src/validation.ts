/**
 * Input validation functions
 */

import { ValidationError } from './errors.js';

/**
 * Parses the --max-open option
 * @throws ValidationError unless the input is a non-negative integer
 */
export function parseMaxOpen(input: string): number {
  const trimmed = input.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError('maxOpen', 'Invalid --max-open', input, 'a non-negative integer');
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError('maxOpen', '--max-open is too large', input, Number.MAX_SAFE_INTEGER);
  }

  return value;
}

/**
 * Requires at least one input: a file argument or --stdin-list
 * @throws ValidationError if there is nothing to read
 */
export function validateInputs(files: readonly string[], stdinList: boolean): void {
  if (files.length === 0 && !stdinList) {
    throw new ValidationError('files', 'No input files. Pass file paths or --stdin-list');
  }

  for (const file of files) {
    if (file.trim().length === 0) {
      throw new ValidationError('files', 'File path cannot be empty');
    }
  }
}
