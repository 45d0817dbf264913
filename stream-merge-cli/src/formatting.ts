/**
 * Output formatting utilities
 */

import { ValidationError as MergeValidationError } from 'stream-merge';
import { FileError, ValidationError } from './errors.js';
import { FileErrorCode, TaggedLine } from './types.js';

const FILE_ERROR_CODES: ReadonlySet<string> = new Set<FileErrorCode>(['ENOENT', 'EACCES', 'EISDIR']);

/**
 * Format a merged line for display
 * Format: `<file>: <text>` with prefix, the bare text without
 */
export function formatLine(line: TaggedLine, prefix: boolean): string {
  return prefix ? `${line.file}: ${line.text}` : line.text;
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof FileError) {
    return `Error: Cannot read ${error.path}: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (not handled here)
 * - 1: Validation error (bad user input)
 * - 2: File error (missing, unreadable or a directory)
 * - 3: Anything else
 * - 130: SIGINT (handled by the lines command directly)
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ValidationError || error instanceof MergeValidationError) {
    return 1;
  }

  if (error instanceof FileError && error.code !== undefined && FILE_ERROR_CODES.has(error.code)) {
    return 2;
  }

  return 3;
}
