/**
 * Error classes for merge-lines
 */

/**
 * Validation error - for command line input failures
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError';

  constructor(
    public readonly field: 'maxOpen' | 'files',
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string | number
  ) {
    super(message);
  }
}

/**
 * File error - an input file could not be opened or read
 */
export class FileError extends Error {
  public readonly name = 'FileError';

  constructor(
    public readonly path: string,
    public readonly code: string | undefined,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
  }
}
