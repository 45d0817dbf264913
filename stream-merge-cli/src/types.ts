/**
 * Core type definitions for merge-lines
 */

/**
 * One line read from one input file
 */
export interface TaggedLine {
  readonly file: string;
  readonly text: string;
}

/**
 * Options as parsed by commander
 */
export interface LinesOptions {
  readonly maxOpen: string;
  readonly prefix: boolean;
  readonly stdinList: boolean;
}

/**
 * Error codes reported as file errors (exit code 2)
 */
export type FileErrorCode = 'ENOENT' | 'EACCES' | 'EISDIR';
