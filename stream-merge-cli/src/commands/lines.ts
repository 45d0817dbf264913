/**
 * Lines command implementation
 */

import { Command } from 'commander';
import type { Readable } from 'stream';
import { merge, MergedStream } from 'stream-merge';
import { formatError, formatLine, getExitCode } from '../formatting.js';
import { fileSources, pathsFromStream } from '../lineSources.js';
import { TaggedLine, LinesOptions } from '../types.js';
import { parseMaxOpen, validateInputs } from '../validation.js';

/**
 * Validate the input and start merging
 * @throws ValidationError for a bad --max-open or no input at all
 */
export function openLines(files: readonly string[], options: LinesOptions, stdin: Readable): MergedStream<TaggedLine> {
  const maxOpen = parseMaxOpen(options.maxOpen);
  validateInputs(files, options.stdinList);

  // The file list is opened by the merge, which aborts `signal` when it closes
  return merge<TaggedLine>(
    (signal) => fileSources(files, options.stdinList ? pathsFromStream(stdin, signal) : undefined),
    maxOpen
  );
}

/**
 * Write every merged line as it arrives
 */
export async function printLines(
  merged: AsyncIterable<TaggedLine>,
  prefix: boolean,
  write: (line: string) => void = (line) => console.log(line)
): Promise<void> {
  for await (const line of merged) {
    write(formatLine(line, prefix));
  }
}

/**
 * Create the lines command
 */
export function createLinesCommand(): Command {
  const cmd = new Command('merge-lines');

  cmd
    .description('Print the lines of many files as they are read')
    .argument('[files...]', 'Files to read')
    .option('-m, --max-open <n>', 'Max files open at once (0 = no limit)', '0')
    .option('-p, --prefix', 'Prefix each line with its file name', false)
    .option('--stdin-list', 'Also read file paths, one per line, from stdin', false)
    .action(async (files: string[], options: LinesOptions) => {
      let merged: MergedStream<TaggedLine> | null = null;
      let isShuttingDown = false;

      // Signal handler for graceful shutdown
      const shutdown = async (): Promise<void> => {
        if (isShuttingDown) {
          return;
        }

        isShuttingDown = true;
        console.error('\nShutting down...');

        if (merged) {
          // Closes every open file before exiting
          await merged.return();
        }

        process.exit(130); // Standard SIGINT exit code
      };

      // Register signal handlers
      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());

      try {
        merged = openLines(files, options, process.stdin);
        await printLines(merged, options.prefix);

        // A signal ended the stream early: shutdown() owns the exit code
        if (!isShuttingDown) {
          process.exit(0);
        }
      } catch (error) {
        console.error(formatError(error));
        process.exit(getExitCode(error));
      }
    });

  return cmd;
}
