/**
 * Files as merge sources
 *
 * Each file is a factory source: the merge hands it an AbortSignal, and
 * aborting that signal closes the file and ends its lines.
 */

import { once } from 'events';
import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import type { SourceLike } from 'stream-merge';
import { FileError } from './errors.js';
import { TaggedLine } from './types.js';

const FILE_ERROR_MESSAGES: Readonly<Record<string, string>> = {
  ENOENT: 'no such file or directory',
  EACCES: 'permission denied',
  EISDIR: 'is a directory',
};

/**
 * The lines of one file, opened only when the merge first pulls it
 */
export function fileLines(path: string): SourceLike<TaggedLine> {
  return (signal: AbortSignal) => readLines(path, signal);
}

/**
 * Non-blank, trimmed lines of a stream, read as they arrive
 * Aborting `signal` ends the lines without waiting for the stream to end.
 */
export async function* pathsFromStream(input: Readable, signal?: AbortSignal): AsyncGenerator<string> {
  const lines = createInterface({ input, crlfDelay: Infinity, signal });
  try {
    for await (const line of lines) {
      const path = line.trim();
      if (path.length > 0) {
        yield path;
      }
    }
  } finally {
    lines.close();
  }
}

/**
 * The source-of-sources: `files` first, then every path read from `listed`
 */
export async function* fileSources(
  files: readonly string[],
  listed?: AsyncIterable<string>
): AsyncGenerator<SourceLike<TaggedLine>> {
  for (const file of files) {
    yield fileLines(file);
  }

  if (listed !== undefined) {
    for await (const file of listed) {
      yield fileLines(file);
    }
  }
}

async function* readLines(path: string, signal: AbortSignal): AsyncGenerator<TaggedLine> {
  const input = createReadStream(path, { encoding: 'utf8', signal });

  try {
    await once(input, 'open');
  } catch (err) {
    throw toFileError(path, err);
  }

  const lines = createInterface({ input, crlfDelay: Infinity });
  let failure: unknown;

  // Read errors and cancellation both end the line iterator through close()
  const stop = (): void => lines.close();
  input.on('error', (err) => {
    failure = err;
    stop();
  });
  signal.addEventListener('abort', stop, { once: true });

  try {
    for await (const text of lines) {
      yield { file: path, text };
    }
  } catch (err) {
    failure = err;
  } finally {
    signal.removeEventListener('abort', stop);
    lines.close();
    input.destroy();
  }

  if (failure !== undefined && !signal.aborted) {
    throw toFileError(path, failure);
  }
}

function toFileError(path: string, err: unknown): FileError {
  const code = errorCode(err);
  const known = code === undefined ? undefined : FILE_ERROR_MESSAGES[code];
  const message = known ?? (err instanceof Error ? err.message : String(err));
  return new FileError(path, code, message, err);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
