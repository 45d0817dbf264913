/**
 * Integration tests for the lines command: validation, merging and output
 */

import { join } from 'path';
import { PassThrough, Readable } from 'stream';
import { describe, it, expect } from 'vitest';
import { FileError, ValidationError } from '../../src/errors.js';
import { openLines, printLines } from '../../src/commands/lines.js';
import { formatError, getExitCode } from '../../src/formatting.js';
import { LinesOptions } from '../../src/types.js';

const FIXTURES = join(__dirname, '../fixtures');
const ALPHA = join(FIXTURES, 'alpha.txt');
const BETA = join(FIXTURES, 'beta.txt');

const defaults: LinesOptions = { maxOpen: '0', prefix: false, stdinList: false };

function noStdin(): Readable {
  return Readable.from([]);
}

async function run(files: string[], options: Partial<LinesOptions> = {}, stdin = noStdin()): Promise<string[]> {
  const merged = openLines(files, { ...defaults, ...options }, stdin);
  const output: string[] = [];
  await printLines(merged, options.prefix ?? false, (line) => output.push(line));
  return output;
}

describe('Lines Command Integration', () => {
  it('should print every line of every file', async () => {
    const output = await run([ALPHA, BETA]);

    expect(output.sort()).toEqual(['alpha 1', 'alpha 2', 'alpha 3', 'beta 1', 'beta 2']);
  });

  it('should keep the order of lines within each file', async () => {
    const output = await run([ALPHA, BETA]);

    expect(output.filter((line) => line.startsWith('alpha'))).toEqual(['alpha 1', 'alpha 2', 'alpha 3']);
    expect(output.filter((line) => line.startsWith('beta'))).toEqual(['beta 1', 'beta 2']);
  });

  it('should read one file after another with --max-open 1', async () => {
    const output = await run([ALPHA, BETA], { maxOpen: '1' });

    expect(output).toEqual(['alpha 1', 'alpha 2', 'alpha 3', 'beta 1', 'beta 2']);
  });

  it('should prefix lines with their file', async () => {
    const output = await run([BETA], { prefix: true });

    expect(output).toEqual([`${BETA}: beta 1`, `${BETA}: beta 2`]);
  });

  it('should read the file list from stdin with --stdin-list', async () => {
    const stdin = Readable.from([`${ALPHA}\n`, `${BETA}\n`]);

    const output = await run([], { stdinList: true, maxOpen: '1' }, stdin);

    expect(output).toEqual(['alpha 1', 'alpha 2', 'alpha 3', 'beta 1', 'beta 2']);
  });

  it('should close while still waiting for paths on stdin', async () => {
    const stdin = new PassThrough();
    const merged = openLines([ALPHA], { ...defaults, stdinList: true }, stdin);

    await expect(merged.next()).resolves.toMatchObject({ done: false, value: { text: 'alpha 1' } });
    await expect(merged.return()).resolves.toEqual({ done: true, value: undefined });

    expect(merged.outcome).toEqual({ type: 'Killed' });
    expect(stdin.listenerCount('data')).toBe(0);
  });

  it('should reject a bad --max-open before opening anything', () => {
    expect(() => openLines([ALPHA], { ...defaults, maxOpen: 'many' }, noStdin())).toThrow(ValidationError);
  });

  it('should reject a call without inputs', () => {
    let error: unknown;
    try {
      openLines([], defaults, noStdin());
    } catch (err) {
      error = err;
    }

    expect(getExitCode(error)).toBe(1);
    expect(formatError(error)).toBe('Error: No input files. Pass file paths or --stdin-list');
  });

  it('should fail with a file error and exit code 2 for a missing file', async () => {
    const missing = join(FIXTURES, 'missing.txt');

    const error: unknown = await run([ALPHA, missing]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FileError);
    expect(getExitCode(error)).toBe(2);
    expect(formatError(error)).toBe(`Error: Cannot read ${missing}: no such file or directory`);
  });

  it('should close open files when the output stops early', async () => {
    const merged = openLines([ALPHA, BETA], defaults, noStdin());

    const first = await merged.next();
    await merged.return();

    expect(first.done).toBe(false);
    expect(merged.outcome).toEqual({ type: 'Killed' });
  });
});
