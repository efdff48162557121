import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { getHintForCode, handleCommandError, toErrorDisplay } from './error-display.js';
import { configureLogger, createLogger } from '../../../shared/logger.js';
import {
  GraphFileNotFoundError,
  GraphParseError,
  MissingOptionError,
} from '../../../shared/errors.js';

describe('toErrorDisplay', () => {
  it('adds a hint for known error codes', () => {
    const display = toErrorDisplay(new MissingOptionError('from'));

    expect(display.message).toBe('Must set --from');
    expect(display.hint).toBe('Pass both --from and --to, and check .deppaths/config.json.');
  });

  it('carries the cause message', () => {
    const display = toErrorDisplay(
      new GraphParseError('bad indentation', 'deps.yaml', new Error('line 3')),
    );

    expect(display.message).toBe('Invalid graph file deps.yaml: bad indentation');
    expect(display.cause).toBe('line 3');
  });

  it('passes plain errors through without a hint', () => {
    const display = toErrorDisplay(new TypeError('boom'));

    expect(display.message).toBe('boom');
    expect(display.hint).toBeUndefined();
  });

  it('stringifies non-error values', () => {
    expect(toErrorDisplay(42)).toEqual({ message: '42' });
  });
});

describe('getHintForCode', () => {
  it('points at --graph for a missing graph file', () => {
    expect(getHintForCode(new GraphFileNotFoundError('x').code)).toBe(
      'Pass --graph <file> or set graph_file in .deppaths/config.json.',
    );
  });

  it('has no hint for unknown codes', () => {
    expect(getHintForCode('SOMETHING_ELSE')).toBeUndefined();
  });
});

describe('handleCommandError', () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    vi.restoreAllMocks();
    configureLogger({ level: 'info', output: process.stderr, file: null });
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it('flushes the log file before exiting with status 1', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deppaths-error-test-'));
    const logFile = path.join(tmpDir, 'logs', 'deppaths.log');
    configureLogger({ level: 'info', file: logFile, output: { write: () => true } });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });

    createLogger('paths').info('Found 2 source nodes and 1 destination nodes');

    await expect(
      handleCommandError(new MissingOptionError('to'), {
        json: false,
        verbose: false,
        quiet: false,
        cwd: tmpDir,
      }),
    ).rejects.toThrow('process.exit(1)');
    expect(exit).toHaveBeenCalledWith(1);
    expect(fs.readFileSync(logFile, 'utf-8')).toMatch(
      /^\[.+\] INFO  \[paths\] Found 2 source nodes and 1 destination nodes\n$/,
    );
  });
});
