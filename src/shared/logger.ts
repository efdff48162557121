/**
 * Diagnostic logger
 * stderr + file output. stdout is reserved for command results.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Anything with a `write(chunk)` method, e.g. process.stderr */
export interface LogOutput {
  write(chunk: string): unknown;
}

let globalLogLevel: LogLevel = 'info';
let diagnosticOutput: LogOutput = process.stderr;
let logFileStream: fs.WriteStream | null = null;

export function configureLogger(options: {
  level?: LogLevel;
  file?: string | null;
  output?: LogOutput;
}): void {
  if (options.level) {
    globalLogLevel = options.level;
  }
  if (options.output) {
    diagnosticOutput = options.output;
  }
  if (options.file !== undefined) {
    logFileStream?.end();
    logFileStream = null;
    if (options.file) {
      fs.mkdirSync(path.dirname(options.file), { recursive: true });
      logFileStream = fs.createWriteStream(options.file, { flags: 'a' });
    }
  }
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[globalLogLevel];
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  args: unknown[],
  now: Date = new Date(),
): string {
  const levelTag = level.toUpperCase().padEnd(5);
  const extra = args.length > 0
    ? ' ' + args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ')
    : '';
  return `[${now.toISOString()}] ${levelTag} ${message}${extra}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const line = formatLogLine(level, message, args) + '\n';
  diagnosticOutput.write(line);
  logFileStream?.write(line);
}

/** Ends the log file, resolving once buffered lines are flushed. */
export function closeLogger(): Promise<void> {
  const stream = logFileStream;
  logFileStream = null;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}

export function createLogger(prefix?: string): Logger {
  const p = prefix ? `[${prefix}] ` : '';
  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', p + message, args);
    },
    info(message: string, ...args: unknown[]) {
      write('info', p + message, args);
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', p + message, args);
    },
    error(message: string, ...args: unknown[]) {
      write('error', p + message, args);
    },
  };
}
