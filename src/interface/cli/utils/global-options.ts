/**
 * Global CLI options shared across all commands
 */

import type { Command } from 'commander';
import type { LogLevel } from '../../../shared/logger.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  quiet: boolean;
  cwd: string;
}

export function addGlobalOptions(program: Command): void {
  program
    .option('--json', 'Report errors as JSON', false)
    .option('--no-color', 'Disable color output')
    .option('-v, --verbose', 'Debug logging and stack traces', false)
    .option('-q, --quiet', 'Only warnings and errors on stderr', false)
    .option('--cwd <path>', 'Set working directory', process.cwd());
}

export function resolveGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<{
    json?: boolean;
    verbose?: boolean;
    quiet?: boolean;
    cwd?: string;
  }>();
  return {
    json: opts.json ?? false,
    verbose: opts.verbose ?? false,
    quiet: opts.quiet ?? false,
    cwd: opts.cwd ?? process.cwd(),
  };
}

/** Log level implied by --verbose / --quiet, if any. */
export function logLevelFor(globals: GlobalOptions): LogLevel | undefined {
  if (globals.verbose) return 'debug';
  if (globals.quiet) return 'warn';
  return undefined;
}
