/**
 * 3-layer error display: Error / Cause / Hint
 */

import pc from 'picocolors';
import { formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { DepPathsError } from '../../../shared/errors.js';
import { closeLogger } from '../../../shared/logger.js';

export interface ErrorDisplay {
  message: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof DepPathsError) {
    return {
      message: error.message,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return 'Pass both --from and --to, and check .deppaths/config.json.';
    case 'INVALID_PATTERN':
      return 'Use an address (src/app:main), a directory (src/app:) or a subtree (src/app::).';
    case 'GRAPH_FILE_NOT_FOUND':
      return 'Pass --graph <file> or set graph_file in .deppaths/config.json.';
    case 'GRAPH_PARSE_ERROR':
      return 'The graph file needs a top-level "targets" mapping of address to dependencies.';
    case 'UNKNOWN_NODE':
      return 'Check the address against the graph file.';
    default:
      return undefined;
  }
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      message: error.message,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(pc.dim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export async function handleCommandError(error: unknown, globals: GlobalOptions): Promise<never> {
  renderError(toErrorDisplay(error), globals);
  await closeLogger();
  process.exit(1);
}
