/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';

export function formatError(message: string): string {
  return pc.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return pc.cyan(`Hint: ${message}`);
}
