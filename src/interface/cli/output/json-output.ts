/**
 * JSON output: the primary result on stdout or in an output file
 */

import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}

export function printJson(data: unknown): void {
  process.stdout.write(formatJson(data));
}

export function printJsonError(error: {
  message: string;
  cause?: string;
  hint?: string;
}): void {
  printJson({ error });
}

/**
 * Write to `outputFile` when given, otherwise to stdout.
 */
export async function writeJsonOutput(data: unknown, outputFile?: string): Promise<void> {
  if (!outputFile) {
    printJson(data);
    return;
  }
  await mkdir(path.dirname(outputFile), { recursive: true });
  await writeFile(outputFile, formatJson(data), 'utf-8');
}
