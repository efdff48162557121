/**
 * Graph file loading
 *
 * JSON or YAML:
 *   targets:
 *     "src/app:main":
 *       dependencies: ["src/lib:util"]
 *     "src/lib:util": ["3rdparty:yaml"]
 *     "3rdparty:yaml":
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { DependencyGraph } from './dependency-graph.js';
import { GraphFileNotFoundError, GraphParseError } from '../shared/errors.js';

const dependencyListSchema = z.array(z.string().min(1));

const targetSchema = z.union([
  dependencyListSchema,
  z.object({ dependencies: dependencyListSchema.default([]) }),
  z.null(),
]);

const graphDocumentSchema = z.object({
  targets: z.record(z.string().min(1), targetSchema),
});

type GraphFormat = 'json' | 'yaml';

export function detectGraphFormat(filepath: string): GraphFormat {
  const ext = path.extname(filepath).toLowerCase();
  return ext === '.json' ? 'json' : 'yaml';
}

/**
 * Parse and validate a graph document.
 */
export function parseGraphDocument(
  content: string,
  format: GraphFormat,
  filepath: string,
): DependencyGraph {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    throw new GraphParseError(
      err instanceof Error ? err.message : String(err),
      filepath,
      err instanceof Error ? err : undefined,
    );
  }

  const parsed = graphDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new GraphParseError(`${where}${issue?.message ?? 'invalid document'}`, filepath);
  }

  return new DependencyGraph(
    Object.entries(parsed.data.targets).map(([address, target]): [string, string[]] => [
      address,
      target === null ? [] : Array.isArray(target) ? target : target.dependencies,
    ]),
  );
}

export async function loadGraphFile(filepath: string): Promise<DependencyGraph> {
  let content: string;
  try {
    content = await readFile(filepath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) throw new GraphFileNotFoundError(filepath);
    throw new GraphParseError(
      `cannot be read (${err instanceof Error ? err.message : String(err)})`,
      filepath,
      err instanceof Error ? err : undefined,
    );
  }
  return parseGraphDocument(content, detectGraphFormat(filepath), filepath);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
