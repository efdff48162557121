/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { DepPathsConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError } from '../shared/errors.js';

const CONFIG_DIR = '.deppaths';
const CONFIG_FILE = 'config.json';

const configFileSchema = z.object({
  graph_file: z.string().min(1).optional(),
  progress: z
    .object({
      edge_interval: z.number().int().positive().optional(),
      path_interval: z.number().int().positive().optional(),
    })
    .optional(),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      file: z.string().nullable().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Resolve the config.json path.
 */
export function resolveConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load config from disk, merging with defaults.
 * A missing config file is not an error.
 */
export function loadConfig(cwd: string): DepPathsConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    return mergeWithDefaults({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(
      `Invalid config in ${configPath}: ${where}${issue?.message ?? 'unknown problem'}`,
    );
  }
  return mergeWithDefaults(parsed.data);
}

/**
 * Merge a partial config with defaults.
 */
export function mergeWithDefaults(partial: ConfigFile): DepPathsConfig {
  return {
    graph_file: partial.graph_file ?? DEFAULT_CONFIG.graph_file,
    progress: {
      edge_interval: partial.progress?.edge_interval ?? DEFAULT_CONFIG.progress.edge_interval,
      path_interval: partial.progress?.path_interval ?? DEFAULT_CONFIG.progress.path_interval,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file ?? DEFAULT_CONFIG.log.file,
    },
  };
}
