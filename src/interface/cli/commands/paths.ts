/**
 * deppaths paths --from <pattern> --to <pattern> - List dependency paths
 */

import * as path from 'node:path';
import { Command } from 'commander';
import { logLevelFor, resolveGlobalOptions } from '../utils/global-options.js';
import { createPathsEngine, requirePathPatterns } from '../../../core/engine.js';
import { writeJsonOutput } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { ConfigError, OperationAbortedError } from '../../../shared/errors.js';

interface PathsCommandOptions {
  from?: string;
  to?: string;
  graph?: string;
  output?: string;
  maxPaths?: string;
}

export function parseMaxPaths(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`--max-paths must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function pathsCommand(): Command {
  return new Command('paths')
    .description(
      'List the paths between two node patterns, shortest first per pair. ' +
        'Either side may select a group of nodes, e.g. --from=src/app:main --to=src/lib::',
    )
    .option('--from <pattern>', 'The path starting nodes')
    .option('--to <pattern>', 'The path end nodes')
    .option('--graph <file>', 'Graph file (defaults to graph_file from config)')
    .option('--output <file>', 'Write the paths to a file instead of stdout')
    .option('--max-paths <n>', 'Stop after this many paths per source/destination pair')
    .action(async (options: PathsCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const controller = new AbortController();
      const onInterrupt = () => controller.abort(new OperationAbortedError('SIGINT'));
      process.once('SIGINT', onInterrupt);

      try {
        const { from, to } = requirePathPatterns(options);
        const maxPathsPerPair = parseMaxPaths(options.maxPaths);

        const engine = await createPathsEngine(globals.cwd, {
          graphFile: options.graph,
          logLevel: logLevelFor(globals),
        });
        const result = await engine.findPaths({
          from,
          to,
          maxPathsPerPair,
          signal: controller.signal,
        });

        await writeJsonOutput(
          result.paths,
          options.output ? path.resolve(globals.cwd, options.output) : undefined,
        );
      } catch (error) {
        await handleCommandError(error, globals);
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
