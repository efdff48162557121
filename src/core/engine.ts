/**
 * PathsEngine - Core Layer facade
 *
 * The CLI reaches the path search through this facade only.
 * Wires config, the graph file and the fan-out controllers together.
 */

import * as path from 'node:path';

import type { DepPathsConfig } from '../config/types.js';
import { loadConfig } from '../config/config.js';
import type { FindPathsInput, FindPathsOutput, NodeId } from '../shared/types.js';
import { MissingOptionError } from '../shared/errors.js';
import { configureLogger, createLogger, type LogLevel, type Logger } from '../shared/logger.js';
import type { AdjacencyProvider } from './paths/adjacency.js';
import { PairFanOut } from './paths/pair-fan-out.js';
import { RootFanOut } from './paths/root-fan-out.js';
import { createLoggerProgressSink, type ProgressSink } from './paths/progress.js';
import { loadGraphFile } from '../data/graph-file.js';
import { selectNodes, type NodeSource } from '../data/node-selector.js';

/** What the engine needs from a graph: node selection plus adjacency. */
export type PathsGraph = AdjacencyProvider & NodeSource;

export interface EngineOverrides {
  /** Graph file, relative to cwd; replaces config.graph_file */
  graphFile?: string;
  logLevel?: LogLevel;
}

/**
 * Both patterns are required; a blank one counts as missing.
 */
export function requirePathPatterns(input: Pick<FindPathsInput, 'from' | 'to'>): {
  from: string;
  to: string;
} {
  const from = input.from?.trim();
  if (!from) throw new MissingOptionError('from');
  const to = input.to?.trim();
  if (!to) throw new MissingOptionError('to');
  return { from, to };
}

export class PathsEngine {
  private readonly logger: Logger;
  private readonly progress: ProgressSink;

  constructor(
    private readonly graph: PathsGraph,
    private readonly config: DepPathsConfig,
    progress?: ProgressSink,
  ) {
    this.logger = createLogger('PathsEngine');
    this.progress = progress ?? createLoggerProgressSink(createLogger('paths'));
  }

  /**
   * List every path between the nodes selected by `from` and those selected by `to`.
   * Both patterns are required and checked before any graph work.
   */
  async findPaths(input: FindPathsInput): Promise<FindPathsOutput> {
    const { from, to } = requirePathPatterns(input);

    this.logger.info(`Resolving source nodes from ${from}...`);
    const [roots, destinations] = await Promise.all([
      this.resolve(from),
      this.resolve(to),
    ]);
    this.logger.info(
      `Found ${roots.length} source nodes and ${destinations.length} destination nodes`,
    );

    const fanOut = new RootFanOut(
      new PairFanOut(this.graph, {
        progress: this.progress,
        edgeInterval: this.config.progress.edge_interval,
        pathInterval: this.config.progress.path_interval,
        maxPathsPerPair: input.maxPathsPerPair,
      }),
    );
    const paths = await fanOut.findAllPaths(roots, destinations, input.signal);

    return {
      paths: paths.map((p) => [...p]),
      source_count: roots.length,
      destination_count: destinations.length,
    };
  }

  private async resolve(pattern: string): Promise<NodeId[]> {
    return selectNodes(this.graph, pattern);
  }
}

/**
 * Load config and graph for a working directory and build an engine.
 */
export async function createPathsEngine(
  cwd: string,
  overrides: EngineOverrides = {},
): Promise<PathsEngine> {
  const config = loadConfig(cwd);
  configureLogger({
    level: overrides.logLevel ?? config.log.level,
    file: config.log.file ? path.resolve(cwd, config.log.file) : null,
  });

  const graphPath = path.resolve(cwd, overrides.graphFile ?? config.graph_file);
  const logger = createLogger('PathsEngine');
  logger.debug(`Loading graph from ${graphPath}`);
  const graph = await loadGraphFile(graphPath);
  logger.debug(`Loaded ${graph.size} nodes, ${graph.edgeCount} edges`);

  return new PathsEngine(graph, config);
}
