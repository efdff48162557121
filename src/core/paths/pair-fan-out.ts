/**
 * PairFanOut - one root, many destinations.
 *
 * The adjacency map is resolved once for the root and shared read-only by
 * one path search per destination.
 */

import type { AdjacencyMap, NodeId, PairPaths, Path, RootPaths } from '../../shared/types.js';
import { uniqueInOrder } from '../../shared/collections.js';
import { gather } from '../../shared/concurrency.js';
import { createLogger } from '../../shared/logger.js';
import { resolveAdjacencyMap, type AdjacencyProvider } from './adjacency.js';
import { streamPathsBreadthFirst } from './path-finder.js';
import { guardProgressSink, silentProgressSink, type ProgressSink } from './progress.js';

const logger = createLogger('PairFanOut');

export interface PathSearchOptions {
  progress?: ProgressSink;
  edgeInterval?: number;
  pathInterval?: number;
  /** Stop pulling a pair's paths after this many */
  maxPathsPerPair?: number;
  /** Hand control back to the event loop after this many dequeued partial paths */
  yieldInterval?: number;
}

export class PairFanOut {
  private readonly progress: ProgressSink;

  constructor(
    private readonly provider: AdjacencyProvider,
    private readonly options: PathSearchOptions = {},
  ) {
    this.progress = guardProgressSink(options.progress ?? silentProgressSink, logger);
  }

  async findAllPaths(
    root: NodeId,
    destinations: Iterable<NodeId>,
    signal?: AbortSignal,
  ): Promise<RootPaths> {
    signal?.throwIfAborted();
    const adjacency = await resolveAdjacencyMap(this.provider, root, this.progress);
    signal?.throwIfAborted();

    const targets = uniqueInOrder(destinations);
    this.progress.notify(`Finding paths from ${root} to ${targets.length} destinations...`);

    const pairs = await gather(
      targets,
      (destination, taskSignal) => this.collectPair(adjacency, root, destination, taskSignal),
      signal,
    );
    logger.debug(`Finished ${root}`, {
      destinations: pairs.length,
      paths: pairs.reduce((sum, pair) => sum + pair.paths.length, 0),
    });
    return { root, pairs };
  }

  private async collectPair(
    adjacency: AdjacencyMap,
    root: NodeId,
    destination: NodeId,
    signal: AbortSignal,
  ): Promise<PairPaths> {
    const limit = this.options.maxPathsPerPair ?? Number.POSITIVE_INFINITY;
    const paths: Path[] = [];

    if (limit > 0) {
      const search = streamPathsBreadthFirst(adjacency, root, destination, {
        progress: this.progress,
        edgeInterval: this.options.edgeInterval,
        pathInterval: this.options.pathInterval,
        yieldInterval: this.options.yieldInterval,
        signal,
      });
      for await (const path of search) {
        paths.push(path);
        if (paths.length >= limit) break;
      }
    }

    signal.throwIfAborted();
    return { root, destination, paths };
  }
}
