/**
 * PathFinder - breadth-first enumeration of every path from a root to a destination.
 *
 * Paths come out shortest first. Among equal-length paths the order follows
 * the successor order of the adjacency map and the order in which shorter
 * paths were dequeued. Each edge is expanded at most once per run, so the
 * search terminates on cyclic graphs. Paths are not guaranteed to be simple:
 * a node may reappear when it is reached again through a different incoming edge.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { AdjacencyMap, Edge, NodeId, Path } from '../../shared/types.js';
import { createLogger } from '../../shared/logger.js';
import { guardProgressSink, silentProgressSink, type ProgressSink } from './progress.js';

export const DEFAULT_EDGE_INTERVAL = 1000;
export const DEFAULT_PATH_INTERVAL = 100;
const DEFAULT_YIELD_INTERVAL = 256;

const logger = createLogger('PathFinder');

export interface FindPathsOptions {
  progress?: ProgressSink;
  /** Notify after this many newly expanded edges */
  edgeInterval?: number;
  /** Notify on every multiple of this many found paths */
  pathInterval?: number;
  /** Checked before every dequeue */
  signal?: AbortSignal;
}

export interface StreamPathsOptions extends FindPathsOptions {
  /** Hand control back to the event loop after this many dequeues */
  yieldInterval?: number;
}

type SearchStep = { kind: 'path'; path: Path } | { kind: 'checkpoint' };

/**
 * Edges already expanded during one run.
 * Keyed by predecessor, then successor, so ids never need to be joined into one string.
 */
export class VisitedEdges {
  private readonly bySource = new Map<NodeId | null, Set<NodeId>>();
  private count = 0;

  has(edge: Edge): boolean {
    return this.bySource.get(edge.predecessor)?.has(edge.successor) ?? false;
  }

  add(edge: Edge): void {
    let successors = this.bySource.get(edge.predecessor);
    if (!successors) {
      successors = new Set();
      this.bySource.set(edge.predecessor, successors);
    }
    if (!successors.has(edge.successor)) {
      successors.add(edge.successor);
      this.count++;
    }
  }

  get size(): number {
    return this.count;
  }
}

/** Incoming edge of the last node of a partial path. */
export function lastEdge(path: Path): Edge {
  const successor = path[path.length - 1];
  if (successor === undefined) {
    throw new RangeError('A path has at least one node');
  }
  return {
    predecessor: path.length > 1 ? (path[path.length - 2] ?? null) : null,
    successor,
  };
}

/**
 * Lazily yields the paths from `root` to `destination`.
 * Stopping iteration (or aborting the signal) stops further edge expansion.
 */
export function* findPathsBreadthFirst(
  adjacency: AdjacencyMap,
  root: NodeId,
  destination: NodeId,
  options: FindPathsOptions = {},
): Generator<Path, void, undefined> {
  for (const step of searchSteps(adjacency, root, destination, options, 0)) {
    if (step.kind === 'path') yield step.path;
  }
}

/**
 * Same search as findPathsBreadthFirst, but awaits a macrotask every
 * `yieldInterval` dequeues so timers, signal handlers and sibling searches
 * run while a long search is still expanding.
 */
export async function* streamPathsBreadthFirst(
  adjacency: AdjacencyMap,
  root: NodeId,
  destination: NodeId,
  options: StreamPathsOptions = {},
): AsyncGenerator<Path, void, undefined> {
  const yieldInterval = options.yieldInterval ?? DEFAULT_YIELD_INTERVAL;
  for (const step of searchSteps(adjacency, root, destination, options, yieldInterval)) {
    if (step.kind === 'path') {
      yield step.path;
    } else {
      await yieldToEventLoop();
    }
  }
}

/** A checkpoint step comes before every `checkpointEvery`-th dequeue after the first; 0 disables them. */
function* searchSteps(
  adjacency: AdjacencyMap,
  root: NodeId,
  destination: NodeId,
  options: FindPathsOptions,
  checkpointEvery: number,
): Generator<SearchStep, void, undefined> {
  if (root === destination) {
    yield { kind: 'path', path: [root] };
    return;
  }

  const progress = guardProgressSink(options.progress ?? silentProgressSink, logger);
  const edgeInterval = options.edgeInterval ?? DEFAULT_EDGE_INTERVAL;
  const pathInterval = options.pathInterval ?? DEFAULT_PATH_INTERVAL;
  const signal = options.signal;

  const visited = new VisitedEdges();
  // FIFO: array with a moving head, compacted once the consumed prefix dominates
  const queue: Path[] = [[root]];
  let head = 0;
  let dequeued = 0;
  let pathsFound = 0;
  let edgesVisited = 0;
  let lastProgressUpdate = 0;

  while (head < queue.length) {
    if (checkpointEvery > 0 && dequeued > 0 && dequeued % checkpointEvery === 0) {
      yield { kind: 'checkpoint' };
    }
    if (signal?.aborted) return;

    const current = queue[head];
    head++;
    dequeued++;
    if (head > 1024 && head * 2 > queue.length) {
      queue.splice(0, head);
      head = 0;
    }
    if (current === undefined) continue;

    const edge = lastEdge(current);
    if (visited.has(edge)) continue;
    visited.add(edge);

    edgesVisited++;
    if (edgesVisited - lastProgressUpdate >= edgeInterval) {
      progress.notify(`found ${pathsFound} paths, visited ${edgesVisited} edges`);
      lastProgressUpdate = edgesVisited;
    }

    for (const successor of adjacency.get(edge.successor) ?? []) {
      const extended: Path = [...current, successor];
      if (successor === destination) {
        pathsFound++;
        if (pathsFound % pathInterval === 0) {
          progress.notify(`found ${pathsFound} paths so far`);
        }
        yield { kind: 'path', path: extended };
      } else {
        queue.push(extended);
      }
    }
  }
}
