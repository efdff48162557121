/**
 * RootFanOut - many roots, many destinations.
 * Each root resolves its own adjacency map through a PairFanOut run.
 */

import type { NodeId, Path, RootPaths } from '../../shared/types.js';
import { uniqueInOrder } from '../../shared/collections.js';
import { gather } from '../../shared/concurrency.js';
import type { PairFanOut } from './pair-fan-out.js';

/**
 * Flatten by root order, then destination order, then discovery order.
 * Shortest-first holds within a pair only.
 */
export function flattenRootPaths(groups: readonly RootPaths[]): Path[] {
  const flat: Path[] = [];
  for (const group of groups) {
    for (const pair of group.pairs) {
      flat.push(...pair.paths);
    }
  }
  return flat;
}

export class RootFanOut {
  constructor(private readonly pairFanOut: PairFanOut) {}

  /** Results grouped per root, in root input order. */
  async findGrouped(
    roots: Iterable<NodeId>,
    destinations: Iterable<NodeId>,
    signal?: AbortSignal,
  ): Promise<RootPaths[]> {
    const targets = uniqueInOrder(destinations);
    return gather(
      uniqueInOrder(roots),
      (root, taskSignal) => this.pairFanOut.findAllPaths(root, targets, taskSignal),
      signal,
    );
  }

  async findAllPaths(
    roots: Iterable<NodeId>,
    destinations: Iterable<NodeId>,
    signal?: AbortSignal,
  ): Promise<Path[]> {
    return flattenRootPaths(await this.findGrouped(roots, destinations, signal));
  }
}
