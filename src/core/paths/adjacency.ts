/**
 * AdjacencyProvider - the graph oracle consumed by the path search
 */

import type { AdjacencyMap, NodeId } from '../../shared/types.js';
import type { ProgressSink } from './progress.js';

/**
 * Pure, side-effect-free view of the dependency graph.
 * Resolving it may be expensive, so it is queried once per root.
 */
export interface AdjacencyProvider {
  /** Every node reachable from `root`, including `root` itself */
  closure(root: NodeId): Promise<NodeId[]>;
  /** Immediate successors of each requested node, in edge order */
  successors(nodes: readonly NodeId[]): Promise<Map<NodeId, NodeId[]>>;
}

/**
 * Build the adjacency map for everything reachable from `root`.
 * Provider failures propagate unchanged.
 */
export async function resolveAdjacencyMap(
  provider: AdjacencyProvider,
  root: NodeId,
  progress: ProgressSink,
): Promise<AdjacencyMap> {
  progress.notify(`Loading dependencies for ${root}...`);
  const closure = await provider.closure(root);

  progress.notify(`Resolving ${closure.length} nodes...`);
  const successors = await provider.successors(closure);

  const adjacency = new Map<NodeId, readonly NodeId[]>();
  for (const node of closure) {
    adjacency.set(node, Object.freeze([...(successors.get(node) ?? [])]));
  }
  return adjacency;
}
