/**
 * DependencyGraph - in-memory graph of declared targets and their dependencies.
 * Serves as the AdjacencyProvider for the path search.
 */

import type { AdjacencyProvider } from '../core/paths/adjacency.js';
import type { NodeId } from '../shared/types.js';
import { UnknownNodeError } from '../shared/errors.js';

export class DependencyGraph implements AdjacencyProvider {
  private readonly edges = new Map<NodeId, NodeId[]>();

  /**
   * @param targets declared dependencies per node, in declaration order.
   * Nodes that only appear as dependencies become implicit nodes without dependencies.
   */
  constructor(targets: Iterable<readonly [NodeId, readonly NodeId[]]>) {
    const seen = new Map<NodeId, Set<NodeId>>();
    for (const [node, dependencies] of targets) {
      const existing = this.edges.get(node) ?? [];
      let seenDeps = seen.get(node);
      if (!seenDeps) {
        seenDeps = new Set(existing);
        seen.set(node, seenDeps);
      }
      for (const dep of dependencies) {
        if (seenDeps.has(dep)) continue;
        seenDeps.add(dep);
        existing.push(dep);
      }
      this.edges.set(node, existing);
    }
    for (const dependencies of [...this.edges.values()]) {
      for (const dep of dependencies) {
        if (!this.edges.has(dep)) this.edges.set(dep, []);
      }
    }
  }

  /** All nodes, declared ones first, in declaration order */
  get nodes(): NodeId[] {
    return [...this.edges.keys()];
  }

  get size(): number {
    return this.edges.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const dependencies of this.edges.values()) count += dependencies.length;
    return count;
  }

  has(node: NodeId): boolean {
    return this.edges.has(node);
  }

  dependenciesOf(node: NodeId): readonly NodeId[] {
    const dependencies = this.edges.get(node);
    if (!dependencies) throw new UnknownNodeError(node);
    return dependencies;
  }

  /** Breadth-first reachable set, root first. */
  async closure(root: NodeId): Promise<NodeId[]> {
    if (!this.edges.has(root)) throw new UnknownNodeError(root);

    const seen = new Set<NodeId>([root]);
    const order: NodeId[] = [root];
    for (let i = 0; i < order.length; i++) {
      const node = order[i];
      if (node === undefined) break;
      for (const dep of this.edges.get(node) ?? []) {
        if (!seen.has(dep)) {
          seen.add(dep);
          order.push(dep);
        }
      }
    }
    return order;
  }

  async successors(nodes: readonly NodeId[]): Promise<Map<NodeId, NodeId[]>> {
    const result = new Map<NodeId, NodeId[]>();
    for (const node of nodes) {
      result.set(node, [...this.dependenciesOf(node)]);
    }
    return result;
  }
}
