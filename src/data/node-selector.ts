/**
 * Node pattern resolution
 *
 * Address form: `<dir>:<name>`, e.g. `src/app:main`.
 *   `::`        every node
 *   `<dir>::`   nodes in <dir> or any directory below it
 *   `<dir>:`    nodes directly in <dir>
 *   otherwise   the node with exactly that address
 */

import type { NodeId } from '../shared/types.js';
import { InvalidPatternError } from '../shared/errors.js';

export interface NodeSource {
  readonly nodes: NodeId[];
}

export type NodePattern =
  | { kind: 'all' }
  | { kind: 'recursive'; dir: string }
  | { kind: 'directory'; dir: string }
  | { kind: 'address'; address: string };

export function parseNodePattern(raw: string): NodePattern {
  const pattern = raw.trim();
  if (pattern.length === 0) {
    throw new InvalidPatternError(raw, 'pattern is empty');
  }
  if (pattern === '::') return { kind: 'all' };
  if (pattern.endsWith('::')) {
    return { kind: 'recursive', dir: trimSlashes(pattern.slice(0, -2)) };
  }
  if (pattern.endsWith(':')) {
    return { kind: 'directory', dir: trimSlashes(pattern.slice(0, -1)) };
  }
  return { kind: 'address', address: pattern };
}

/** Directory part of an address: everything before the last `:`. */
export function addressDirectory(address: NodeId): string {
  const colon = address.lastIndexOf(':');
  return trimSlashes(colon >= 0 ? address.slice(0, colon) : address);
}

function trimSlashes(dir: string): string {
  return dir.replace(/^\/+|\/+$/g, '');
}

export function matchesPattern(node: NodeId, pattern: NodePattern): boolean {
  switch (pattern.kind) {
    case 'all':
      return true;
    case 'recursive': {
      if (pattern.dir === '') return true;
      const dir = addressDirectory(node);
      return dir === pattern.dir || dir.startsWith(pattern.dir + '/');
    }
    case 'directory':
      return addressDirectory(node) === pattern.dir;
    case 'address':
      return node === pattern.address;
  }
}

/**
 * Resolve a pattern against a graph. Zero matches is an empty result, not an error.
 */
export function selectNodes(source: NodeSource, raw: string): NodeId[] {
  const pattern = parseNodePattern(raw);
  return source.nodes.filter((node) => matchesPattern(node, pattern));
}
