/**
 * dep-paths shared types
 * Used across the core, data and interface layers
 */

// --- Graph ---

/** Opaque node identifier, e.g. a build address such as `src/app:main` */
export type NodeId = string;

/** Root first, destination last. Never mutated once yielded. */
export type Path = readonly NodeId[];

/**
 * Edge scoped to a single BFS run.
 * `predecessor` is null for the synthetic starting edge of the root.
 */
export interface Edge {
  predecessor: NodeId | null;
  successor: NodeId;
}

/** Successor lists per node. Order is the tie-break among equal-length paths. */
export type AdjacencyMap = ReadonlyMap<NodeId, readonly NodeId[]>;

// --- Results ---

export interface PairPaths {
  root: NodeId;
  destination: NodeId;
  paths: Path[];
}

export interface RootPaths {
  root: NodeId;
  /** In destination input order */
  pairs: PairPaths[];
}

// --- Paths goal ---

export interface FindPathsInput {
  from?: string;
  to?: string;
  /** Stop pulling a pair's sequence after this many paths */
  maxPathsPerPair?: number;
  signal?: AbortSignal;
}

export interface FindPathsOutput {
  paths: string[][];
  source_count: number;
  destination_count: number;
}
