/**
 * Library entry point
 */

export {
  findPathsBreadthFirst,
  streamPathsBreadthFirst,
  VisitedEdges,
  type FindPathsOptions,
  type StreamPathsOptions,
} from './core/paths/path-finder.js';
export { PairFanOut, type PathSearchOptions } from './core/paths/pair-fan-out.js';
export { RootFanOut, flattenRootPaths } from './core/paths/root-fan-out.js';
export { resolveAdjacencyMap, type AdjacencyProvider } from './core/paths/adjacency.js';
export {
  createLoggerProgressSink,
  guardProgressSink,
  silentProgressSink,
  type ProgressSink,
} from './core/paths/progress.js';
export { PathsEngine, createPathsEngine, requirePathPatterns } from './core/engine.js';
export { DependencyGraph } from './data/dependency-graph.js';
export { loadGraphFile, parseGraphDocument } from './data/graph-file.js';
export { selectNodes, parseNodePattern } from './data/node-selector.js';
export * from './shared/errors.js';
export type * from './shared/types.js';
