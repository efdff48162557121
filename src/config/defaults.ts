import type { DepPathsConfig } from './types.js';

export const DEFAULT_CONFIG: DepPathsConfig = {
  graph_file: 'deps.graph.yaml',
  progress: {
    edge_interval: 1000,
    path_interval: 100,
  },
  log: {
    level: 'info',
    file: null,
  },
};
