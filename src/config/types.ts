/**
 * Configuration types
 */

import type { LogLevel } from '../shared/logger.js';

export interface DepPathsConfig {
  /** Graph document, relative to the working directory */
  graph_file: string;

  /** Progress notification thresholds */
  progress: {
    /** Notify after this many newly expanded edges */
    edge_interval: number;
    /** Notify on every multiple of this many found paths */
    path_interval: number;
  };

  log: {
    level: LogLevel;
    file: string | null;
  };
}
