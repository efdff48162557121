/**
 * dep-paths error hierarchy
 */

export class DepPathsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DepPathsError';
  }
}

// --- Config ---

export class ConfigError extends DepPathsError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class MissingOptionError extends ConfigError {
  constructor(public readonly option: string) {
    super(`Must set --${option}`);
    this.name = 'MissingOptionError';
  }
}

// --- Selection ---

export class InvalidPatternError extends DepPathsError {
  constructor(pattern: string, reason: string) {
    super(`Invalid node pattern "${pattern}": ${reason}`, 'INVALID_PATTERN');
    this.name = 'InvalidPatternError';
  }
}

// --- Graph ---

export class GraphFileNotFoundError extends DepPathsError {
  constructor(filepath: string) {
    super(`Graph file not found: ${filepath}`, 'GRAPH_FILE_NOT_FOUND');
    this.name = 'GraphFileNotFoundError';
  }
}

export class GraphParseError extends DepPathsError {
  constructor(
    message: string,
    public readonly filepath: string,
    cause?: Error,
  ) {
    super(`Invalid graph file ${filepath}: ${message}`, 'GRAPH_PARSE_ERROR', cause);
    this.name = 'GraphParseError';
  }
}

export class UnknownNodeError extends DepPathsError {
  constructor(nodeId: string) {
    super(`Unknown node: ${nodeId}`, 'UNKNOWN_NODE');
    this.name = 'UnknownNodeError';
  }
}

// --- Cancellation ---

export class OperationAbortedError extends DepPathsError {
  constructor(reason = 'interrupted') {
    super(`Path search aborted (${reason})`, 'ABORTED');
    this.name = 'OperationAbortedError';
  }
}
