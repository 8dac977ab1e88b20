/**
 * Lineage error hierarchy
 */

export class LineageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LineageError';
  }
}

// --- Config ---

export class ConfigError extends LineageError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'lineage init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

// --- Database ---

export class DatabaseError extends LineageError {
  constructor(message: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', cause);
    this.name = 'DatabaseError';
  }
}

export class MigrationError extends DatabaseError {
  constructor(version: number, cause?: Error) {
    super(`Migration to version ${version} failed`, cause);
    this.name = 'MigrationError';
  }
}

export class EngineNotInitializedError extends LineageError {
  constructor() {
    super(
      "Lineage engine not initialized. Run 'lineage init' or call loadExisting() first.",
      'NOT_INITIALIZED',
    );
    this.name = 'EngineNotInitializedError';
  }
}

// --- Lookups ---

export class NodeNotFoundError extends LineageError {
  constructor(identifier: string) {
    super(`Node not found: ${identifier}`, 'NODE_NOT_FOUND');
    this.name = 'NodeNotFoundError';
  }
}

export class EdgeNotFoundError extends LineageError {
  constructor(id: string) {
    super(`Edge not found: ${id}`, 'EDGE_NOT_FOUND');
    this.name = 'EdgeNotFoundError';
  }
}

export class RunNotFoundError extends LineageError {
  constructor(runId: string) {
    super(`Run not found: ${runId}`, 'RUN_NOT_FOUND');
    this.name = 'RunNotFoundError';
  }
}

// --- Requests ---

export class InvalidArgumentError extends LineageError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class ConflictError extends LineageError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFLICT', cause);
    this.name = 'ConflictError';
  }
}

// --- Traversal ---

export class StoreUnavailableError extends LineageError {
  constructor(operation: string, cause?: Error) {
    super(
      `Graph store unavailable during ${operation}${cause ? `: ${cause.message}` : ''}`,
      'STORE_UNAVAILABLE',
      cause,
    );
    this.name = 'StoreUnavailableError';
  }
}

export class TraversalAbortedError extends LineageError {
  constructor(reason: 'signal' | 'deadline', depth: number) {
    super(
      reason === 'deadline'
        ? `Traversal exceeded its deadline before depth ${depth}`
        : `Traversal aborted before depth ${depth}`,
      'TRAVERSAL_ABORTED',
    );
    this.name = 'TraversalAbortedError';
  }
}

/** Normalize an unknown thrown value into an Error for `cause` chaining */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
