/**
 * Lineage configuration types
 */

import type { LogLevel } from '../shared/logger.js';
import type { QueryDirection, RunStatus } from '../shared/types.js';

export interface LineageConfig {
  /** Graph traversal limits and defaults */
  traversal: {
    default_depth: number;
    /** Upper bound accepted for a traversal depth */
    max_depth: number;
    default_direction: QueryDirection;
    /** Per-traversal deadline in ms, 0 disables it */
    timeout_ms: number;
    /** Traversals slower than this are logged as warnings */
    slow_query_ms: number;
  };

  runs: {
    default_status: RunStatus;
  };

  log: {
    level: LogLevel;
    file: string | null;
  };
}
