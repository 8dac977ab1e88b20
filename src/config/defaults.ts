import type { LineageConfig } from './types.js';

export const DEFAULT_CONFIG: LineageConfig = {
  traversal: {
    default_depth: 3,
    max_depth: 10,
    default_direction: 'both',
    timeout_ms: 0,
    slow_query_ms: 100,
  },
  runs: {
    default_status: 'created',
  },
  log: {
    level: 'info',
    file: null,
  },
};
