/**
 * Helpers shared by the lineage MCP tools
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { LineageEngine } from '../../../core/engine.js';
import { mcpLogger } from '../logger.js';

/** The engine surface the read-only tools need */
export type ToolEngine = Pick<
  LineageEngine,
  'traverse' | 'getNode' | 'listEdges' | 'listNodes' | 'getColumnLineage'
>;

export interface ToolExtra {
  signal?: AbortSignal;
}

const SLOW_TOOL_MS = 500;

/** Serialize a tool result, stamping how long the call took */
export function toToolResult(tool: string, data: object, startTime: number): CallToolResult {
  const queryTimeMs = Math.round(performance.now() - startTime);
  if (queryTimeMs > SLOW_TOOL_MS) {
    mcpLogger.warn(`Slow ${tool} (${queryTimeMs}ms)`);
  }
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({ ...data, query_time_ms: queryTimeMs }),
      },
    ],
  };
}
