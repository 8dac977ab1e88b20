import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toMcpError } from '../errors.js';
import { toToolResult, type ToolEngine } from './shared.js';

export const GET_COLUMN_LINEAGE_TOOL = 'lineage_get_column_lineage';

export const getColumnLineageShape = {
  edge_id: z.string().min(1).describe('Edge id, as returned by lineage_get_graph'),
};

export type GetColumnLineageInput = z.objectOutputType<typeof getColumnLineageShape, z.ZodTypeAny>;

export function createGetColumnLineageHandler(engine: ToolEngine) {
  return async (input: GetColumnLineageInput): Promise<CallToolResult> => {
    const startTime = performance.now();
    try {
      const result = engine.getColumnLineage(input.edge_id);
      return toToolResult(GET_COLUMN_LINEAGE_TOOL, result, startTime);
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerGetColumnLineageTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    GET_COLUMN_LINEAGE_TOOL,
    'List the column-level mappings carried by one edge.',
    getColumnLineageShape,
    createGetColumnLineageHandler(engine),
  );
}
