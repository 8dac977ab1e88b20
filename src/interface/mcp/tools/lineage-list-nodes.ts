import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { nodeTypeSchema } from '../../../shared/schemas.js';
import { toMcpError } from '../errors.js';
import { toToolResult, type ToolEngine } from './shared.js';

export const LIST_NODES_TOOL = 'lineage_list_nodes';

export const listNodesShape = {
  type: nodeTypeSchema.optional().describe('Only nodes of this type'),
  limit: z.number().int().min(1).max(1000).default(100).describe('Maximum number of nodes'),
  offset: z.number().int().min(0).default(0).describe('Number of nodes to skip'),
  include_deleted: z.boolean().default(false).describe('Include soft-deleted nodes'),
};

export type ListNodesToolInput = z.objectOutputType<typeof listNodesShape, z.ZodTypeAny>;

export function createListNodesHandler(engine: ToolEngine) {
  return async (input: ListNodesToolInput): Promise<CallToolResult> => {
    const startTime = performance.now();
    try {
      const result = engine.listNodes({
        type: input.type,
        limit: input.limit,
        offset: input.offset,
        include_deleted: input.include_deleted,
      });
      return toToolResult(LIST_NODES_TOOL, result, startTime);
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerListNodesTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    LIST_NODES_TOOL,
    'List lineage nodes, newest first. Use it to find the id or qualified name of a seed.',
    listNodesShape,
    createListNodesHandler(engine),
  );
}
