import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toMcpError } from '../errors.js';
import { toToolResult, type ToolEngine } from './shared.js';

export const GET_NODE_TOOL = 'lineage_get_node';

export const getNodeShape = {
  node: z.string().min(1).describe('Node id or qualified name'),
  include_edges: z
    .boolean()
    .default(true)
    .describe('Include every version of every edge touching the node'),
  include_deleted: z.boolean().default(false).describe('Also find a soft-deleted node'),
};

export type GetNodeInput = z.objectOutputType<typeof getNodeShape, z.ZodTypeAny>;

export function createGetNodeHandler(engine: ToolEngine) {
  return async (input: GetNodeInput): Promise<CallToolResult> => {
    const startTime = performance.now();
    try {
      const node = engine.getNode(input.node, { includeDeleted: input.include_deleted });
      const edges = input.include_edges ? engine.listEdges(node.id) : undefined;
      return toToolResult(GET_NODE_TOOL, { node, ...(edges ? { edges } : {}) }, startTime);
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerGetNodeTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    GET_NODE_TOOL,
    'Fetch one lineage node with its descriptive fields and, by default, its edge history.',
    getNodeShape,
    createGetNodeHandler(engine),
  );
}
