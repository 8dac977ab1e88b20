import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { edgeTypeSchema, timestampSchema } from '../../../shared/schemas.js';
import { QUERY_DIRECTIONS } from '../../../shared/types.js';
import { toMcpError } from '../errors.js';
import { toToolResult, type ToolEngine, type ToolExtra } from './shared.js';

export const GET_GRAPH_TOOL = 'lineage_get_graph';

export const getGraphShape = {
  node: z.string().min(1).describe('Seed node id or qualified name'),
  direction: z
    .enum(QUERY_DIRECTIONS)
    .optional()
    .describe('upstream (what feeds the node), downstream (what it feeds) or both'),
  depth: z.number().int().min(1).optional().describe('Maximum number of hops from the seed'),
  as_of: timestampSchema
    .optional()
    .describe('Evaluate edge validity at this ISO 8601 instant (default: now)'),
  edge_types: z
    .array(edgeTypeSchema)
    .optional()
    .describe('Only follow edges of these types'),
  include_deleted: z
    .boolean()
    .default(false)
    .describe('Allow a soft-deleted seed and keep soft-deleted nodes in the result'),
};

export type GetGraphInput = z.objectOutputType<typeof getGraphShape, z.ZodTypeAny>;

export function createGetGraphHandler(engine: ToolEngine) {
  return async (input: GetGraphInput, extra: ToolExtra = {}): Promise<CallToolResult> => {
    const startTime = performance.now();
    try {
      const graph = await engine.traverse(
        {
          seed: input.node,
          direction: input.direction,
          depth: input.depth,
          as_of: input.as_of,
          edge_types: input.edge_types,
          include_deleted: input.include_deleted,
        },
        { signal: extra.signal },
      );
      return toToolResult(GET_GRAPH_TOOL, graph, startTime);
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerGetGraphTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    GET_GRAPH_TOOL,
    'Return the lineage subgraph around a node: every node reachable within the depth, ' +
      'with the hop count from the seed, and every edge valid at the as-of instant between them. ' +
      'Use it to answer where data comes from or what a change would break.',
    getGraphShape,
    createGetGraphHandler(engine),
  );
}
