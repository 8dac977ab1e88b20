/**
 * Register the lineage MCP tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolEngine } from './shared.js';
import { registerGetGraphTool } from './lineage-get-graph.js';
import { registerGetNodeTool } from './lineage-get-node.js';
import { registerListNodesTool } from './lineage-list-nodes.js';
import { registerGetColumnLineageTool } from './lineage-get-column-lineage.js';

export type { ToolEngine } from './shared.js';

export function registerAllTools(server: McpServer, engine: ToolEngine): void {
  registerGetGraphTool(server, engine);
  registerGetNodeTool(server, engine);
  registerListNodesTool(server, engine);
  registerGetColumnLineageTool(server, engine);
}
