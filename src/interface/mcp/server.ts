/**
 * MCP Server initialization and transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools, type ToolEngine } from './tools/index.js';
import { interceptConsole, mcpLogger } from './logger.js';
import { getVersion } from '../cli/version.js';

export function createMcpServer(engine: ToolEngine): McpServer {
  const server = new McpServer({
    name: 'lineage',
    version: getVersion(),
  });
  registerAllTools(server, engine);
  return server;
}

export async function startMcpServer(engine: ToolEngine): Promise<McpServer> {
  // Intercept console.log to prevent stdout pollution
  interceptConsole();

  const server = createMcpServer(engine);
  await server.connect(new StdioServerTransport());

  mcpLogger.info('MCP Server started (stdio transport)');
  return server;
}
