/**
 * MCP client configuration snippet shown after init
 */

import { resolve } from 'node:path';
import { formatBold, formatDim, indent } from './output/formatter.js';
import type { GlobalOptions } from './utils/global-options.js';

export interface McpServerEntry {
  command: string;
  args: string[];
}

export function generateMcpConfig(projectPath: string): { mcpServers: Record<string, McpServerEntry> } {
  return {
    mcpServers: {
      lineage: {
        command: 'lineage',
        args: ['serve', '--cwd', resolve(projectPath)],
      },
    },
  };
}

export function renderMcpConfigSnippets(
  projectPath: string,
  globals: GlobalOptions,
): void {
  if (globals.json || globals.quiet) return;

  const divider = '─'.repeat(65);
  const output = `
  ${formatDim(`── MCP Configuration ${divider.slice(21)}`)}

  ${formatBold('Add to your MCP client configuration')}:
${indent(JSON.stringify(generateMcpConfig(projectPath), null, 2), 4)}

  ${formatDim(divider)}
`;

  process.stderr.write(output);
}
