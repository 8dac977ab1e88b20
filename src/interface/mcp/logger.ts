/**
 * MCP serve-mode logging
 * stdout is reserved for MCP protocol (JSON-RPC)
 */

import { createLogger } from '../../shared/logger.js';

export const mcpLogger = createLogger('MCP');

/**
 * Route console.log/info to the stderr logger so a stray write cannot
 * corrupt the JSON-RPC stream
 */
export function interceptConsole(): void {
  console.log = (...args: unknown[]) => {
    mcpLogger.info(args.map(String).join(' '));
  };
  console.info = (...args: unknown[]) => {
    mcpLogger.info(args.map(String).join(' '));
  };
  // console.warn and console.error already write to stderr
}
