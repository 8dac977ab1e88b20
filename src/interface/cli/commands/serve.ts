/**
 * lineage serve - Start the MCP Server over stdio as a persistent process
 */

import { Command } from 'commander';
import { resolveGlobalOptions, logLevelFor } from '../utils/global-options.js';
import { createLineageEngine } from '../../../core/engine.js';
import { resolveConfigPath } from '../../../config/config.js';
import { ConfigNotFoundError, toError } from '../../../shared/errors.js';
import { handleCommandError } from '../output/error-display.js';
import { startMcpServer } from '../../mcp/server.js';
import { mcpLogger } from '../../mcp/logger.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Serve read-only lineage queries to MCP clients over stdio')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = createLineageEngine(globals.cwd, { logLevel: logLevelFor(globals) });
        if (!engine.initialized) {
          throw new ConfigNotFoundError(resolveConfigPath(globals.cwd));
        }

        // Occupies stdout from here on
        const server = await startMcpServer(engine);

        let shuttingDown = false;

        const gracefulShutdown = async (signal: string) => {
          if (shuttingDown) return;
          shuttingDown = true;

          mcpLogger.info(`Received ${signal}. Shutting down...`);

          try {
            await server.close();
            engine.close();
          } catch (error) {
            mcpLogger.error('Shutdown failed', toError(error));
            process.exit(1);
          }

          process.exit(0);
        };

        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
