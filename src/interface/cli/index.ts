/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { initCommand } from './commands/init.js';
import { seedCommand } from './commands/seed.js';
import { nodeCommand } from './commands/node.js';
import { edgeCommand } from './commands/edge.js';
import { columnCommand } from './commands/column.js';
import { runCommand } from './commands/run.js';
import { graphCommand } from './commands/graph.js';
import { statusCommand } from './commands/status.js';
import { serveCommand } from './commands/serve.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('lineage')
    .description('Temporal data lineage graph - record and query where data comes from')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(initCommand());
  program.addCommand(seedCommand());
  program.addCommand(nodeCommand());
  program.addCommand(edgeCommand());
  program.addCommand(columnCommand());
  program.addCommand(runCommand());
  program.addCommand(graphCommand());
  program.addCommand(statusCommand());
  program.addCommand(serveCommand());
  program.addCommand(versionCommand());

  return program;
}
