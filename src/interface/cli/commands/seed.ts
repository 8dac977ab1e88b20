/**
 * lineage seed - Load the example lineage
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/open-engine.js';
import { printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatSuccess } from '../output/formatter.js';

export function seedCommand(): Command {
  return new Command('seed')
    .description('Load the example lineage (or a fixture of the same shape)')
    .option('--fixture <path>', 'Seed fixture JSON file')
    .action(async (options: { fixture?: string }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const result = await withEngine(globals, (engine) => engine.seedExample(options.fixture));
        printResult(globals, result, (r) => {
          process.stderr.write('\n' + formatSuccess('Example lineage loaded') + '\n');
          process.stderr.write(`  ${formatBold('Nodes:')}   ${r.nodes_created}\n`);
          process.stderr.write(`  ${formatBold('Edges:')}   ${r.edges_created}\n`);
          process.stderr.write(`  ${formatBold('Columns:')} ${r.column_mappings_created}\n`);
          process.stderr.write(`  ${formatBold('Runs:')}    ${r.runs_created}\n\n`);
        });
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
