/**
 * lineage init - Create .lineage/ with a default config and an empty database
 */

import { Command } from 'commander';
import { logLevelFor, resolveGlobalOptions } from '../utils/global-options.js';
import { LineageEngine } from '../../../core/engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold, formatDim } from '../output/formatter.js';
import { renderMcpConfigSnippets } from '../onboarding.js';
import type { InitResult, SeedResult } from '../../../shared/types.js';

interface InitOptions {
  force: boolean;
  seed: boolean;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Initialize a lineage store in the working directory')
    .option('-f, --force', 'Delete an existing .lineage directory and start over', false)
    .option('--seed', 'Load the example lineage after initializing', false)
    .action((options: InitOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const engine = new LineageEngine(globals.cwd, { logLevel: logLevelFor(globals) });

      try {
        const result = engine.initialize({ force: options.force });
        const seeded = options.seed ? engine.seedExample() : null;

        if (globals.json) {
          printJson({ ...result, seeded });
        } else if (!globals.quiet) {
          renderInit(result, seeded);
          if (result.created) {
            renderMcpConfigSnippets(globals.cwd, globals);
          }
        }
      } catch (error) {
        handleCommandError(error, globals);
      } finally {
        engine.close();
      }
    });
}

function renderInit(result: InitResult, seeded: SeedResult | null): void {
  process.stderr.write('\n');
  process.stderr.write(
    (result.created
      ? formatSuccess('Lineage store initialized')
      : formatSuccess('Lineage store already initialized')) + '\n',
  );
  process.stderr.write(`  ${formatBold('Directory:')} ${result.lineage_dir}\n`);
  process.stderr.write(`  ${formatBold('Database:')}  ${result.db_path}\n`);
  if (!result.created) {
    process.stderr.write(`  ${formatDim('Use --force to start over.')}\n`);
  }
  if (seeded) {
    process.stderr.write(
      `  ${formatBold('Seeded:')}    ${seeded.nodes_created} nodes, ${seeded.edges_created} edges, ` +
        `${seeded.column_mappings_created} column mappings, ${seeded.runs_created} runs\n`,
    );
  }
  process.stderr.write('\n');
}
