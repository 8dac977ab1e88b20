/**
 * lineage status - Display store status
 */

import { Command } from 'commander';
import { logLevelFor, resolveGlobalOptions } from '../utils/global-options.js';
import { createLineageEngine } from '../../../core/engine.js';
import { printJson, printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { renderStatus } from '../output/render.js';
import { formatHint, formatWarning } from '../output/formatter.js';

export function statusCommand(): Command {
  return new Command('status')
    .description('Display store status')
    .option('--check', 'Exit with non-zero code when the store is not initialized', false)
    .action((options: { check: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const engine = createLineageEngine(globals.cwd, { logLevel: logLevelFor(globals) });

      try {
        if (!engine.initialized) {
          if (globals.json) {
            printJson({ initialized: false });
          } else if (!globals.quiet) {
            process.stderr.write(`\n  ${formatWarning('not initialized')}\n`);
            process.stderr.write(`  ${formatHint("Run 'lineage init' first.")}\n\n`);
          }
          if (options.check) {
            process.exitCode = 1;
          }
          return;
        }

        printResult(globals, engine.getStatus(), renderStatus);
      } catch (error) {
        handleCommandError(error, globals);
      } finally {
        engine.close();
      }
    });
}
