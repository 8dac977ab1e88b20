/**
 * lineage column - add | list
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/open-engine.js';
import { parseJsonObject, parseNumber } from '../utils/parse-options.js';
import { printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { renderColumns } from '../output/render.js';
import { formatSuccess } from '../output/formatter.js';
import type { JsonObject } from '../../../shared/types.js';

interface AddOptions {
  transformation?: string;
  transformationType?: string;
  confidence?: number;
  metadata?: JsonObject;
}

function addCommand(): Command {
  return new Command('add')
    .description('Map a source column to a target column on an edge')
    .argument('<edge-id>', 'Edge id')
    .argument('<source-column>', 'Column on the source node')
    .argument('<target-column>', 'Column on the target node')
    .option('--transformation <expr>', 'Expression producing the target column')
    .option('--transformation-type <type>', 'e.g. passthrough, cast, aggregate')
    .option('--confidence <score>', 'Confidence between 0 and 1', parseNumber)
    .option('--metadata <json>', 'Mapping metadata as a JSON object', parseJsonObject)
    .action(
      async (
        edgeId: string,
        sourceColumn: string,
        targetColumn: string,
        options: AddOptions,
        cmd: Command,
      ) => {
        const globals = resolveGlobalOptions(cmd);
        try {
          const column = await withEngine(globals, (engine) =>
            engine.addColumnLineage(edgeId, {
              source_column: sourceColumn,
              target_column: targetColumn,
              transformation: options.transformation,
              transformation_type: options.transformationType,
              confidence: options.confidence,
              metadata: options.metadata,
            }),
          );
          printResult(globals, column, (c) => {
            process.stderr.write(
              formatSuccess(`Column mapping created: ${c.source_column} -> ${c.target_column}`) + '\n',
            );
          });
        } catch (error) {
          handleCommandError(error, globals);
        }
      },
    );
}

function listCommand(): Command {
  return new Command('list')
    .description('List the column mappings of an edge')
    .argument('<edge-id>', 'Edge id')
    .action(async (edgeId: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const output = await withEngine(globals, (engine) => engine.getColumnLineage(edgeId));
        printResult(globals, output, renderColumns);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

export function columnCommand(): Command {
  return new Command('column')
    .description('Manage column-level lineage')
    .addCommand(addCommand())
    .addCommand(listCommand());
}
