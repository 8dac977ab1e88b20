/**
 * lineage edge - add | get | close | list
 */

import { Command, Option } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/open-engine.js';
import { parseJsonObject } from '../utils/parse-options.js';
import { printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { renderEdge, renderEdgeList } from '../output/render.js';
import { formatSuccess } from '../output/formatter.js';
import { KNOWN_EDGE_TYPES, type EdgeType, type JsonObject } from '../../../shared/types.js';

export const EDGE_TYPE_CHOICES: readonly EdgeType[] = [...KNOWN_EDGE_TYPES, 'other'];

interface AddOptions {
  type: EdgeType;
  metadata?: JsonObject;
  validFrom?: string;
  createdBy?: string;
  supersede: boolean;
}

function addCommand(): Command {
  return new Command('add')
    .description('Record that <source> feeds <target>')
    .argument('<source>', 'Source node id or qualified name')
    .argument('<target>', 'Target node id or qualified name')
    .addOption(
      new Option('--type <edge-type>', 'Edge type').choices(EDGE_TYPE_CHOICES).makeOptionMandatory(),
    )
    .option('--metadata <json>', 'Edge metadata as a JSON object', parseJsonObject)
    .option('--valid-from <timestamp>', 'Start of validity (ISO 8601, default now)')
    .option('--created-by <who>', 'Who or what recorded the edge')
    .option('--supersede', 'Close the active edge with the same source, target and type', false)
    .action(async (source: string, target: string, options: AddOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const result = await withEngine(globals, (engine) =>
          engine.createEdge(
            {
              source,
              target,
              edge_type: options.type,
              metadata: options.metadata,
              valid_from: options.validFrom,
              created_by: options.createdBy,
            },
            { supersede: options.supersede },
          ),
        );
        printResult(globals, result, (r) => {
          process.stderr.write(formatSuccess(`Edge created: ${r.edge.id}`) + '\n');
          if (r.superseded) {
            process.stderr.write(
              formatSuccess(`Closed ${r.superseded.id} at ${r.superseded.valid_to ?? ''}`) + '\n',
            );
          }
          renderEdge(r.edge);
        });
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function getCommand(): Command {
  return new Command('get')
    .description('Show an edge')
    .argument('<edge-id>', 'Edge id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const edge = await withEngine(globals, (engine) => engine.getEdge(id));
        printResult(globals, edge, renderEdge);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function closeCommand(): Command {
  return new Command('close')
    .description('End an active edge\'s validity')
    .argument('<edge-id>', 'Edge id')
    .option('--at <timestamp>', 'End of validity (ISO 8601, default now)')
    .action(async (id: string, options: { at?: string }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const edge = await withEngine(globals, (engine) => engine.closeEdge(id, options.at));
        printResult(globals, edge, (e) => {
          process.stderr.write(formatSuccess(`Edge closed at ${e.valid_to ?? ''}`) + '\n');
          renderEdge(e);
        });
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function listCommand(): Command {
  return new Command('list')
    .description('List every version of every edge touching a node')
    .argument('<node>', 'Node id or qualified name')
    .action(async (identifier: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const edges = await withEngine(globals, (engine) => engine.listEdges(identifier));
        printResult(globals, edges, renderEdgeList);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

export function edgeCommand(): Command {
  return new Command('edge')
    .description('Manage lineage edges')
    .addCommand(addCommand())
    .addCommand(getCommand())
    .addCommand(closeCommand())
    .addCommand(listCommand());
}
