/**
 * lineage graph - Upstream/downstream lineage of a node as of a point in time
 */

import { Command, Option } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/open-engine.js';
import { parseInteger } from '../utils/parse-options.js';
import { printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { renderGraph } from '../output/render.js';
import { EDGE_TYPE_CHOICES } from './edge.js';
import { edgeTypesInCategories } from '../../../shared/categories.js';
import {
  EDGE_CATEGORIES,
  QUERY_DIRECTIONS,
  type EdgeCategory,
  type EdgeType,
  type QueryDirection,
} from '../../../shared/types.js';

const CATEGORY_CHOICES: readonly EdgeCategory[] = [...EDGE_CATEGORIES, 'other'];

interface GraphOptions {
  direction?: QueryDirection;
  depth?: number;
  asOf?: string;
  edgeType?: EdgeType[];
  category?: EdgeCategory[];
  includeDeleted: boolean;
}

/** --edge-type and --category together; neither means every type */
function selectedEdgeTypes(options: GraphOptions): EdgeType[] | undefined {
  if (!options.edgeType && !options.category) return undefined;
  return [
    ...new Set([...(options.edgeType ?? []), ...edgeTypesInCategories(options.category ?? [])]),
  ];
}

export function graphCommand(): Command {
  return new Command('graph')
    .description('Show the lineage graph around a node')
    .argument('<node>', 'Seed node id or qualified name')
    .addOption(
      new Option('--direction <direction>', 'Walk direction (default from config)')
        .choices(QUERY_DIRECTIONS),
    )
    .option('--depth <n>', 'Maximum hops from the seed (default from config)', parseInteger)
    .option('--as-of <timestamp>', 'Only follow edges valid at this instant (ISO 8601, default now)')
    .addOption(
      new Option('--edge-type <types...>', 'Only follow these edge types').choices(EDGE_TYPE_CHOICES),
    )
    .addOption(
      new Option('--category <categories...>', 'Only follow edge types in these categories')
        .choices(CATEGORY_CHOICES),
    )
    .option('--include-deleted', 'Keep soft-deleted nodes in the result', false)
    .action(async (seed: string, options: GraphOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      // Ctrl-C stops the walk at the next depth level
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const graph = await withEngine(globals, (engine) =>
          engine.traverse(
            {
              seed,
              direction: options.direction,
              depth: options.depth,
              as_of: options.asOf,
              edge_types: selectedEdgeTypes(options),
              include_deleted: options.includeDeleted,
            },
            { signal: controller.signal },
          ),
        );
        printResult(globals, graph, renderGraph);
      } catch (error) {
        handleCommandError(error, globals);
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
