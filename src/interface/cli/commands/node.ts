/**
 * lineage node - add | get | list | update | delete
 */

import { Command, Option } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/open-engine.js';
import { parseInteger, parseJsonObject } from '../utils/parse-options.js';
import { printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { renderNode, renderNodeList } from '../output/render.js';
import { formatSuccess } from '../output/formatter.js';
import {
  CLASSIFICATIONS,
  NODE_TYPES,
  type Classification,
  type JsonObject,
  type NodeType,
} from '../../../shared/types.js';

interface AddOptions {
  type: NodeType;
  name: string;
  qualifiedName?: string;
  description?: string;
  documentationUrl?: string;
  system?: string;
  platform?: string;
  location?: string;
  classification?: Classification;
  tags?: JsonObject;
  attributes?: JsonObject;
}

interface ListOptions {
  type?: NodeType;
  limit: number;
  offset: number;
  includeDeleted: boolean;
}

interface UpdateOptions {
  name?: string;
  description?: string;
  documentationUrl?: string;
  classification?: Classification;
  tags?: JsonObject;
  attributes?: JsonObject;
}

function typeOption(): Option {
  return new Option('--type <type>', 'Node type').choices(NODE_TYPES);
}

function classificationOption(): Option {
  return new Option('--classification <level>', 'Data classification').choices(CLASSIFICATIONS);
}

function addCommand(): Command {
  return new Command('add')
    .description('Register a node')
    .addOption(typeOption().makeOptionMandatory())
    .requiredOption('--name <name>', 'Display name')
    .option('--qualified-name <name>', 'Unique qualified name, e.g. warehouse://db.schema.table')
    .option('--description <text>', 'Description')
    .option('--documentation-url <url>', 'Link to documentation')
    .option('--system <system>', 'Owning system, e.g. postgres')
    .option('--platform <platform>', 'Hosting platform')
    .option('--location <location>', 'Physical location (path, URI)')
    .addOption(classificationOption())
    .option('--tags <json>', 'Tags as a JSON object', parseJsonObject)
    .option('--attributes <json>', 'Free-form attributes as a JSON object', parseJsonObject)
    .action(async (options: AddOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const node = await withEngine(globals, (engine) =>
          engine.createNode({
            type: options.type,
            name: options.name,
            qualified_name: options.qualifiedName,
            description: options.description,
            documentation_url: options.documentationUrl,
            system: options.system,
            platform: options.platform,
            location: options.location,
            classification: options.classification,
            tags: options.tags,
            attributes: options.attributes,
          }),
        );
        printResult(globals, node, (n) => {
          process.stderr.write(formatSuccess(`Node created: ${n.id}`) + '\n');
          renderNode(n);
        });
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function getCommand(): Command {
  return new Command('get')
    .description('Show a node by id or qualified name')
    .argument('<node>', 'Node id or qualified name')
    .option('--include-deleted', 'Also find soft-deleted nodes', false)
    .action(async (identifier: string, options: { includeDeleted: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const node = await withEngine(globals, (engine) =>
          engine.getNode(identifier, { includeDeleted: options.includeDeleted }),
        );
        printResult(globals, node, renderNode);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function listCommand(): Command {
  return new Command('list')
    .description('List nodes, newest first')
    .addOption(typeOption())
    .option('--limit <n>', 'Maximum number of nodes', parseInteger, 100)
    .option('--offset <n>', 'Number of nodes to skip', parseInteger, 0)
    .option('--include-deleted', 'Include soft-deleted nodes', false)
    .action(async (options: ListOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const result = await withEngine(globals, (engine) =>
          engine.listNodes({
            type: options.type,
            limit: options.limit,
            offset: options.offset,
            include_deleted: options.includeDeleted,
          }),
        );
        printResult(globals, result, (r) => renderNodeList(r.nodes));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function updateCommand(): Command {
  return new Command('update')
    .description('Change a node\'s descriptive fields')
    .argument('<node>', 'Node id or qualified name')
    .option('--name <name>', 'Display name')
    .option('--description <text>', 'Description')
    .option('--documentation-url <url>', 'Link to documentation')
    .addOption(classificationOption())
    .option('--tags <json>', 'Replace tags with a JSON object', parseJsonObject)
    .option('--attributes <json>', 'Replace attributes with a JSON object', parseJsonObject)
    .action(async (identifier: string, options: UpdateOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const node = await withEngine(globals, (engine) =>
          engine.updateNode(identifier, {
            name: options.name,
            description: options.description,
            documentation_url: options.documentationUrl,
            classification: options.classification,
            tags: options.tags,
            attributes: options.attributes,
          }),
        );
        printResult(globals, node, renderNode);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function deleteCommand(): Command {
  return new Command('delete')
    .description('Soft-delete a node; its edges and runs are kept')
    .argument('<node>', 'Node id or qualified name')
    .action(async (identifier: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const node = await withEngine(globals, (engine) => engine.deleteNode(identifier));
        printResult(globals, node, (n) => {
          process.stderr.write(formatSuccess(`Node deleted: ${n.name} (${n.id})`) + '\n');
        });
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

export function nodeCommand(): Command {
  return new Command('node')
    .description('Manage lineage nodes')
    .addCommand(addCommand())
    .addCommand(getCommand())
    .addCommand(listCommand())
    .addCommand(updateCommand())
    .addCommand(deleteCommand());
}
