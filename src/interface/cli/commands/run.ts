/**
 * lineage run - start | update | get | list
 */

import { Command, Option } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/open-engine.js';
import { parseJsonObject } from '../utils/parse-options.js';
import { printResult } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { renderRun, renderRunList } from '../output/render.js';
import { formatSuccess } from '../output/formatter.js';
import type { JsonObject, RunStatus } from '../../../shared/types.js';

interface StartOptions {
  pipeline: string;
  node?: string;
  status?: 'created' | 'running';
  startedAt?: string;
  gitSha?: string;
  gitBranch?: string;
  environment?: string;
  parameters?: JsonObject;
  triggeredBy?: string;
  executor?: string;
}

interface UpdateOptions {
  status?: RunStatus;
  completedAt?: string;
  metrics?: JsonObject;
  errorMessage?: string;
}

function startCommand(): Command {
  return new Command('start')
    .description('Record a pipeline run')
    .argument('<run-id>', 'Run id assigned by the scheduler')
    .requiredOption('--pipeline <name>', 'Pipeline name')
    .option('--node <node>', 'Pipeline node id or qualified name')
    .addOption(
      new Option('--status <status>', 'Initial status (default from config)').choices(['created', 'running']),
    )
    .option('--started-at <timestamp>', 'Start time (ISO 8601, default now)')
    .option('--git-sha <sha>', 'Commit the run was built from')
    .option('--git-branch <branch>', 'Branch the run was built from')
    .option('--environment <env>', 'e.g. dev, staging, prod')
    .option('--parameters <json>', 'Run parameters as a JSON object', parseJsonObject)
    .option('--triggered-by <who>', 'Scheduler, user or upstream event')
    .option('--executor <executor>', 'Executor that ran the job')
    .action(async (runId: string, options: StartOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const run = await withEngine(globals, (engine) =>
          engine.createRun({
            run_id: runId,
            pipeline_name: options.pipeline,
            node: options.node,
            status: options.status,
            started_at: options.startedAt,
            git_sha: options.gitSha,
            git_branch: options.gitBranch,
            environment: options.environment,
            parameters: options.parameters,
            triggered_by: options.triggeredBy,
            executor: options.executor,
          }),
        );
        printResult(globals, run, (r) => {
          process.stderr.write(formatSuccess(`Run recorded: ${r.run_id}`) + '\n');
          renderRun(r);
        });
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function updateCommand(): Command {
  return new Command('update')
    .description('Move a run forward or attach metrics')
    .argument('<run-id>', 'Run id')
    .addOption(
      new Option('--status <status>', 'New status').choices(['created', 'running', 'success', 'failed']),
    )
    .option('--completed-at <timestamp>', 'Completion time (default now on success or failure)')
    .option('--metrics <json>', 'Run metrics as a JSON object', parseJsonObject)
    .option('--error-message <text>', 'Failure reason')
    .action(async (runId: string, options: UpdateOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const run = await withEngine(globals, (engine) =>
          engine.updateRun(runId, {
            status: options.status,
            completed_at: options.completedAt,
            metrics: options.metrics,
            error_message: options.errorMessage,
          }),
        );
        printResult(globals, run, renderRun);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function getCommand(): Command {
  return new Command('get')
    .description('Show a run')
    .argument('<run-id>', 'Run id')
    .action(async (runId: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const run = await withEngine(globals, (engine) => engine.getRun(runId));
        printResult(globals, run, renderRun);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function listCommand(): Command {
  return new Command('list')
    .description('List the runs of a node, newest first')
    .argument('<node>', 'Node id or qualified name')
    .action(async (identifier: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      try {
        const runs = await withEngine(globals, (engine) => engine.listRuns(identifier));
        printResult(globals, runs, renderRunList);
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

export function runCommand(): Command {
  return new Command('run')
    .description('Track pipeline runs')
    .addCommand(startCommand())
    .addCommand(updateCommand())
    .addCommand(getCommand())
    .addCommand(listCommand());
}
