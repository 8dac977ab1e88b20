/**
 * Global CLI options shared across all commands
 */

import type { Command } from 'commander';
import type { LogLevel } from '../../../shared/logger.js';
import { configureColors } from '../output/formatter.js';

export interface GlobalOptions {
  json: boolean;
  noColor: boolean;
  verbose: boolean;
  quiet: boolean;
  cwd: string;
}

export function addGlobalOptions(program: Command): void {
  program
    .option('--json', 'Output in JSON format', false)
    .option('--no-color', 'Disable color output')
    .option('-v, --verbose', 'Verbose output (debug logging)', false)
    .option('-q, --quiet', 'Minimal output (errors only)', false)
    .option('--cwd <path>', 'Directory holding .lineage/', process.cwd());
}

export function resolveGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<{
    json?: boolean;
    color?: boolean;
    verbose?: boolean;
    quiet?: boolean;
    cwd?: string;
  }>();
  const globals: GlobalOptions = {
    json: opts.json ?? false,
    noColor: opts.color === false || !!process.env['NO_COLOR'] || !process.stdout.isTTY,
    verbose: opts.verbose ?? false,
    quiet: opts.quiet ?? false,
    cwd: opts.cwd ?? process.cwd(),
  };
  configureColors(!globals.noColor);
  return globals;
}

/** --verbose and --quiet override the configured log level */
export function logLevelFor(globals: GlobalOptions): LogLevel | undefined {
  if (globals.verbose) return 'debug';
  if (globals.quiet) return 'error';
  return undefined;
}
