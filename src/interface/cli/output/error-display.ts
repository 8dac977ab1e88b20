/**
 * 3-layer error display: Error / Cause / Hint
 */

import { formatDim, formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { LineageError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof LineageError) {
    return {
      code: error.code,
      message: error.message,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return "Check .lineage/config.json, or run 'lineage init' in this directory.";
    case 'DATABASE_ERROR':
      return "Run 'lineage init --force' to recreate the database.";
    case 'NOT_INITIALIZED':
      return "Run 'lineage init' first.";
    case 'NODE_NOT_FOUND':
      return "Pass a node id or qualified name. 'lineage node list' shows both.";
    case 'EDGE_NOT_FOUND':
      return "Check the edge id. 'lineage edge list <node>' shows a node's edges.";
    case 'RUN_NOT_FOUND':
      return 'Check the run id passed to lineage run start.';
    case 'CONFLICT':
      return 'Use --supersede to replace an active edge, or close it first.';
    case 'STORE_UNAVAILABLE':
      return 'The lineage database could not be read. Retry, or check disk and file permissions.';
    case 'TRAVERSAL_ABORTED':
      return 'Lower --depth, or raise traversal.timeout_ms in .lineage/config.json.';
    default:
      return undefined;
  }
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      code: error.code,
      message: error.message,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(formatDim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function exitWithError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): never {
  renderError(error, globals);
  process.exit(1);
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  const display = toErrorDisplay(error);
  exitWithError(display, globals);
}
