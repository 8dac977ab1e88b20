/**
 * MCP error code definitions and error conversion
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ConfigError,
  DatabaseError,
  EdgeNotFoundError,
  InvalidArgumentError,
  LineageError,
  NodeNotFoundError,
  RunNotFoundError,
  StoreUnavailableError,
  TraversalAbortedError,
} from '../../shared/errors.js';

export const LINEAGE_ERROR = {
  NOT_FOUND: -32001,
  INVALID_ARGUMENT: -32002,
  STORE_UNAVAILABLE: -32003,
  ABORTED: -32004,
} as const;

export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (
    error instanceof NodeNotFoundError ||
    error instanceof EdgeNotFoundError ||
    error instanceof RunNotFoundError
  ) {
    return new McpError(LINEAGE_ERROR.NOT_FOUND, error.message);
  }

  if (error instanceof InvalidArgumentError) {
    return new McpError(LINEAGE_ERROR.INVALID_ARGUMENT, error.message);
  }

  if (error instanceof StoreUnavailableError) {
    return new McpError(LINEAGE_ERROR.STORE_UNAVAILABLE, error.message);
  }

  if (error instanceof DatabaseError || error instanceof ConfigError) {
    return new McpError(
      LINEAGE_ERROR.STORE_UNAVAILABLE,
      `Lineage store unavailable: ${error.message}`,
    );
  }

  if (error instanceof TraversalAbortedError) {
    return new McpError(LINEAGE_ERROR.ABORTED, error.message);
  }

  if (error instanceof LineageError) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error',
  );
}
