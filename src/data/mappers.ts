/**
 * Row <-> record mapping
 */

import type {
  ColumnLineage,
  JsonObject,
  JsonValue,
  LineageEdge,
  LineageNode,
  LineageRun,
  RunStatus,
} from '../shared/types.js';
import { toClassification, toEdgeType, toNodeType } from '../shared/categories.js';
import type { ColumnLineageRow, EdgeRow, NodeRow, RunRow } from './types.js';

const RUN_STATUSES: readonly RunStatus[] = ['created', 'running', 'success', 'failed'];

/** Parse a JSON column; anything other than an object reads back as {} */
export function parseJsonObject(text: string | null): JsonObject {
  if (!text) return {};
  let value: JsonValue;
  try {
    value = JSON.parse(text);
  } catch {
    return {};
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return value;
  }
  return {};
}

export function stringifyJsonObject(value: JsonObject | undefined): string {
  return JSON.stringify(value ?? {});
}

export function toRunStatus(raw: string): RunStatus {
  return RUN_STATUSES.find((s) => s === raw) ?? 'created';
}

export function rowToNode(row: NodeRow): LineageNode {
  return {
    id: row.id,
    type: toNodeType(row.type),
    name: row.name,
    qualified_name: row.qualified_name,
    description: row.description,
    documentation_url: row.documentation_url,
    system: row.system,
    platform: row.platform,
    location: row.location,
    classification: toClassification(row.classification),
    tags: parseJsonObject(row.tags),
    attributes: parseJsonObject(row.attributes),
    created_at: row.created_at,
    updated_at: row.updated_at,
    deleted_at: row.deleted_at,
  };
}

export function rowToEdge(row: EdgeRow): LineageEdge {
  return {
    id: row.id,
    source_id: row.source_id,
    target_id: row.target_id,
    edge_type: toEdgeType(row.edge_type),
    metadata: parseJsonObject(row.metadata),
    valid_from: row.valid_from,
    valid_to: row.valid_to,
    created_at: row.created_at,
    created_by: row.created_by,
  };
}

export function rowToColumnLineage(row: ColumnLineageRow): ColumnLineage {
  return {
    id: row.id,
    edge_id: row.edge_id,
    source_column: row.source_column,
    target_column: row.target_column,
    transformation: row.transformation,
    transformation_type: row.transformation_type,
    confidence: row.confidence,
    metadata: parseJsonObject(row.metadata),
    created_at: row.created_at,
  };
}

export function rowToRun(row: RunRow): LineageRun {
  return {
    id: row.id,
    node_id: row.node_id,
    run_id: row.run_id,
    pipeline_name: row.pipeline_name,
    status: toRunStatus(row.status),
    started_at: row.started_at,
    completed_at: row.completed_at,
    git_sha: row.git_sha,
    git_branch: row.git_branch,
    environment: row.environment,
    parameters: parseJsonObject(row.parameters),
    triggered_by: row.triggered_by,
    executor: row.executor,
    metrics: parseJsonObject(row.metrics),
    error_message: row.error_message,
    created_at: row.created_at,
  };
}
