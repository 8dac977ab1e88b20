/**
 * Row builders and an in-memory database for repository tests.
 */

import Database from 'better-sqlite3';
import { StatementCache } from '../statement-cache.js';
import { runMigrations } from '../migrations/index.js';
import type { ColumnLineageRow, EdgeInsert, NodeInsert, RunRow } from '../types.js';

export const TS = '2024-01-01T00:00:00.000Z';

export function openMemoryDb(): { db: Database.Database; cache: StatementCache } {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return { db, cache: new StatementCache(db) };
}

export function nodeRow(id: string, overrides: Partial<NodeInsert> = {}): NodeInsert {
  return {
    id,
    type: 'source_table',
    name: id,
    qualified_name: null,
    description: null,
    documentation_url: null,
    system: null,
    platform: null,
    location: null,
    classification: null,
    tags: '{}',
    attributes: '{}',
    created_at: TS,
    updated_at: TS,
    ...overrides,
  };
}

export function edgeRow(
  id: string,
  source_id: string,
  target_id: string,
  overrides: Partial<EdgeInsert> = {},
): EdgeInsert {
  return {
    id,
    source_id,
    target_id,
    edge_type: 'transform',
    metadata: '{}',
    valid_from: TS,
    valid_to: null,
    created_at: TS,
    created_by: null,
    ...overrides,
  };
}

export function columnRow(
  id: string,
  edge_id: string,
  source_column: string,
  target_column: string,
  overrides: Partial<ColumnLineageRow> = {},
): ColumnLineageRow {
  return {
    id,
    edge_id,
    source_column,
    target_column,
    transformation: null,
    transformation_type: null,
    confidence: null,
    metadata: '{}',
    created_at: TS,
    ...overrides,
  };
}

export function runRow(id: string, run_id: string, overrides: Partial<RunRow> = {}): RunRow {
  return {
    id,
    node_id: null,
    run_id,
    pipeline_name: 'nightly_load',
    status: 'running',
    started_at: TS,
    completed_at: null,
    git_sha: null,
    git_branch: null,
    environment: null,
    parameters: '{}',
    triggered_by: null,
    executor: null,
    metrics: '{}',
    error_message: null,
    created_at: TS,
    ...overrides,
  };
}
