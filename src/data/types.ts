/**
 * Data layer row types
 * Direct mappings of the SQLite tables. JSON columns are TEXT, enum-like
 * columns are raw strings (the record mappers normalize them).
 */

import type Database from 'better-sqlite3';
import type { ISODateString } from '../shared/types.js';

/** UUID v7 */
export type UUID = string;

// --- Node ---

export interface NodeRow {
  id: UUID;
  type: string;
  name: string;
  qualified_name: string | null;
  description: string | null;
  documentation_url: string | null;
  system: string | null;
  platform: string | null;
  location: string | null;
  classification: string | null;
  tags: string;
  attributes: string;
  created_at: ISODateString;
  updated_at: ISODateString;
  deleted_at: ISODateString | null;
}

export type NodeInsert = Omit<NodeRow, 'deleted_at'>;

/** Columns a node update may change */
export type NodeUpdate = Partial<
  Pick<
    NodeRow,
    | 'name'
    | 'description'
    | 'documentation_url'
    | 'classification'
    | 'tags'
    | 'attributes'
  >
>;

// --- Edge ---

export interface EdgeRow {
  id: UUID;
  source_id: UUID;
  target_id: UUID;
  edge_type: string;
  metadata: string;
  valid_from: ISODateString;
  valid_to: ISODateString | null;
  created_at: ISODateString;
  created_by: string | null;
}

export type EdgeInsert = EdgeRow;

// --- Column lineage ---

export interface ColumnLineageRow {
  id: UUID;
  edge_id: UUID;
  source_column: string;
  target_column: string;
  transformation: string | null;
  transformation_type: string | null;
  confidence: number | null;
  metadata: string;
  created_at: ISODateString;
}

// --- Run ---

export interface RunRow {
  id: UUID;
  node_id: UUID | null;
  run_id: string;
  pipeline_name: string;
  status: string;
  started_at: ISODateString;
  completed_at: ISODateString | null;
  git_sha: string | null;
  git_branch: string | null;
  environment: string | null;
  parameters: string;
  triggered_by: string | null;
  executor: string | null;
  metrics: string;
  error_message: string | null;
  created_at: ISODateString;
}

export type RunUpdate = Partial<
  Pick<RunRow, 'status' | 'completed_at' | 'metrics' | 'error_message'>
>;

// --- Migration ---

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}
