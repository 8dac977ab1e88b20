/**
 * Lineage shared types
 * Basic types used across all layers
 */

// --- JSON ---

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
/** Free-form attributes, passed through untouched; key order is preserved */
export type JsonObject = { [key: string]: JsonValue };

/** ISO 8601 timestamp string (UTC, millisecond precision) */
export type ISODateString = string;

// --- Node types ---

export const KNOWN_NODE_TYPES = [
  // data assets
  'source_table',
  'stage_table',
  'feature_table',
  'dimension_table',
  'fact_table',
  'view',
  'materialized_view',
  // file-based
  'file',
  'dataset_file',
  // streaming
  'topic',
  'stream',
  // analytics
  'dashboard',
  'report',
  'chart',
  'metric',
  // ML
  'model',
  'feature_set',
  'experiment',
  // execution
  'pipeline',
  'pipeline_run',
  'job',
  'notebook',
  'query',
  // API
  'api_endpoint',
  'service',
  // people & governance
  'person',
  'team',
  'policy',
  'schema',
] as const;

export type KnownNodeType = (typeof KNOWN_NODE_TYPES)[number];
export type NodeType = KnownNodeType | 'other';

export const NODE_TYPES = [...KNOWN_NODE_TYPES, 'other'] as const;

// --- Edge types ---

export const EDGE_TYPE_CATEGORIES = {
  data_flow: ['read', 'write', 'transform', 'derive', 'copy'],
  column_level: ['column_derives_from', 'column_passes_through'],
  consumption: ['consumes', 'feeds', 'depends_on'],
  execution: ['executes', 'produces'],
  governance: ['owns', 'stewards', 'has_policy', 'governed_by'],
  organizational: ['member_of', 'reports_to'],
} as const;

export const EDGE_CATEGORIES = [
  'data_flow',
  'column_level',
  'consumption',
  'execution',
  'governance',
  'organizational',
] as const satisfies readonly (keyof typeof EDGE_TYPE_CATEGORIES)[];

export type EdgeCategory = keyof typeof EDGE_TYPE_CATEGORIES | 'other';
export type KnownEdgeType =
  (typeof EDGE_TYPE_CATEGORIES)[keyof typeof EDGE_TYPE_CATEGORIES][number];
export type EdgeType = KnownEdgeType | 'other';

export const KNOWN_EDGE_TYPES: readonly KnownEdgeType[] = EDGE_CATEGORIES.flatMap(
  (category) => EDGE_TYPE_CATEGORIES[category],
);

// --- Classification ---

export const CLASSIFICATIONS = [
  'public',
  'internal',
  'confidential',
  'restricted',
  'pii',
  'phi',
  'pci',
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

// --- Records ---

export interface LineageNode {
  id: string;
  type: NodeType;
  name: string;
  qualified_name: string | null;
  description: string | null;
  documentation_url: string | null;
  system: string | null;
  platform: string | null;
  location: string | null;
  classification: Classification | null;
  tags: JsonObject;
  attributes: JsonObject;
  created_at: ISODateString;
  updated_at: ISODateString;
  deleted_at: ISODateString | null;
}

export interface LineageEdge {
  id: string;
  source_id: string;
  target_id: string;
  edge_type: EdgeType;
  metadata: JsonObject;
  valid_from: ISODateString;
  valid_to: ISODateString | null;
  created_at: ISODateString;
  created_by: string | null;
}

export interface ColumnLineage {
  id: string;
  edge_id: string;
  source_column: string;
  target_column: string;
  transformation: string | null;
  transformation_type: string | null;
  confidence: number | null;
  metadata: JsonObject;
  created_at: ISODateString;
}

export type RunStatus = 'created' | 'running' | 'success' | 'failed';

export interface LineageRun {
  id: string;
  node_id: string | null;
  run_id: string;
  pipeline_name: string;
  status: RunStatus;
  started_at: ISODateString;
  completed_at: ISODateString | null;
  git_sha: string | null;
  git_branch: string | null;
  environment: string | null;
  parameters: JsonObject;
  triggered_by: string | null;
  executor: string | null;
  metrics: JsonObject;
  error_message: string | null;
  created_at: ISODateString;
}

// --- Graph query ---

export type TraversalDirection = 'upstream' | 'downstream';

export const QUERY_DIRECTIONS = ['upstream', 'downstream', 'both'] as const;
export type QueryDirection = (typeof QUERY_DIRECTIONS)[number];

export interface LineageQueryInput {
  /** Node id or qualified name of the seed */
  seed: string;
  direction?: QueryDirection;
  depth?: number;
  /** ISO timestamp or Date; unset means now */
  as_of?: string | Date;
  edge_types?: EdgeType[];
  include_deleted?: boolean;
}

export interface LineageQuery {
  seed_id: string;
  direction: QueryDirection;
  depth: number;
  as_of: ISODateString;
  edge_types: EdgeType[] | null;
  include_deleted: boolean;
}

export interface LineageGraphNode {
  id: string;
  type: NodeType;
  name: string;
  qualified_name: string | null;
  classification: Classification | null;
  attributes: JsonObject;
  /** Distance from the seed (0 = seed) */
  depth: number;
}

export interface LineageGraphEdge {
  id: string;
  source_id: string;
  target_id: string;
  edge_type: EdgeType;
  metadata: JsonObject;
  valid_from: ISODateString;
  valid_to: ISODateString | null;
}

export interface LineageGraphResponse {
  query: LineageQuery;
  nodes: LineageGraphNode[];
  edges: LineageGraphEdge[];
  node_count: number;
  edge_count: number;
}

// --- Listing ---

export interface ListNodesInput {
  type?: NodeType;
  limit?: number;
  offset?: number;
  include_deleted?: boolean;
}

export interface ListNodesOutput {
  nodes: LineageNode[];
  limit: number;
  offset: number;
}

// --- Write results ---

export interface CreateEdgeResult {
  edge: LineageEdge;
  /** The previously active edge closed to make room for `edge` */
  superseded: LineageEdge | null;
}

export interface ColumnLineageOutput {
  edge: LineageEdge;
  columns: ColumnLineage[];
}

// --- Status ---

export interface StatusOutput {
  initialized: boolean;
  total_nodes: number;
  deleted_nodes: number;
  total_edges: number;
  active_edges: number;
  column_mappings: number;
  total_runs: number;
  db_size_bytes: number;
}

// --- Init / Seed ---

export interface InitResult {
  lineage_dir: string;
  db_path: string;
  created: boolean;
}

export interface SeedResult {
  nodes_created: number;
  edges_created: number;
  column_mappings_created: number;
  runs_created: number;
}
