/**
 * GraphStore - the read surface the traversal core depends on.
 * Implemented over SQLite in the data layer and by in-memory fakes in tests.
 */

import type { LineageEdge, LineageNode, TraversalDirection } from '../../shared/types.js';

export type StoredNode = LineageNode;

export type StoredEdge = Pick<
  LineageEdge,
  'id' | 'source_id' | 'target_id' | 'edge_type' | 'metadata' | 'valid_from' | 'valid_to'
>;

export interface GraphStore {
  /**
   * Every edge incident on `nodeIds` in the given direction, regardless of
   * validity interval. Upstream matches on target_id, downstream on source_id.
   */
  edgesIncident(nodeIds: readonly string[], direction: TraversalDirection): Promise<StoredEdge[]>;

  /** Batched node lookup; soft-deleted rows only when `includeDeleted` */
  nodesById(nodeIds: readonly string[], includeDeleted: boolean): Promise<StoredNode[]>;

  /** Look a node up by id, falling back to its qualified name */
  resolveNode(idOrQualifiedName: string, includeDeleted: boolean): Promise<StoredNode | null>;
}
