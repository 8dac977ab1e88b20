import type { GraphStore, StoredEdge, StoredNode } from '../../core/graph/graph-store.js';
import type { TraversalDirection } from '../../shared/types.js';
import type { StatementCache } from '../statement-cache.js';
import type { EdgeRow, NodeRow } from '../types.js';
import { rowToEdge, rowToNode } from '../mappers.js';
import { createEdgeRepository } from '../repositories/edge-repository.js';
import { createNodeRepository } from '../repositories/node-repository.js';

/**
 * GraphStore backed by the lineage tables. better-sqlite3 is synchronous;
 * the promise surface is what the traversal core awaits on.
 */
export function createGraphStoreService(cache: StatementCache): GraphStore {
  const nodes = createNodeRepository(cache);
  const edges = createEdgeRepository(cache);

  function toStoredEdge(row: EdgeRow): StoredEdge {
    const edge = rowToEdge(row);
    return {
      id: edge.id,
      source_id: edge.source_id,
      target_id: edge.target_id,
      edge_type: edge.edge_type,
      metadata: edge.metadata,
      valid_from: edge.valid_from,
      valid_to: edge.valid_to,
    };
  }

  return {
    async edgesIncident(
      nodeIds: readonly string[],
      direction: TraversalDirection,
    ): Promise<StoredEdge[]> {
      const rows = direction === 'upstream'
        ? edges.findByTargetIds(nodeIds)
        : edges.findBySourceIds(nodeIds);
      return rows.map(toStoredEdge);
    },

    async nodesById(nodeIds: readonly string[], includeDeleted: boolean): Promise<StoredNode[]> {
      if (nodeIds.length === 0) return [];
      const stmt = includeDeleted
        ? cache.get(
          'select_nodes_by_ids_any',
          'SELECT * FROM lineage_nodes WHERE id IN (SELECT value FROM json_each(?))',
        )
        : cache.get(
          'select_nodes_by_ids',
          `SELECT * FROM lineage_nodes
           WHERE id IN (SELECT value FROM json_each(?)) AND deleted_at IS NULL`,
        );
      const rows = stmt.all(JSON.stringify(nodeIds)) as NodeRow[];
      return rows.map(rowToNode);
    },

    async resolveNode(idOrQualifiedName: string, includeDeleted: boolean): Promise<StoredNode | null> {
      const row = nodes.findById(idOrQualifiedName, includeDeleted)
        ?? nodes.findByQualifiedName(idOrQualifiedName, includeDeleted);
      return row ? rowToNode(row) : null;
    },
  };
}
