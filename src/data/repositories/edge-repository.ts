import type { StatementCache } from '../statement-cache.js';
import type { EdgeInsert, EdgeRow, UUID } from '../types.js';

export interface EdgeRepository {
  findById(id: UUID): EdgeRow | null;
  findActive(sourceId: UUID, targetId: UUID, edgeType: string): EdgeRow | null;
  findLatestEnd(sourceId: UUID, targetId: UUID, edgeType: string): string | null;
  findBySourceIds(sourceIds: readonly UUID[]): EdgeRow[];
  findByTargetIds(targetIds: readonly UUID[]): EdgeRow[];
  findByNodeId(nodeId: UUID): EdgeRow[];
  insert(edge: EdgeInsert): void;
  close(id: UUID, validTo: string): boolean;
  count(): { total: number; active: number };
}

export function createEdgeRepository(cache: StatementCache): EdgeRepository {
  return {
    findById(id: UUID): EdgeRow | null {
      const stmt = cache.get('select_edge_by_id', 'SELECT * FROM lineage_edges WHERE id = ?');
      return (stmt.get(id) as EdgeRow | undefined) ?? null;
    },

    findActive(sourceId: UUID, targetId: UUID, edgeType: string): EdgeRow | null {
      const stmt = cache.get(
        'select_active_edge',
        `SELECT * FROM lineage_edges
         WHERE source_id = ? AND target_id = ? AND edge_type = ? AND valid_to IS NULL`,
      );
      return (stmt.get(sourceId, targetId, edgeType) as EdgeRow | undefined) ?? null;
    },

    /** Latest valid_to among the closed versions of a (source, target, type) */
    findLatestEnd(sourceId: UUID, targetId: UUID, edgeType: string): string | null {
      const stmt = cache.get(
        'select_latest_edge_end',
        `SELECT MAX(valid_to) AS valid_to FROM lineage_edges
         WHERE source_id = ? AND target_id = ? AND edge_type = ? AND valid_to IS NOT NULL`,
      );
      const row = stmt.get(sourceId, targetId, edgeType) as { valid_to: string | null } | undefined;
      return row?.valid_to ?? null;
    },

    // Id sets go through json_each so one cached statement serves any set size.
    findBySourceIds(sourceIds: readonly UUID[]): EdgeRow[] {
      if (sourceIds.length === 0) return [];
      const stmt = cache.get(
        'select_edges_by_sources',
        `SELECT * FROM lineage_edges
         WHERE source_id IN (SELECT value FROM json_each(?))
         ORDER BY valid_from ASC, id ASC`,
      );
      return stmt.all(JSON.stringify(sourceIds)) as EdgeRow[];
    },

    findByTargetIds(targetIds: readonly UUID[]): EdgeRow[] {
      if (targetIds.length === 0) return [];
      const stmt = cache.get(
        'select_edges_by_targets',
        `SELECT * FROM lineage_edges
         WHERE target_id IN (SELECT value FROM json_each(?))
         ORDER BY valid_from ASC, id ASC`,
      );
      return stmt.all(JSON.stringify(targetIds)) as EdgeRow[];
    },

    findByNodeId(nodeId: UUID): EdgeRow[] {
      const stmt = cache.get(
        'select_edges_by_node',
        `SELECT * FROM lineage_edges
         WHERE source_id = ? OR target_id = ?
         ORDER BY valid_from ASC, id ASC`,
      );
      return stmt.all(nodeId, nodeId) as EdgeRow[];
    },

    insert(edge: EdgeInsert): void {
      const stmt = cache.get(
        'insert_edge',
        `INSERT INTO lineage_edges (
           id, source_id, target_id, edge_type, metadata,
           valid_from, valid_to, created_at, created_by
         ) VALUES (
           @id, @source_id, @target_id, @edge_type, @metadata,
           @valid_from, @valid_to, @created_at, @created_by
         )`,
      );
      stmt.run(edge);
    },

    close(id: UUID, validTo: string): boolean {
      const stmt = cache.get(
        'close_edge',
        'UPDATE lineage_edges SET valid_to = ? WHERE id = ? AND valid_to IS NULL',
      );
      return stmt.run(validTo, id).changes > 0;
    },

    count(): { total: number; active: number } {
      const row = cache
        .get(
          'count_edges',
          `SELECT COUNT(*) AS total,
                  COUNT(*) - COUNT(valid_to) AS active
           FROM lineage_edges`,
        )
        .get() as { total: number; active: number };
      return { total: row.total, active: row.active };
    },
  };
}
