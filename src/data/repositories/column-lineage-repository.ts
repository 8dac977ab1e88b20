import type { StatementCache } from '../statement-cache.js';
import type { ColumnLineageRow, UUID } from '../types.js';

export interface ColumnLineageRepository {
  findByEdgeId(edgeId: UUID): ColumnLineageRow[];
  find(edgeId: UUID, sourceColumn: string, targetColumn: string): ColumnLineageRow | null;
  insert(row: ColumnLineageRow): void;
  count(): number;
}

export function createColumnLineageRepository(
  cache: StatementCache,
): ColumnLineageRepository {
  return {
    findByEdgeId(edgeId: UUID): ColumnLineageRow[] {
      const stmt = cache.get(
        'select_columns_by_edge',
        `SELECT * FROM column_lineage WHERE edge_id = ?
         ORDER BY target_column ASC, source_column ASC`,
      );
      return stmt.all(edgeId) as ColumnLineageRow[];
    },

    find(edgeId: UUID, sourceColumn: string, targetColumn: string): ColumnLineageRow | null {
      const stmt = cache.get(
        'select_column_mapping',
        `SELECT * FROM column_lineage
         WHERE edge_id = ? AND source_column = ? AND target_column = ?`,
      );
      return (stmt.get(edgeId, sourceColumn, targetColumn) as ColumnLineageRow | undefined) ?? null;
    },

    insert(row: ColumnLineageRow): void {
      const stmt = cache.get(
        'insert_column_lineage',
        `INSERT INTO column_lineage (
           id, edge_id, source_column, target_column, transformation,
           transformation_type, confidence, metadata, created_at
         ) VALUES (
           @id, @edge_id, @source_column, @target_column, @transformation,
           @transformation_type, @confidence, @metadata, @created_at
         )`,
      );
      stmt.run(row);
    },

    count(): number {
      const row = cache
        .get('count_column_lineage', 'SELECT COUNT(*) AS cnt FROM column_lineage')
        .get() as { cnt: number };
      return row.cnt;
    },
  };
}
