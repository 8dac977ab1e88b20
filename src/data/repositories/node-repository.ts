import type { StatementCache } from '../statement-cache.js';
import type { NodeInsert, NodeRow, NodeUpdate, UUID } from '../types.js';

export interface NodeRepository {
  findById(id: UUID, includeDeleted?: boolean): NodeRow | null;
  findByQualifiedName(qualifiedName: string, includeDeleted?: boolean): NodeRow | null;
  findByType(
    type: string | null,
    options?: { limit?: number; offset?: number; includeDeleted?: boolean },
  ): NodeRow[];
  insert(node: NodeInsert): void;
  update(id: UUID, patch: NodeUpdate, updatedAt: string): boolean;
  softDelete(id: UUID, deletedAt: string): boolean;
  count(): { total: number; deleted: number };
}

const UPDATABLE_COLUMNS = [
  'name',
  'description',
  'documentation_url',
  'classification',
  'tags',
  'attributes',
] as const;

export function createNodeRepository(cache: StatementCache): NodeRepository {
  return {
    findById(id: UUID, includeDeleted = false): NodeRow | null {
      const stmt = includeDeleted
        ? cache.get('select_node_by_id_any', 'SELECT * FROM lineage_nodes WHERE id = ?')
        : cache.get(
          'select_node_by_id',
          'SELECT * FROM lineage_nodes WHERE id = ? AND deleted_at IS NULL',
        );
      return (stmt.get(id) as NodeRow | undefined) ?? null;
    },

    findByQualifiedName(qualifiedName: string, includeDeleted = false): NodeRow | null {
      // Several deleted rows may share a qualified name; the live one (if any) wins,
      // then the most recently deleted.
      const stmt = includeDeleted
        ? cache.get(
          'select_node_by_qname_any',
          `SELECT * FROM lineage_nodes WHERE qualified_name = ?
           ORDER BY deleted_at IS NOT NULL, deleted_at DESC LIMIT 1`,
        )
        : cache.get(
          'select_node_by_qname',
          'SELECT * FROM lineage_nodes WHERE qualified_name = ? AND deleted_at IS NULL',
        );
      return (stmt.get(qualifiedName) as NodeRow | undefined) ?? null;
    },

    findByType(
      type: string | null,
      options?: { limit?: number; offset?: number; includeDeleted?: boolean },
    ): NodeRow[] {
      const limit = options?.limit ?? 100;
      const offset = options?.offset ?? 0;
      const includeDeleted = options?.includeDeleted ?? false;

      const conditions: string[] = [];
      if (type !== null) conditions.push('type = @type');
      if (!includeDeleted) conditions.push('deleted_at IS NULL');
      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

      const key = `select_nodes_${type !== null ? 'typed' : 'all'}_${includeDeleted ? 'any' : 'live'}`;
      const stmt = cache.get(
        key,
        `SELECT * FROM lineage_nodes ${where}
         ORDER BY created_at DESC, id DESC
         LIMIT @limit OFFSET @offset`,
      );
      const params: Record<string, string | number> = { limit, offset };
      if (type !== null) params['type'] = type;
      return stmt.all(params) as NodeRow[];
    },

    insert(node: NodeInsert): void {
      const stmt = cache.get(
        'insert_node',
        `INSERT INTO lineage_nodes (
           id, type, name, qualified_name, description, documentation_url,
           system, platform, location, classification, tags, attributes,
           created_at, updated_at
         ) VALUES (
           @id, @type, @name, @qualified_name, @description, @documentation_url,
           @system, @platform, @location, @classification, @tags, @attributes,
           @created_at, @updated_at
         )`,
      );
      stmt.run(node);
    },

    update(id: UUID, patch: NodeUpdate, updatedAt: string): boolean {
      const columns = UPDATABLE_COLUMNS.filter((c) => patch[c] !== undefined);
      const assignments = [...columns.map((c) => `${c} = @${c}`), 'updated_at = @updated_at'];

      // One cached statement per distinct column set
      const stmt = cache.get(
        `update_node_${columns.join('_')}`,
        `UPDATE lineage_nodes SET ${assignments.join(', ')}
         WHERE id = @id AND deleted_at IS NULL`,
      );
      const params: Record<string, string | null> = { id, updated_at: updatedAt };
      for (const column of columns) {
        params[column] = patch[column] ?? null;
      }
      return stmt.run(params).changes > 0;
    },

    softDelete(id: UUID, deletedAt: string): boolean {
      const stmt = cache.get(
        'soft_delete_node',
        `UPDATE lineage_nodes SET deleted_at = ?, updated_at = ?
         WHERE id = ? AND deleted_at IS NULL`,
      );
      return stmt.run(deletedAt, deletedAt, id).changes > 0;
    },

    count(): { total: number; deleted: number } {
      const row = cache
        .get(
          'count_nodes',
          `SELECT COUNT(*) AS total,
                  COUNT(deleted_at) AS deleted
           FROM lineage_nodes`,
        )
        .get() as { total: number; deleted: number };
      return { total: row.total, deleted: row.deleted };
    },
  };
}
