import type { StatementCache } from '../statement-cache.js';
import type { RunRow, RunUpdate, UUID } from '../types.js';

export interface RunRepository {
  findByRunId(runId: string): RunRow | null;
  findByNodeId(nodeId: UUID): RunRow[];
  insert(run: RunRow): void;
  update(runId: string, patch: RunUpdate): boolean;
  count(): number;
}

const UPDATABLE_COLUMNS = ['status', 'completed_at', 'metrics', 'error_message'] as const;

export function createRunRepository(cache: StatementCache): RunRepository {
  return {
    findByRunId(runId: string): RunRow | null {
      const stmt = cache.get(
        'select_run_by_run_id',
        'SELECT * FROM lineage_runs WHERE run_id = ?',
      );
      return (stmt.get(runId) as RunRow | undefined) ?? null;
    },

    findByNodeId(nodeId: UUID): RunRow[] {
      const stmt = cache.get(
        'select_runs_by_node',
        'SELECT * FROM lineage_runs WHERE node_id = ? ORDER BY started_at DESC, id DESC',
      );
      return stmt.all(nodeId) as RunRow[];
    },

    insert(run: RunRow): void {
      const stmt = cache.get(
        'insert_run',
        `INSERT INTO lineage_runs (
           id, node_id, run_id, pipeline_name, status, started_at, completed_at,
           git_sha, git_branch, environment, parameters, triggered_by, executor,
           metrics, error_message, created_at
         ) VALUES (
           @id, @node_id, @run_id, @pipeline_name, @status, @started_at, @completed_at,
           @git_sha, @git_branch, @environment, @parameters, @triggered_by, @executor,
           @metrics, @error_message, @created_at
         )`,
      );
      stmt.run(run);
    },

    update(runId: string, patch: RunUpdate): boolean {
      const columns = UPDATABLE_COLUMNS.filter((c) => patch[c] !== undefined);
      if (columns.length === 0) return false;

      const stmt = cache.get(
        `update_run_${columns.join('_')}`,
        `UPDATE lineage_runs SET ${columns.map((c) => `${c} = @${c}`).join(', ')}
         WHERE run_id = @run_id`,
      );
      const params: Record<string, string | null> = { run_id: runId };
      for (const column of columns) {
        params[column] = patch[column] ?? null;
      }
      return stmt.run(params).changes > 0;
    },

    count(): number {
      const row = cache
        .get('count_runs', 'SELECT COUNT(*) AS cnt FROM lineage_runs')
        .get() as { cnt: number };
      return row.cnt;
    },
  };
}
