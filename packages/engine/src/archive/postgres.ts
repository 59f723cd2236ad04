/**
 * PostgreSQL Workflow Archive
 *
 * Table layout lives in sql/workflow_runs.sql. The full WorkflowState is kept
 * in a JSONB column; the other columns exist for lookups.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';

import type { WorkflowState } from '../workflows/types.js';
import type { WorkflowArchive } from './archive.js';

/**
 * The slice of a pg Pool the archive needs.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function poolClient(pool: Pool): SqlClient {
  return {
    query: (text, values) => pool.query(text, values),
  };
}

const SCHEMA_PATH = fileURLToPath(new URL('../../sql/workflow_runs.sql', import.meta.url));

const UPSERT_SQL = `
  INSERT INTO workflow_runs
    (workflow_id, user_id, batch_id, status, final_state, started_at, finished_at, record)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (workflow_id) DO UPDATE SET
    status = EXCLUDED.status,
    final_state = EXCLUDED.final_state,
    finished_at = EXCLUDED.finished_at,
    record = EXCLUDED.record
`;

const LOAD_SQL = 'SELECT record FROM workflow_runs WHERE workflow_id = $1';

const FIND_BY_USER_SQL = `
  SELECT record FROM workflow_runs
  WHERE user_id = $1
  ORDER BY started_at DESC
  LIMIT $2
`;

export class PostgresWorkflowArchive implements WorkflowArchive {
  constructor(private readonly client: SqlClient) {}

  /**
   * Create the table and index if missing.
   */
  async ensureSchema(): Promise<void> {
    const ddl = await readFile(SCHEMA_PATH, 'utf-8');
    await this.client.query(ddl);
  }

  async save(state: WorkflowState): Promise<void> {
    if (state.status === 'RUNNING') {
      throw new Error(`Workflow ${state.workflowId} is still running`);
    }

    await this.client.query(UPSERT_SQL, [
      state.workflowId,
      state.sourceBatch.userId,
      state.sourceBatch.batchId,
      state.status,
      state.currentState,
      state.startedAt,
      state.finishedAt ?? null,
      JSON.stringify(state),
    ]);
  }

  async load(workflowId: string): Promise<WorkflowState | null> {
    const { rows } = await this.client.query(LOAD_SQL, [workflowId]);
    const row = rows[0];
    return row === undefined ? null : recordOf(row);
  }

  async findByUser(userId: string, limit = 50): Promise<WorkflowState[]> {
    const { rows } = await this.client.query(FIND_BY_USER_SQL, [userId, limit]);
    return rows.map(recordOf);
  }
}

// =============================================================================
// ROW DECODING
// =============================================================================

function recordOf(row: unknown): WorkflowState {
  if (typeof row === 'object' && row !== null && 'record' in row && isWorkflowState(row.record)) {
    return row.record;
  }
  throw new Error('workflow_runs row does not hold a workflow record');
}

function isWorkflowState(value: unknown): value is WorkflowState {
  if (typeof value !== 'object' || value === null) return false;
  if (!('workflowId' in value) || typeof value.workflowId !== 'string') return false;
  if (!('history' in value) || !Array.isArray(value.history)) return false;
  if (!('status' in value) || typeof value.status !== 'string') return false;
  return 'sourceBatch' in value && typeof value.sourceBatch === 'object' && value.sourceBatch !== null;
}
