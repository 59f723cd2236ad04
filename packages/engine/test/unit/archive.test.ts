/**
 * Workflow Archive Tests
 *
 * Proves:
 * - Terminal workflows round-trip through both archives
 * - Lookups by user return the most recent first
 * - The Postgres archive speaks the expected SQL and refuses running workflows
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryWorkflowArchive } from '../../src/archive/archive.js';
import { PostgresWorkflowArchive } from '../../src/archive/postgres.js';
import type { SqlClient } from '../../src/archive/postgres.js';
import type { WorkflowState } from '../../src/workflows/types.js';
import { textBatch } from './mocks.js';

function terminalState(workflowId: string, userId: string, startedAt: number): WorkflowState {
  return {
    workflowId,
    sourceBatch: textBatch(userId, 'hello'),
    currentState: 'NOTIFIED',
    currentStep: null,
    history: [{ stepName: 'ANALYZE', outcome: 'SUCCESS', attempt: 1, startedAt, finishedAt: startedAt + 5 }],
    retryCounts: {},
    status: 'SUCCEEDED',
    startedAt,
    deadlineAt: startedAt + 1000,
    finishedAt: startedAt + 50,
    artifacts: { locator: { url: 'https://blog.test/p', postId: 'p' } },
    notification: 'DELIVERED',
  };
}

describe('InMemoryWorkflowArchive', () => {
  let archive: InMemoryWorkflowArchive;

  beforeEach(() => {
    archive = new InMemoryWorkflowArchive();
  });

  it('should save and load a copy', async () => {
    const state = terminalState('wf-1', 'u1', 100);
    await archive.save(state);
    state.status = 'FAILED';

    const loaded = await archive.load('wf-1');

    expect(loaded?.status).toBe('SUCCEEDED');
    expect(loaded?.history).toHaveLength(1);
  });

  it('should return null for unknown ids', async () => {
    expect(await archive.load('missing')).toBeNull();
  });

  it('should list a user newest first with a limit', async () => {
    await archive.save(terminalState('wf-1', 'u1', 100));
    await archive.save(terminalState('wf-2', 'u1', 300));
    await archive.save(terminalState('wf-3', 'u2', 200));
    await archive.save(terminalState('wf-4', 'u1', 200));

    const all = await archive.findByUser('u1');
    const limited = await archive.findByUser('u1', 2);

    expect(all.map((s) => s.workflowId)).toEqual(['wf-2', 'wf-4', 'wf-1']);
    expect(limited.map((s) => s.workflowId)).toEqual(['wf-2', 'wf-4']);
    expect(archive.count()).toBe(4);
  });
});

// =============================================================================
// POSTGRES (fake client)
// =============================================================================

class FakeSqlClient implements SqlClient {
  readonly queries: Array<{ text: string; values?: unknown[] }> = [];
  private rows: Map<string, { userId: string; startedAt: number; record: unknown }> = new Map();

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.queries.push({ text, values });
    const sql = text.trim();

    if (sql.startsWith('INSERT INTO workflow_runs') && values) {
      const [workflowId, userId, , , , startedAt, , record] = values;
      if (typeof workflowId === 'string' && typeof userId === 'string' && typeof startedAt === 'number' && typeof record === 'string') {
        // pg hands JSONB back already parsed
        this.rows.set(workflowId, { userId, startedAt, record: JSON.parse(record) });
      }
      return { rows: [] };
    }

    if (sql.startsWith('SELECT record FROM workflow_runs WHERE workflow_id') && values) {
      const row = this.rows.get(String(values[0]));
      return { rows: row ? [{ record: row.record }] : [] };
    }

    if (sql.startsWith('SELECT record FROM workflow_runs') && values) {
      const [userId, limit] = values;
      const rows = [...this.rows.values()]
        .filter((row) => row.userId === userId)
        .sort((a, b) => b.startedAt - a.startedAt)
        .slice(0, Number(limit))
        .map((row) => ({ record: row.record }));
      return { rows };
    }

    return { rows: [] };
  }

  corrupt(workflowId: string): void {
    this.rows.set(workflowId, { userId: 'u1', startedAt: 0, record: { not: 'a workflow' } });
  }
}

describe('PostgresWorkflowArchive', () => {
  let client: FakeSqlClient;
  let archive: PostgresWorkflowArchive;

  beforeEach(() => {
    client = new FakeSqlClient();
    archive = new PostgresWorkflowArchive(client);
  });

  it('should create the schema from the bundled SQL file', async () => {
    await archive.ensureSchema();

    expect(client.queries).toHaveLength(1);
    expect(client.queries[0]?.text).toContain('CREATE TABLE IF NOT EXISTS workflow_runs');
  });

  it('should upsert terminal workflows with lookup columns', async () => {
    const state = terminalState('wf-1', 'u1', 100);

    await archive.save(state);

    expect(client.queries[0]?.values).toEqual([
      'wf-1',
      'u1',
      'batch-u1',
      'SUCCEEDED',
      'NOTIFIED',
      100,
      150,
      JSON.stringify(state),
    ]);
  });

  it('should refuse running workflows', async () => {
    const state = { ...terminalState('wf-1', 'u1', 100), status: 'RUNNING' as const };

    await expect(archive.save(state)).rejects.toThrow('Workflow wf-1 is still running');
    expect(client.queries).toHaveLength(0);
  });

  it('should load and list saved workflows', async () => {
    await archive.save(terminalState('wf-1', 'u1', 100));
    await archive.save(terminalState('wf-2', 'u1', 200));

    const loaded = await archive.load('wf-1');
    const listed = await archive.findByUser('u1', 10);

    expect(loaded?.workflowId).toBe('wf-1');
    expect(listed.map((s) => s.workflowId)).toEqual(['wf-2', 'wf-1']);
    expect(await archive.load('missing')).toBeNull();
  });

  it('should reject rows that do not hold a workflow', async () => {
    client.corrupt('wf-bad');

    await expect(archive.load('wf-bad')).rejects.toThrow('workflow_runs row does not hold a workflow record');
  });
});
