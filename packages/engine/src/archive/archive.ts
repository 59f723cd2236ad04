/**
 * Workflow Archive
 *
 * Receives every workflow once it reaches a terminal status.
 * Records are written once per workflow and never updated by the engine
 * afterwards; the history inside them is the complete audit of the run.
 */

import type { WorkflowState } from '../workflows/types.js';

// =============================================================================
// ARCHIVE INTERFACE
// =============================================================================

export interface WorkflowArchive {
  /**
   * Store a terminal workflow. Saving the same id again replaces the record.
   */
  save(state: WorkflowState): Promise<void>;

  /**
   * Returns null if not found.
   */
  load(workflowId: string): Promise<WorkflowState | null>;

  /**
   * Most recent first.
   */
  findByUser(userId: string, limit?: number): Promise<WorkflowState[]>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

/**
 * WARNING: Data is lost on restart.
 */
export class InMemoryWorkflowArchive implements WorkflowArchive {
  private records: Map<string, WorkflowState> = new Map();

  async save(state: WorkflowState): Promise<void> {
    // Clone so later mutation by the caller cannot leak in
    this.records.set(state.workflowId, structuredClone(state));
  }

  async load(workflowId: string): Promise<WorkflowState | null> {
    const record = this.records.get(workflowId);
    return record ? structuredClone(record) : null;
  }

  async findByUser(userId: string, limit = 50): Promise<WorkflowState[]> {
    const matches: WorkflowState[] = [];
    for (const record of this.records.values()) {
      if (record.sourceBatch.userId === userId) {
        matches.push(structuredClone(record));
      }
    }
    return matches
      .sort((a, b) => b.startedAt - a.startedAt)
      .slice(0, limit);
  }

  // For testing: get count
  count(): number {
    return this.records.size;
  }
}
