/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * The engine and the buffer never read metrics or act on them.
 * Default implementation is no-op.
 */

import type { AbortReason, StepName } from '../workflows/types.js';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface PipelineMetrics {
  // =========================================================================
  // Aggregation
  // =========================================================================

  batchFlushed(unitCount: number, lifetimeMs: number): void;

  // =========================================================================
  // Workflow lifecycle
  // =========================================================================

  workflowStarted(): void;

  workflowSucceeded(durationMs: number): void;

  workflowAborted(step: StepName, reason: AbortReason, errorCode: string): void;

  // =========================================================================
  // Step lifecycle
  // =========================================================================

  stepStarted(step: StepName): void;

  stepCompleted(step: StepName, durationMs: number): void;

  stepRetried(step: StepName, attempt: number, errorCode: string): void;

  stepTimedOut(step: StepName, timeoutMs: number): void;

  /** Media step skipped because the batch had no media units. */
  stepSkipped(step: StepName): void;

  /** Media step failed and the workflow continued without it. */
  stepDegraded(step: StepName, errorCode: string): void;

  // =========================================================================
  // Notification
  // =========================================================================

  notificationFailed(errorCode: string): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements PipelineMetrics {
  batchFlushed(_unitCount: number, _lifetimeMs: number): void {}

  workflowStarted(): void {}
  workflowSucceeded(_durationMs: number): void {}
  workflowAborted(_step: StepName, _reason: AbortReason, _errorCode: string): void {}

  stepStarted(_step: StepName): void {}
  stepCompleted(_step: StepName, _durationMs: number): void {}
  stepRetried(_step: StepName, _attempt: number, _errorCode: string): void {}
  stepTimedOut(_step: StepName, _timeoutMs: number): void {}
  stepSkipped(_step: StepName): void {}
  stepDegraded(_step: StepName, _errorCode: string): void {}

  notificationFailed(_errorCode: string): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * Logs every signal as a JSON line.
 */
export class ConsoleMetrics implements PipelineMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  batchFlushed(unitCount: number, lifetimeMs: number): void {
    this.log('batch', 'flushed', { unitCount, lifetimeMs });
  }

  workflowStarted(): void {
    this.log('workflow', 'started', {});
  }

  workflowSucceeded(durationMs: number): void {
    this.log('workflow', 'succeeded', { durationMs });
  }

  workflowAborted(step: StepName, reason: AbortReason, errorCode: string): void {
    this.log('workflow', 'aborted', { step, reason, errorCode });
  }

  stepStarted(step: StepName): void {
    this.log('step', 'started', { step });
  }

  stepCompleted(step: StepName, durationMs: number): void {
    this.log('step', 'completed', { step, durationMs });
  }

  stepRetried(step: StepName, attempt: number, errorCode: string): void {
    this.log('step', 'retried', { step, attempt, errorCode });
  }

  stepTimedOut(step: StepName, timeoutMs: number): void {
    this.log('step', 'timed_out', { step, timeoutMs });
  }

  stepSkipped(step: StepName): void {
    this.log('step', 'skipped', { step });
  }

  stepDegraded(step: StepName, errorCode: string): void {
    this.log('step', 'degraded', { step, errorCode });
  }

  notificationFailed(errorCode: string): void {
    this.log('notification', 'failed', { errorCode });
  }
}
