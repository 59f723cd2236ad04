/**
 * Result Notifier
 *
 * Sends the one terminal outcome of a workflow through the Notifier
 * capability. Best effort: bounded by the step timeout, never retried, never
 * throws. The returned StepResult is the NOTIFY entry of the history.
 */

import type { Notifier } from '../capabilities/types.js';
import { classifyError } from '../errors/classifier.js';
import { withTimeout } from '../execution/timeout.js';
import type { PipelineMetrics } from '../observability/metrics.js';
import type { Logger } from '../utils/logger.js';
import type { StepResult, WorkflowOutcome, WorkflowState } from '../workflows/types.js';
import { buildOutcome } from './messages.js';

export interface NotificationReport {
  outcome: WorkflowOutcome;
  result: StepResult;
}

export class ResultNotifier {
  constructor(
    private readonly notifier: Notifier,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
    private readonly metrics: PipelineMetrics,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * @throws Error if the workflow was already notified
   */
  async deliver(state: WorkflowState): Promise<NotificationReport> {
    if (state.notification !== 'PENDING') {
      throw new Error(`Workflow ${state.workflowId} already notified`);
    }

    const startedAt = this.now();
    const outcome = buildOutcome(state, startedAt);
    const log = this.logger.child({ workflowId: state.workflowId, userId: outcome.userId });

    try {
      await withTimeout((signal) => this.notifier.notify(outcome, signal), this.timeoutMs, 'NOTIFY');
      state.notification = 'DELIVERED';
      log.info({ status: outcome.status }, 'Outcome delivered');
      return {
        outcome,
        result: {
          stepName: 'NOTIFY',
          outcome: 'SUCCESS',
          attempt: 1,
          startedAt,
          finishedAt: this.now(),
          data: { step: 'NOTIFY', delivered: true },
        },
      };
    } catch (error) {
      const classified = classifyError(error);
      state.notification = 'FAILED';
      this.metrics.notificationFailed(classified.code);
      log.warn({ status: outcome.status, code: classified.code, error }, 'Outcome delivery failed');
      return {
        outcome,
        result: {
          stepName: 'NOTIFY',
          outcome: 'FATAL_FAILURE',
          attempt: 1,
          startedAt,
          finishedAt: this.now(),
          data: { step: 'NOTIFY', delivered: false },
          error: {
            category: classified.category,
            code: classified.code,
            message: classified.message,
            detail: classified.detail,
          },
        },
      };
    }
  }
}
