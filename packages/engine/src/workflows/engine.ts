/**
 * Publishing Workflow Engine
 *
 * Drives one flushed batch through the pipeline state machine.
 *
 * Invariants:
 * 1. One WorkflowState per flushed batch
 * 2. Steps run strictly in sequence; a step starts only after its
 *    predecessor's StepResult is in history
 * 3. History is append-only, one entry per invocation
 * 4. Retries are bounded per step, and the whole run by a deadline
 * 5. Exactly one notification per workflow, on success or abort
 * 6. Raw errors are only ever seen by the classifier
 *
 * A step's timeout is the per-step timeout clamped to the time left before
 * the deadline. A timed-out call is aborted through its signal, and the
 * step is not retried until that call has settled or the deadline has
 * passed, so one workflow never has two capability calls in flight.
 */

import { v4 as uuidv4 } from 'uuid';

import type { WorkflowArchive } from '../archive/archive.js';
import type { PipelineCapabilities } from '../capabilities/types.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { retryPolicyOf } from '../config/pipeline-config.js';
import { classifyError } from '../errors/classifier.js';
import type { RetryDecision } from '../errors/retry.js';
import { RetryController } from '../errors/retry.js';
import { ValidationError } from '../errors/taxonomy.js';
import { MAX_TIMER_MS, withTimeout } from '../execution/timeout.js';
import { ResultNotifier } from '../notify/result-notifier.js';
import type { PipelineMetrics } from '../observability/metrics.js';
import { NoOpMetrics } from '../observability/metrics.js';
import { mediaUnitsOf } from '../units/inbound.js';
import type { UserBatch } from '../units/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import {
  PIPELINE_STEPS,
  isActiveState,
  isSkippable,
  nextMove,
  stepFor,
  successorOf,
} from './transitions.js';
import type {
  AbortReason,
  ClassifiedError,
  StepData,
  StepName,
  StepResult,
  WorkflowFailure,
  WorkflowState,
  WorkflowStatus,
} from './types.js';

// =============================================================================
// ENGINE EVENTS
// =============================================================================

export type EngineEvent =
  | { type: 'WORKFLOW_STARTED'; workflowId: string; userId: string; units: number }
  | { type: 'STEP_STARTED'; workflowId: string; step: StepName; attempt: number }
  | { type: 'STEP_COMPLETED'; workflowId: string; step: StepName; durationMs: number }
  | { type: 'STEP_SKIPPED'; workflowId: string; step: StepName }
  | { type: 'STEP_RETRY'; workflowId: string; step: StepName; attempt: number; delayMs: number; code: string }
  | { type: 'STEP_DEGRADED'; workflowId: string; step: StepName; code: string }
  | { type: 'WORKFLOW_ABORTED'; workflowId: string; failure: WorkflowFailure }
  | { type: 'NOTIFICATION_SENT'; workflowId: string; status: Exclude<WorkflowStatus, 'RUNNING'> }
  | { type: 'NOTIFICATION_FAILED'; workflowId: string; code: string }
  | { type: 'WORKFLOW_SUCCEEDED'; workflowId: string; url: string; durationMs: number };

export type EventHandler = (event: EngineEvent) => void;

// =============================================================================
// OPTIONS
// =============================================================================

export type EngineConfig = Omit<PipelineConfig, 'debounceWindowSeconds'>;

export interface PipelineEngineOptions {
  capabilities: PipelineCapabilities;
  config: EngineConfig;
  logger?: Logger;
  metrics?: PipelineMetrics;
  archive?: WorkflowArchive;
  /** Source of jitter. */
  random?: () => number;
}

interface Invocation {
  result: StepResult;
  classified?: ClassifiedError;
}

// =============================================================================
// PIPELINE ENGINE
// =============================================================================

export class PipelineEngine {
  private capabilities: PipelineCapabilities;
  private config: EngineConfig;
  private logger: Logger;
  private metrics: PipelineMetrics;
  private archive?: WorkflowArchive;
  private retry: RetryController;
  private resultNotifier: ResultNotifier;
  private maxWorkflowDurationMs: number;
  private active: Map<string, WorkflowState> = new Map();
  private eventHandlers: EventHandler[] = [];

  constructor(options: PipelineEngineOptions) {
    const { perStepTimeoutMs } = options.config;
    if (!Number.isInteger(perStepTimeoutMs) || perStepTimeoutMs <= 0 || perStepTimeoutMs > MAX_TIMER_MS) {
      throw new RangeError(`perStepTimeoutMs must be an integer between 1 and ${MAX_TIMER_MS}`);
    }

    this.capabilities = options.capabilities;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.archive = options.archive;
    this.retry = new RetryController(retryPolicyOf(options.config), options.random);
    this.resultNotifier = new ResultNotifier(
      options.capabilities.notifier,
      options.config.perStepTimeoutMs,
      this.logger,
      this.metrics
    );
    this.maxWorkflowDurationMs = options.config.maxWorkflowDurationMs ?? this.derivedDeadlineMs();
  }

  /**
   * Subscribe to engine events.
   */
  onEvent(handler: EventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ workflowId: event.workflowId, event: event.type, error }, 'Event handler error');
      }
    }
  }

  /**
   * Run a batch to a terminal status. Resolves with the final state; never
   * rejects for step failures, which end up in `history` and `failure`.
   */
  async run(batch: UserBatch): Promise<WorkflowState> {
    const startedAt = Date.now();
    const state: WorkflowState = {
      workflowId: uuidv4(),
      sourceBatch: batch,
      currentState: 'RECEIVED',
      currentStep: null,
      history: [],
      retryCounts: {},
      status: 'RUNNING',
      startedAt,
      deadlineAt: startedAt + this.maxWorkflowDurationMs,
      artifacts: {},
      notification: 'PENDING',
    };

    const log = this.logger.child({ workflowId: state.workflowId, userId: batch.userId });
    this.active.set(state.workflowId, state);
    this.metrics.workflowStarted();
    this.emit({
      type: 'WORKFLOW_STARTED',
      workflowId: state.workflowId,
      userId: batch.userId,
      units: batch.units.length,
    });

    try {
      try {
        await this.drive(state, log);
      } catch (error) {
        this.abort(state, log, failureOf(state.currentStep ?? 'ANALYZE', 'FATAL', classifyError(error)));
      }
      await this.finish(state, log);
    } finally {
      this.active.delete(state.workflowId);
    }

    return state;
  }

  /**
   * Snapshot of a running workflow, or null once it has finished.
   */
  getWorkflow(workflowId: string): WorkflowState | null {
    const state = this.active.get(workflowId);
    return state ? structuredClone(state) : null;
  }

  activeCount(): number {
    return this.active.size;
  }

  get workflowDeadlineMs(): number {
    return this.maxWorkflowDurationMs;
  }

  // ===========================================================================
  // PRIVATE: State Machine Loop
  // ===========================================================================

  private async drive(state: WorkflowState, log: Logger): Promise<void> {
    while (isActiveState(state.currentState)) {
      const current = state.currentState;
      const step = stepFor(current);

      if (isSkippable(current) && !this.stepApplies(step, state)) {
        state.currentState = successorOf(current);
        this.metrics.stepSkipped(step);
        this.emit({ type: 'STEP_SKIPPED', workflowId: state.workflowId, step });
        continue;
      }

      if (Date.now() >= state.deadlineAt) {
        this.abort(state, log, deadlineFailure(step));
        return;
      }

      state.currentStep = step;
      const attempt = state.history.filter((entry) => entry.stepName === step).length + 1;
      const { result, classified } = await this.invoke(step, state, attempt, log);
      state.history.push(result);

      let decision: RetryDecision | undefined;
      if (classified) {
        if (classified.outcome === 'RETRYABLE_FAILURE') {
          state.retryCounts[step] = (state.retryCounts[step] ?? 0) + 1;
        }
        decision = this.retry.decide(classified, state.retryCounts[step] ?? 0);
      }

      const move = nextMove(current, result.outcome, {
        retry: decision,
        mediaUploadFailurePolicy: this.config.mediaUploadFailurePolicy,
      });

      switch (move.type) {
        case 'ADVANCE':
          this.applyData(state, result.data);
          state.currentState = move.to;
          this.metrics.stepCompleted(step, result.finishedAt - result.startedAt);
          this.emit({
            type: 'STEP_COMPLETED',
            workflowId: state.workflowId,
            step,
            durationMs: result.finishedAt - result.startedAt,
          });
          break;

        case 'RETRY': {
          const code = classified?.code ?? 'UNKNOWN';
          const delayMs = decision?.type === 'RETRY' ? decision.delayMs : 0;
          if (Date.now() + delayMs >= state.deadlineAt) {
            this.abort(state, log, deadlineFailure(step));
            return;
          }
          this.metrics.stepRetried(step, attempt, code);
          this.emit({ type: 'STEP_RETRY', workflowId: state.workflowId, step, attempt, delayMs, code });
          log.warn({ step, attempt, delayMs, code }, 'Step retrying');
          await this.sleep(delayMs);
          break;
        }

        case 'DEGRADE': {
          const code = classified?.code ?? 'UNKNOWN';
          state.artifacts.media = {
            hosted: [],
            dropped: mediaUnitsOf(state.sourceBatch).map((unit) => unit.id),
          };
          state.currentState = move.to;
          this.metrics.stepDegraded(step, code);
          this.emit({ type: 'STEP_DEGRADED', workflowId: state.workflowId, step, code });
          log.warn({ step, code }, 'Media upload failed, publishing without media');
          break;
        }

        case 'ABORT':
          this.abort(state, log, failureOf(step, move.reason, classified));
          return;
      }
    }
  }

  /**
   * Invoke one step under the per-step timeout. Never throws.
   */
  private async invoke(
    step: StepName,
    state: WorkflowState,
    attempt: number,
    log: Logger
  ): Promise<Invocation> {
    const startedAt = Date.now();
    const timeoutMs = Math.max(1, Math.min(this.config.perStepTimeoutMs, state.deadlineAt - startedAt));
    this.metrics.stepStarted(step);
    this.emit({ type: 'STEP_STARTED', workflowId: state.workflowId, step, attempt });

    try {
      const data = await withTimeout(
        (signal) => this.execute(step, state, signal),
        timeoutMs,
        step,
        { settleWithinMs: Math.max(0, state.deadlineAt - startedAt - timeoutMs) }
      );
      return {
        result: { stepName: step, outcome: 'SUCCESS', attempt, startedAt, finishedAt: Date.now(), data },
      };
    } catch (error) {
      const classified = classifyError(error);
      if (classified.code === 'STEP_TIMEOUT') {
        this.metrics.stepTimedOut(step, timeoutMs);
      }
      if (classified.category === 'UNCLASSIFIED') {
        log.error({ step, attempt, error }, 'Unclassified step failure');
      }
      return {
        classified,
        result: {
          stepName: step,
          outcome: classified.outcome,
          attempt,
          startedAt,
          finishedAt: Date.now(),
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

  /**
   * Call the capability bound to `step`.
   */
  private async execute(step: StepName, state: WorkflowState, signal: AbortSignal): Promise<StepData> {
    const batch = state.sourceBatch;
    const { analyzer, drafter, mediaUploader, publisher } = this.capabilities;

    switch (step) {
      case 'ANALYZE': {
        const seed = await analyzer.analyze(batch, signal);
        if (seed.topic.trim() === '' && seed.summary.trim() === '') {
          throw new ValidationError('analysis produced neither topic nor summary');
        }
        return { step, seed };
      }

      case 'GENERATE_DRAFT': {
        const seed = requireArtifact(state.artifacts.seed, 'draft seed');
        const draft = await drafter.generateDraft(seed, batch, signal);
        if (draft.title.trim() === '' || draft.body.trim() === '') {
          throw new ValidationError('draft title and body must be non-empty');
        }
        return { step, draft };
      }

      case 'UPLOAD_MEDIA': {
        const report = await mediaUploader.uploadMedia(mediaUnitsOf(batch), signal);
        const firstFailure = report.failures[0];
        if (firstFailure && this.config.mediaUploadFailurePolicy === 'abort') {
          throw firstFailure.error;
        }
        return {
          step,
          media: {
            hosted: report.hosted,
            dropped: report.failures.map((failure) => failure.unitId),
          },
        };
      }

      case 'PUBLISH': {
        const draft = requireArtifact(state.artifacts.draft, 'draft');
        const locator = await publisher.publish({
          title: draft.title,
          body: draft.body,
          tags: state.artifacts.seed?.tags ?? [],
          media: state.artifacts.media?.hosted ?? [],
        }, signal);
        if (locator.url.trim() === '') {
          throw new ValidationError('publisher returned an empty URL');
        }
        return { step, locator };
      }

      case 'NOTIFY':
        throw new Error('NOTIFY is delivered by the ResultNotifier');
    }
  }

  private stepApplies(step: StepName, state: WorkflowState): boolean {
    if (step === 'UPLOAD_MEDIA') {
      return mediaUnitsOf(state.sourceBatch).length > 0;
    }
    return true;
  }

  private applyData(state: WorkflowState, data: StepData | undefined): void {
    if (!data) return;
    switch (data.step) {
      case 'ANALYZE':
        state.artifacts.seed = data.seed;
        break;
      case 'GENERATE_DRAFT':
        state.artifacts.draft = data.draft;
        break;
      case 'UPLOAD_MEDIA':
        state.artifacts.media = data.media;
        break;
      case 'PUBLISH':
        state.artifacts.locator = data.locator;
        break;
      case 'NOTIFY':
        break;
    }
  }

  // ===========================================================================
  // PRIVATE: Terminal Transitions
  // ===========================================================================

  private abort(state: WorkflowState, log: Logger, failure: WorkflowFailure): void {
    state.currentState = 'ABORTED';
    state.failure = failure;
    this.metrics.workflowAborted(failure.step, failure.reason, failure.code);
    this.emit({ type: 'WORKFLOW_ABORTED', workflowId: state.workflowId, failure });
    log.error(
      { step: failure.step, reason: failure.reason, category: failure.category, code: failure.code },
      'Workflow aborted'
    );
  }

  /**
   * Notify exactly once, settle the status, archive.
   */
  private async finish(state: WorkflowState, log: Logger): Promise<void> {
    state.currentStep = 'NOTIFY';
    const { outcome, result } = await this.resultNotifier.deliver(state);
    state.history.push(result);

    if (result.outcome === 'SUCCESS') {
      this.emit({ type: 'NOTIFICATION_SENT', workflowId: state.workflowId, status: outcome.status });
    } else {
      this.emit({ type: 'NOTIFICATION_FAILED', workflowId: state.workflowId, code: result.error?.code ?? 'UNKNOWN' });
    }

    state.currentStep = null;
    state.finishedAt = Date.now();

    if (outcome.status === 'SUCCEEDED') {
      state.currentState = 'NOTIFIED';
      state.status = 'SUCCEEDED';
      const durationMs = state.finishedAt - state.startedAt;
      this.metrics.workflowSucceeded(durationMs);
      this.emit({ type: 'WORKFLOW_SUCCEEDED', workflowId: state.workflowId, url: outcome.locator.url, durationMs });
    } else {
      state.currentState = 'ABORTED';
      state.status = 'FAILED';
    }

    if (this.archive) {
      try {
        await this.archive.save(state);
      } catch (error) {
        log.error({ error }, 'Failed to archive workflow');
      }
    }
  }

  // ===========================================================================
  // PRIVATE: Timing
  // ===========================================================================

  /**
   * Every pipeline step using all its attempts, each running to the
   * timeout, plus the longest backoff schedule.
   */
  private derivedDeadlineMs(): number {
    const perStep =
      (this.config.maxRetriesPerStep + 1) * this.config.perStepTimeoutMs +
      this.retry.maxBackoffPerStepMs();
    return PIPELINE_STEPS.length * perStep;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_MS)));
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function requireArtifact<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new Error(`Missing ${name} from an earlier step`);
  }
  return value;
}

function deadlineFailure(step: StepName): WorkflowFailure {
  return {
    step,
    reason: 'DEADLINE_EXCEEDED',
    category: 'TRANSIENT',
    code: 'WORKFLOW_DEADLINE_EXCEEDED',
    message: `workflow exceeded its deadline before ${step} could run`,
  };
}

function failureOf(
  step: StepName,
  reason: AbortReason,
  classified: ClassifiedError | undefined
): WorkflowFailure {
  return {
    step,
    reason,
    category: classified?.category ?? 'UNCLASSIFIED',
    code: classified?.code ?? 'UNKNOWN',
    message: classified?.message ?? 'step failed without an error',
  };
}
