/**
 * Publishing Workflow Types
 *
 * Type definitions for the pipeline state machine.
 */

import type { UserBatch, InboundUnit } from '../units/types.js';

// =============================================================================
// STATUS
// =============================================================================

export type WorkflowStatus =
  | 'RUNNING'    // Steps still executing
  | 'SUCCEEDED'  // Published and notified
  | 'FAILED';    // Aborted and notified

// =============================================================================
// PIPELINE STATES
// =============================================================================

export type PipelineState =
  | 'RECEIVED'
  | 'ANALYZED'
  | 'DRAFTED'
  | 'MEDIA_RESOLVED'
  | 'PUBLISHED'
  | 'NOTIFIED'   // Terminal success
  | 'ABORTED';   // Terminal failure

/** States that still have a pipeline step to run before notification. */
export type ActiveState = 'RECEIVED' | 'ANALYZED' | 'DRAFTED' | 'MEDIA_RESOLVED';

export type StepName =
  | 'ANALYZE'
  | 'GENERATE_DRAFT'
  | 'UPLOAD_MEDIA'
  | 'PUBLISH'
  | 'NOTIFY';

export type StepOutcome =
  | 'SUCCESS'
  | 'RETRYABLE_FAILURE'
  | 'FATAL_FAILURE';

// =============================================================================
// FAILURE CATEGORIES
// =============================================================================

export type FailureCategory =
  | 'TRANSIENT'            // Network, timeout, 5xx - retry with backoff
  | 'RESOURCE_EXHAUSTION'  // Rate limit, quota - retry on elevated tier
  | 'VALIDATION'           // Malformed content - no retry
  | 'AUTHORIZATION'        // Rejected credentials - no retry
  | 'UNCLASSIFIED';        // Unknown - no retry, full context kept

export type BackoffTier = 'STANDARD' | 'ELEVATED';

export interface ClassifiedError {
  category: FailureCategory;
  outcome: Exclude<StepOutcome, 'SUCCESS'>;
  code: string;
  message: string;
  backoffTier: BackoffTier;
  retryAfterMs?: number;
  /** Name, message and stack, kept for unclassified errors only. */
  detail?: string;
}

/** Serializable error stored on a StepResult. */
export interface StepError {
  category: FailureCategory;
  code: string;
  message: string;
  detail?: string;
}

// =============================================================================
// STEP ARTIFACTS
// =============================================================================

export interface DraftSeed {
  topic: string;
  summary: string;
  tags: string[];
}

export interface Draft {
  title: string;
  body: string;
}

export interface HostedMedia {
  unitId: string;
  url: string;
  kind: InboundUnit['kind'];
}

export interface MediaResolution {
  hosted: HostedMedia[];
  /** Unit ids published without their media under the degrade policy. */
  dropped: string[];
}

export interface PublishedLocator {
  url: string;
  postId: string;
}

export type StepData =
  | { step: 'ANALYZE'; seed: DraftSeed }
  | { step: 'GENERATE_DRAFT'; draft: Draft }
  | { step: 'UPLOAD_MEDIA'; media: MediaResolution }
  | { step: 'PUBLISH'; locator: PublishedLocator }
  | { step: 'NOTIFY'; delivered: boolean };

// =============================================================================
// STEP RESULT (append-only history entry)
// =============================================================================

export interface StepResult {
  stepName: StepName;
  outcome: StepOutcome;
  attempt: number;        // 1-based invocation number for this step
  startedAt: number;
  finishedAt: number;
  data?: StepData;
  error?: StepError;
}

// =============================================================================
// WORKFLOW STATE
// =============================================================================

export type AbortReason = 'FATAL' | 'RETRIES_EXHAUSTED' | 'DEADLINE_EXCEEDED';

export interface WorkflowFailure {
  step: StepName;
  reason: AbortReason;
  category: FailureCategory;
  code: string;
  message: string;
}

export interface WorkflowArtifacts {
  seed?: DraftSeed;
  draft?: Draft;
  media?: MediaResolution;
  locator?: PublishedLocator;
}

export type NotificationStatus = 'PENDING' | 'DELIVERED' | 'FAILED';

export interface WorkflowState {
  workflowId: string;
  sourceBatch: UserBatch;
  currentState: PipelineState;
  currentStep: StepName | null;
  history: StepResult[];
  retryCounts: Partial<Record<StepName, number>>;
  status: WorkflowStatus;
  startedAt: number;
  deadlineAt: number;
  finishedAt?: number;
  artifacts: WorkflowArtifacts;
  failure?: WorkflowFailure;
  notification: NotificationStatus;
}

// =============================================================================
// RETRY POLICY
// =============================================================================

export type MediaUploadFailurePolicy = 'degrade' | 'abort';

export interface RetryPolicy {
  maxRetriesPerStep: number;
  backoffScheduleMs: number[];
  rateLimitBackoffMultiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetriesPerStep: 3,
  backoffScheduleMs: [1000, 2000, 4000],
  rateLimitBackoffMultiplier: 4,
  jitter: false,
};

// =============================================================================
// TERMINAL OUTCOME (what the user is told)
// =============================================================================

export type WorkflowOutcome =
  | {
      status: 'SUCCEEDED';
      workflowId: string;
      userId: string;
      locator: PublishedLocator;
      title: string;
      tags: string[];
      durationMs: number;
      message: string;
    }
  | {
      status: 'FAILED';
      workflowId: string;
      userId: string;
      failedStep: StepName;
      summary: string;
      attempts: number;
      message: string;
    };
