/**
 * Pipeline Transition Table
 *
 * The state machine as data: which step each active state runs, where a
 * success leads, and how failures are routed. The engine consults
 * `nextMove` after every recorded StepResult and does nothing else to decide
 * where to go.
 */

import type { RetryDecision } from '../errors/retry.js';
import type {
  AbortReason,
  ActiveState,
  MediaUploadFailurePolicy,
  PipelineState,
  StepName,
  StepOutcome,
} from './types.js';

// =============================================================================
// TABLE
// =============================================================================

interface StateEntry {
  step: StepName;
  onSuccess: PipelineState;
  /** Skippable steps move straight to `onSuccess` when the guard says so. */
  skippable: boolean;
}

export const PIPELINE_TABLE: Readonly<Record<ActiveState, StateEntry>> = {
  RECEIVED:       { step: 'ANALYZE',        onSuccess: 'ANALYZED',       skippable: false },
  ANALYZED:       { step: 'GENERATE_DRAFT', onSuccess: 'DRAFTED',        skippable: false },
  DRAFTED:        { step: 'UPLOAD_MEDIA',   onSuccess: 'MEDIA_RESOLVED', skippable: true },
  MEDIA_RESOLVED: { step: 'PUBLISH',        onSuccess: 'PUBLISHED',      skippable: false },
};

/** Pipeline steps run through the retry loop, in order. NOTIFY is separate. */
export const PIPELINE_STEPS: readonly StepName[] = [
  'ANALYZE',
  'GENERATE_DRAFT',
  'UPLOAD_MEDIA',
  'PUBLISH',
];

export const TERMINAL_STATES: readonly PipelineState[] = ['NOTIFIED', 'ABORTED'];

// =============================================================================
// MOVES
// =============================================================================

export type Move =
  | { type: 'ADVANCE'; to: PipelineState }
  | { type: 'RETRY' }
  | { type: 'DEGRADE'; to: PipelineState }
  | { type: 'ABORT'; reason: AbortReason };

export interface MoveContext {
  /** The retry controller's verdict on a failure. Ignored on success. */
  retry?: RetryDecision;
  mediaUploadFailurePolicy: MediaUploadFailurePolicy;
}

export function isActiveState(state: PipelineState): state is ActiveState {
  return state in PIPELINE_TABLE;
}

export function isTerminalState(state: PipelineState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function stepFor(state: ActiveState): StepName {
  return PIPELINE_TABLE[state].step;
}

export function isSkippable(state: ActiveState): boolean {
  return PIPELINE_TABLE[state].skippable;
}

export function successorOf(state: ActiveState): PipelineState {
  return PIPELINE_TABLE[state].onSuccess;
}

/**
 * (currentState, outcome) → next move.
 *
 * A failed media upload under the degrade policy moves on to MEDIA_RESOLVED
 * wherever any other step would abort.
 */
export function nextMove(
  state: ActiveState,
  outcome: StepOutcome,
  context: MoveContext
): Move {
  const entry = PIPELINE_TABLE[state];

  if (outcome === 'SUCCESS') {
    return { type: 'ADVANCE', to: entry.onSuccess };
  }

  if (outcome === 'RETRYABLE_FAILURE' && context.retry?.type === 'RETRY') {
    return { type: 'RETRY' };
  }

  const reason: AbortReason = outcome === 'FATAL_FAILURE' ? 'FATAL' : 'RETRIES_EXHAUSTED';

  if (entry.step === 'UPLOAD_MEDIA' && context.mediaUploadFailurePolicy === 'degrade') {
    return { type: 'DEGRADE', to: entry.onSuccess };
  }

  return { type: 'ABORT', reason };
}
