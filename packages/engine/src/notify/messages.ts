/**
 * User-facing outcome text.
 *
 * Nothing here may echo an error message or stack: the user only learns
 * which stage stopped and a category-level reason.
 */

import type {
  FailureCategory,
  StepName,
  WorkflowFailure,
  WorkflowOutcome,
  WorkflowState,
} from '../workflows/types.js';

const STEP_LABELS: Record<StepName, string> = {
  ANALYZE: 'content analysis',
  GENERATE_DRAFT: 'draft generation',
  UPLOAD_MEDIA: 'media upload',
  PUBLISH: 'publishing',
  NOTIFY: 'notification',
};

const CATEGORY_TEXT: Record<FailureCategory, string> = {
  TRANSIENT: 'An external service was temporarily unavailable.',
  RESOURCE_EXHAUSTION: 'An external service is limiting requests right now.',
  VALIDATION: 'The content could not be turned into a post.',
  AUTHORIZATION: 'The publishing service refused our credentials.',
  UNCLASSIFIED: 'An unexpected error occurred.',
};

const DEADLINE_TEXT = 'Processing took too long and was stopped.';

export function stepLabel(step: StepName): string {
  return STEP_LABELS[step];
}

export function failureSummary(failure: WorkflowFailure): string {
  const cause = failure.reason === 'DEADLINE_EXCEEDED'
    ? DEADLINE_TEXT
    : CATEGORY_TEXT[failure.category];
  return `Stopped during ${STEP_LABELS[failure.step]}. ${cause}`;
}

/**
 * Build the single terminal outcome for a finished pipeline.
 */
export function buildOutcome(state: WorkflowState, now: number): WorkflowOutcome {
  const { locator, draft, seed } = state.artifacts;
  const userId = state.sourceBatch.userId;

  if (state.failure === undefined && locator && draft) {
    const tags = seed?.tags ?? [];
    const durationMs = now - state.startedAt;
    return {
      status: 'SUCCEEDED',
      workflowId: state.workflowId,
      userId,
      locator,
      title: draft.title,
      tags,
      durationMs,
      message: [
        'Your post has been published!',
        `Title: ${draft.title}`,
        `URL: ${locator.url}`,
        ...(tags.length > 0 ? [`Tags: ${tags.join(', ')}`] : []),
        `Processing time: ${(durationMs / 1000).toFixed(1)}s`,
      ].join('\n'),
    };
  }

  const failure: WorkflowFailure = state.failure ?? {
    step: 'PUBLISH',
    reason: 'FATAL',
    category: 'UNCLASSIFIED',
    code: 'MISSING_ARTIFACTS',
    message: 'pipeline finished without a published locator',
  };
  const attempts = state.history.filter((entry) => entry.stepName === failure.step).length;
  const summary = failureSummary(failure);

  return {
    status: 'FAILED',
    workflowId: state.workflowId,
    userId,
    failedStep: failure.step,
    summary,
    attempts,
    message: [
      'We could not publish your post.',
      summary,
      `Attempts: ${attempts}`,
      'Please try again later.',
    ].join('\n'),
  };
}
