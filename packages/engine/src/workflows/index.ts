/**
 * Workflows Module
 */

export type {
  WorkflowStatus,
  PipelineState,
  ActiveState,
  StepName,
  StepOutcome,
  FailureCategory,
  BackoffTier,
  ClassifiedError,
  StepError,
  DraftSeed,
  Draft,
  HostedMedia,
  MediaResolution,
  PublishedLocator,
  StepData,
  StepResult,
  AbortReason,
  WorkflowFailure,
  WorkflowArtifacts,
  NotificationStatus,
  WorkflowState,
  MediaUploadFailurePolicy,
  RetryPolicy,
  WorkflowOutcome,
} from './types.js';
export type { Move, MoveContext } from './transitions.js';
export type { EngineEvent, EventHandler, EngineConfig, PipelineEngineOptions } from './engine.js';

export { DEFAULT_RETRY_POLICY } from './types.js';
export {
  PIPELINE_TABLE,
  PIPELINE_STEPS,
  TERMINAL_STATES,
  isActiveState,
  isTerminalState,
  stepFor,
  isSkippable,
  successorOf,
  nextMove,
} from './transitions.js';
export { PipelineEngine } from './engine.js';
export { UserLanes } from './user-lanes.js';
