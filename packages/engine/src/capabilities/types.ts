/**
 * Capability Interfaces
 *
 * Contracts for the five pipeline stages. Implementations are bound once,
 * when the engine is constructed, and are expected to throw on failure; the
 * engine classifies whatever they throw.
 *
 * Every call receives an AbortSignal that fires when the step times out. The
 * engine does not retry a step until the aborted call has settled.
 */

import type { InboundUnit, UserBatch } from '../units/types.js';
import type {
  Draft,
  DraftSeed,
  HostedMedia,
  PublishedLocator,
  WorkflowOutcome,
} from '../workflows/types.js';

export interface ContentAnalyzer {
  /**
   * Derive topic, summary and tags from the aggregated units.
   */
  analyze(batch: UserBatch, signal?: AbortSignal): Promise<DraftSeed>;
}

export interface DraftGenerator {
  generateDraft(seed: DraftSeed, batch: UserBatch, signal?: AbortSignal): Promise<Draft>;
}

export interface MediaUploadFailure {
  unitId: string;
  error: unknown;
}

export interface MediaUploadReport {
  hosted: HostedMedia[];
  failures: MediaUploadFailure[];
}

export interface MediaUploader {
  /**
   * Resolve media units to externally addressable references.
   * Per-unit failures go in `failures`; throwing fails the whole step.
   */
  uploadMedia(units: readonly InboundUnit[], signal?: AbortSignal): Promise<MediaUploadReport>;
}

export interface PublishRequest {
  title: string;
  body: string;
  tags: string[];
  media: HostedMedia[];
}

export interface Publisher {
  publish(request: PublishRequest, signal?: AbortSignal): Promise<PublishedLocator>;
}

export interface Notifier {
  /**
   * Deliver the terminal outcome to the user. Best effort: a rejection is
   * logged, never retried.
   */
  notify(outcome: WorkflowOutcome, signal?: AbortSignal): Promise<void>;
}

export interface PipelineCapabilities {
  analyzer: ContentAnalyzer;
  drafter: DraftGenerator;
  mediaUploader: MediaUploader;
  publisher: Publisher;
  notifier: Notifier;
}
