/**
 * Capabilities Module
 */

export type {
  ContentAnalyzer,
  DraftGenerator,
  MediaUploadFailure,
  MediaUploadReport,
  MediaUploader,
  PublishRequest,
  Publisher,
  Notifier,
  PipelineCapabilities,
} from './types.js';
export type { FetchFn, HttpCapabilitiesOptions } from './http-capabilities.js';

export { HttpCapabilities, parseRetryAfter } from './http-capabilities.js';
