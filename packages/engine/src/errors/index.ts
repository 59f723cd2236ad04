/**
 * Errors Module
 *
 * Taxonomy, classification and retry decisions.
 */

export type { RetryDecision } from './retry.js';

export {
  TransientExternalError,
  ResourceExhaustionError,
  ValidationError,
  AuthorizationError,
  UnclassifiedError,
  HttpStatusError,
} from './taxonomy.js';
export { classifyError, isRetryable, toError } from './classifier.js';
export { RetryController } from './retry.js';
