/**
 * Error Classifier
 *
 * The only place that turns a raw thrown value into an outcome the engine
 * understands. Step executors hand every caught error to `classifyError`.
 */

import { StepTimeoutError } from '../execution/timeout.js';
import type { ClassifiedError, FailureCategory } from '../workflows/types.js';
import {
  AuthorizationError,
  ResourceExhaustionError,
  TransientExternalError,
  UnclassifiedError,
  ValidationError,
} from './taxonomy.js';

const TRANSIENT_SOCKET_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

const VALIDATION_STATUSES = new Set([400, 413, 415, 422]);

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof StepTimeoutError) {
    return retryable('TRANSIENT', 'STEP_TIMEOUT', error.message);
  }
  if (error instanceof TransientExternalError) {
    return retryable('TRANSIENT', error.code, error.message);
  }
  if (error instanceof ResourceExhaustionError) {
    return {
      ...retryable('RESOURCE_EXHAUSTION', 'RATE_LIMITED', error.message),
      retryAfterMs: error.retryAfterMs,
    };
  }
  if (error instanceof ValidationError) {
    return fatal('VALIDATION', 'VALIDATION_FAILED', error.message);
  }
  if (error instanceof AuthorizationError) {
    return fatal('AUTHORIZATION', 'UNAUTHORIZED', error.message);
  }

  const status = httpStatusOf(error);
  if (status !== undefined) {
    const fromStatus = classifyStatus(status, messageOf(error));
    if (fromStatus) return fromStatus;
  }

  const socketCode = socketCodeOf(error);
  if (socketCode) {
    return retryable('TRANSIENT', socketCode, messageOf(error));
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return retryable('TRANSIENT', 'REQUEST_ABORTED', error.message);
  }

  return {
    ...fatal('UNCLASSIFIED', 'UNCLASSIFIED_ERROR', messageOf(error)),
    detail: detailOf(error),
  };
}

export function isRetryable(classified: ClassifiedError): boolean {
  return classified.outcome === 'RETRYABLE_FAILURE';
}

/**
 * Coerce any thrown value into an Error instance.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new UnclassifiedError(String(thrown), thrown);
}

// =============================================================================
// PRIVATE
// =============================================================================

function retryable(category: FailureCategory, code: string, message: string): ClassifiedError {
  return {
    category,
    outcome: 'RETRYABLE_FAILURE',
    code,
    message,
    backoffTier: category === 'RESOURCE_EXHAUSTION' ? 'ELEVATED' : 'STANDARD',
  };
}

function fatal(category: FailureCategory, code: string, message: string): ClassifiedError {
  return {
    category,
    outcome: 'FATAL_FAILURE',
    code,
    message,
    backoffTier: 'STANDARD',
  };
}

function classifyStatus(status: number, message: string): ClassifiedError | null {
  const code = `HTTP_${status}`;
  if (status === 429) return retryable('RESOURCE_EXHAUSTION', code, message);
  if (status === 408 || status >= 500) return retryable('TRANSIENT', code, message);
  if (status === 401 || status === 403) return fatal('AUTHORIZATION', code, message);
  if (VALIDATION_STATUSES.has(status)) return fatal('VALIDATION', code, message);
  return null;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Node socket codes, checked on the error and on its cause (fetch wraps
 * undici failures in a TypeError whose cause carries the code).
 */
function socketCodeOf(error: unknown): string | undefined {
  for (const candidate of [error, causeOf(error)]) {
    if (typeof candidate !== 'object' || candidate === null) continue;
    if (!('code' in candidate) || typeof candidate.code !== 'string') continue;
    const code = candidate.code;
    if (TRANSIENT_SOCKET_CODES.has(code) || code.startsWith('UND_ERR_')) {
      return code;
    }
  }
  return undefined;
}

function causeOf(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function detailOf(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
