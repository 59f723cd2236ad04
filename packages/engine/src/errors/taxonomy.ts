/**
 * Error Taxonomy
 *
 * Errors that step handlers and adapters raise. The classifier maps them
 * onto failure categories; nothing else in the engine looks at these types.
 */

// =============================================================================
// RETRYABLE
// =============================================================================

/**
 * Network failure, upstream 5xx or similar. Retried with standard backoff.
 */
export class TransientExternalError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'TRANSIENT_EXTERNAL',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransientExternalError';
  }
}

/**
 * Rate limit or quota signal. Retried on the elevated backoff tier.
 */
export class ResourceExhaustionError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResourceExhaustionError';
  }
}

// =============================================================================
// FATAL
// =============================================================================

/**
 * Malformed or empty content. Retrying cannot help.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthorizationError';
  }
}

/**
 * Wraps a thrown value that is not an Error instance.
 */
export class UnclassifiedError extends Error {
  constructor(
    message: string,
    public readonly thrown: unknown
  ) {
    super(message);
    this.name = 'UnclassifiedError';
  }
}

// =============================================================================
// TRANSPORT
// =============================================================================

/**
 * Non-2xx response from a collaborator. Classified by status code.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    message?: string
  ) {
    super(message ?? `HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}
