/**
 * Step Timeout Enforcement
 *
 * A timed-out call counts as a transient failure of the step. The call is
 * handed an AbortSignal which fires at the timeout; capabilities that pass it
 * on (to fetch, for instance) stop their work there.
 */

import type { StepName } from '../workflows/types.js';

/** Longest delay setTimeout honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

// =============================================================================
// TIMEOUT ERROR
// =============================================================================

export class StepTimeoutError extends Error {
  constructor(
    public readonly step: StepName,
    public readonly timeoutMs: number
  ) {
    super(`Step timed out: ${step} after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
  }
}

// =============================================================================
// TIMEOUT WRAPPER
// =============================================================================

export interface TimeoutOptions {
  /**
   * After a timeout, how long to wait for the aborted call to settle before
   * rejecting. 0 rejects at once.
   */
  settleWithinMs?: number;
}

/**
 * Execute a function with timeout.
 *
 * Rejects with StepTimeoutError once `timeoutMs` elapses, after aborting the
 * signal and waiting up to `settleWithinMs` for the call to finish. A
 * rejection of the abandoned call is absorbed so it cannot surface as an
 * unhandled rejection.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  step: StepName,
  options: TimeoutOptions = {}
): Promise<T> {
  const controller = new AbortController();

  let operation: Promise<T>;
  try {
    operation = fn(controller.signal);
  } catch (error) {
    operation = Promise.reject(error);
  }

  let timeoutId: NodeJS.Timeout | undefined;
  let timedOut = false;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      timedOut = true;
      reject(new StepTimeoutError(step, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeoutPromise]);
  } catch (error) {
    if (timedOut) {
      controller.abort(error);
      await settleWithin(operation, options.settleWithinMs ?? 0);
    }
    throw error;
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    operation.catch(() => undefined);
  }
}

/**
 * Resolves once `operation` settles or `ms` elapses, whichever is first.
 */
async function settleWithin(operation: Promise<unknown>, ms: number): Promise<void> {
  if (ms <= 0) return;

  let timer: NodeJS.Timeout | undefined;
  const elapsed = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, Math.min(ms, MAX_TIMER_MS));
  });

  try {
    await Promise.race([
      operation.then(
        () => undefined,
        () => undefined
      ),
      elapsed,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
