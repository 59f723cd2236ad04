/**
 * Retry Controller
 *
 * Decides, for a classified failure, whether the step runs again and after
 * how long. Never looks at raw errors.
 */

import type { ClassifiedError, RetryPolicy } from '../workflows/types.js';
import { DEFAULT_RETRY_POLICY } from '../workflows/types.js';

export type RetryDecision =
  | { type: 'RETRY'; delayMs: number }
  | { type: 'ABORT'; reason: 'FATAL' | 'RETRIES_EXHAUSTED' };

export class RetryController {
  private policy: RetryPolicy;
  private random: () => number;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY, random: () => number = Math.random) {
    if (policy.backoffScheduleMs.length === 0) {
      throw new RangeError('backoffScheduleMs must contain at least one delay');
    }
    this.policy = policy;
    this.random = random;
  }

  get maxRetriesPerStep(): number {
    return this.policy.maxRetriesPerStep;
  }

  /**
   * @param retryCount - retries already consumed by this step, including the
   *   failure being decided on
   */
  decide(classified: ClassifiedError, retryCount: number): RetryDecision {
    if (classified.outcome === 'FATAL_FAILURE') {
      return { type: 'ABORT', reason: 'FATAL' };
    }
    if (retryCount > this.policy.maxRetriesPerStep) {
      return { type: 'ABORT', reason: 'RETRIES_EXHAUSTED' };
    }
    return { type: 'RETRY', delayMs: this.calculateDelay(classified, retryCount) };
  }

  /**
   * Upper bound of all backoff sleeps a single step can incur.
   */
  maxBackoffPerStepMs(): number {
    let total = 0;
    for (let retry = 1; retry <= this.policy.maxRetriesPerStep; retry++) {
      total += this.scheduledDelay(retry) * this.policy.rateLimitBackoffMultiplier;
    }
    return this.policy.jitter ? Math.ceil(total * 1.25) : total;
  }

  // ===========================================================================
  // PRIVATE: Delay Calculation
  // ===========================================================================

  private calculateDelay(classified: ClassifiedError, retry: number): number {
    let delay = this.scheduledDelay(retry);

    if (classified.backoffTier === 'ELEVATED') {
      delay *= this.policy.rateLimitBackoffMultiplier;
    }

    if (this.policy.jitter) {
      // ±25%
      const jitterRange = delay * 0.25;
      delay = delay - jitterRange + this.random() * jitterRange * 2;
    }

    if (classified.retryAfterMs !== undefined) {
      delay = Math.max(delay, classified.retryAfterMs);
    }

    return Math.floor(delay);
  }

  /** Schedule entry for the nth retry; the last entry repeats. */
  private scheduledDelay(retry: number): number {
    const schedule = this.policy.backoffScheduleMs;
    return schedule[Math.min(retry, schedule.length) - 1] ?? 0;
  }
}
