/**
 * Step Timeout Tests
 *
 * Proves:
 * - Calls finishing in time return their value
 * - Slow calls reject with StepTimeoutError naming the step
 * - Late rejections of abandoned calls do not leak
 * - The call's signal aborts at the timeout
 * - With settleWithinMs, the rejection waits for the aborted call, up to a bound
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout, StepTimeoutError } from '../../src/execution/timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should complete before timeout', async () => {
    const result = await withTimeout(
      async () => {
        await new Promise((r) => setTimeout(r, 10));
        return 'drafted';
      },
      100,
      'GENERATE_DRAFT'
    );

    expect(result).toBe('drafted');
  });

  it('should throw StepTimeoutError on timeout', async () => {
    await expect(
      withTimeout(
        async () => {
          await new Promise((r) => setTimeout(r, 200));
          return 'never reached';
        },
        50,
        'PUBLISH'
      )
    ).rejects.toThrow(StepTimeoutError);
  });

  it('should include step and timeout in error', async () => {
    const err = await withTimeout(
      () => new Promise<void>((r) => setTimeout(r, 100)),
      10,
      'ANALYZE'
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StepTimeoutError);
    if (err instanceof StepTimeoutError) {
      expect(err.step).toBe('ANALYZE');
      expect(err.timeoutMs).toBe(10);
      expect(err.message).toBe('Step timed out: ANALYZE after 10ms');
    }
  });

  it('should propagate errors from the operation', async () => {
    await expect(
      withTimeout(
        async () => {
          throw new Error('upstream refused');
        },
        1000,
        'UPLOAD_MEDIA'
      )
    ).rejects.toThrow('upstream refused');
  });

  it('should turn a synchronous throw into a rejection and clear the timer', async () => {
    vi.useFakeTimers();

    const pending = withTimeout(
      () => {
        throw new Error('bad input');
      },
      1000,
      'ANALYZE'
    );

    await expect(pending).rejects.toThrow('bad input');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should clear the timer when the operation wins', async () => {
    vi.useFakeTimers();

    await withTimeout(async () => 'fast', 5000, 'PUBLISH');

    expect(vi.getTimerCount()).toBe(0);
  });

  it('should absorb a late rejection of the abandoned operation', async () => {
    vi.useFakeTimers();
    const unhandled = vi.fn();
    process.on('unhandledRejection', unhandled);

    try {
      const pending = withTimeout(
        () => new Promise<void>((_, reject) => setTimeout(() => reject(new Error('late')), 200)),
        50,
        'NOTIFY'
      );
      const assertion = expect(pending).rejects.toBeInstanceOf(StepTimeoutError);

      await vi.advanceTimersByTimeAsync(50);
      await assertion;
      await vi.advanceTimersByTimeAsync(200);

      expect(unhandled).not.toHaveBeenCalled();
    } finally {
      process.off('unhandledRejection', unhandled);
    }
  });

  it('should abort the signal when the timeout fires', async () => {
    let captured: AbortSignal | undefined;

    const err = await withTimeout(
      (signal) => {
        captured = signal;
        return new Promise<void>((r) => setTimeout(r, 100));
      },
      10,
      'PUBLISH'
    ).catch((e: unknown) => e);

    expect(captured?.aborted).toBe(true);
    expect(captured?.reason).toBe(err);
  });

  it('should leave the signal alone when the call finishes in time', async () => {
    let captured: AbortSignal | undefined;

    await withTimeout(
      async (signal) => {
        captured = signal;
        return 'ok';
      },
      100,
      'PUBLISH'
    );

    expect(captured?.aborted).toBe(false);
  });

  it('should wait for the aborted call to settle before rejecting', async () => {
    vi.useFakeTimers();
    let rejected = false;

    const pending = withTimeout(
      () => new Promise<void>((r) => setTimeout(r, 80)),
      50,
      'PUBLISH',
      { settleWithinMs: 1000 }
    ).catch((e: unknown) => {
      rejected = true;
      return e;
    });

    await vi.advanceTimersByTimeAsync(60);
    expect(rejected).toBe(false);

    await vi.advanceTimersByTimeAsync(20);
    expect(await pending).toBeInstanceOf(StepTimeoutError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should stop waiting for a call that never settles after settleWithinMs', async () => {
    vi.useFakeTimers();
    let rejected = false;

    const pending = withTimeout(
      () => new Promise<void>(() => {}),
      50,
      'PUBLISH',
      { settleWithinMs: 100 }
    ).catch((e: unknown) => {
      rejected = true;
      return e;
    });

    await vi.advanceTimersByTimeAsync(140);
    expect(rejected).toBe(false);

    await vi.advanceTimersByTimeAsync(10);
    expect(await pending).toBeInstanceOf(StepTimeoutError);
  });
});
