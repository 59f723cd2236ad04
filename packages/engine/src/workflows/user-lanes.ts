/**
 * User Lanes
 *
 * Per-user serialization of workflow runs.
 *
 * Invariant: one user = at most one running workflow; later batches of the
 * same user wait their turn and run in flush order. Different users never
 * wait on each other.
 */

interface UserLock {
  holder: string | null;  // Workflow ID holding the lane
  queue: Array<{
    workflowId: string;
    resolve: () => void;
  }>;
}

export class UserLanes {
  private locks: Map<string, UserLock> = new Map();

  /**
   * Run `fn` once the user's lane is free. The lane is released when `fn`
   * settles, whether it resolves or rejects.
   */
  async runExclusive<T>(userId: string, workflowId: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(userId, workflowId);
    try {
      return await fn();
    } finally {
      this.release(userId);
    }
  }

  isBusy(userId: string): boolean {
    const lock = this.locks.get(userId);
    return lock !== undefined && lock.holder !== null;
  }

  queueLength(userId: string): number {
    return this.locks.get(userId)?.queue.length ?? 0;
  }

  // ===========================================================================
  // PRIVATE: Lock Management
  // ===========================================================================

  private acquire(userId: string, workflowId: string): Promise<void> {
    const lock = this.locks.get(userId);

    if (!lock) {
      this.locks.set(userId, { holder: workflowId, queue: [] });
      return Promise.resolve();
    }

    if (lock.holder === null) {
      lock.holder = workflowId;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      lock.queue.push({ workflowId, resolve });
    });
  }

  private release(userId: string): void {
    const lock = this.locks.get(userId);
    if (!lock) return;

    const next = lock.queue.shift();
    if (next) {
      lock.holder = next.workflowId;
      next.resolve();
    } else {
      // Idle users leave no entry behind
      this.locks.delete(userId);
    }
  }
}
