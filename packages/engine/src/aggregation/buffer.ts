/**
 * Aggregation Buffer
 *
 * Holds one pending batch per user and flushes it after a quiet period of
 * `debounceWindowSeconds` following the user's last unit.
 *
 * Invariants:
 * 1. At most one pending batch per user
 * 2. Units keep arrival order
 * 3. A unit lands in exactly one flushed batch
 * 4. A batch flushes exactly once
 *
 * Every mutation of the user map (insert, timer reset, swap-and-handoff) runs
 * to completion inside a single synchronous call, so on the event loop it is
 * already exclusive per user key. A timer that fires after its batch has been
 * replaced is recognised by batch id and ignored.
 */

import { v4 as uuidv4 } from 'uuid';

import { MAX_TIMER_MS } from '../execution/timeout.js';
import type { InboundUnit, UserBatch } from '../units/types.js';
import type { PipelineMetrics } from '../observability/metrics.js';
import { NoOpMetrics } from '../observability/metrics.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Receives each flushed batch. Owns it from that point on.
 */
export type FlushHandler = (batch: UserBatch) => void | Promise<void>;

export interface AggregationBufferOptions {
  debounceWindowSeconds: number;
  onFlush: FlushHandler;
  logger?: Logger;
  metrics?: PipelineMetrics;
  now?: () => number;
}

export interface AddUnitReceipt {
  batchId: string;
  /** 1-based position of the unit within its batch. */
  position: number;
}

interface PendingBatch {
  batchId: string;
  userId: string;
  units: InboundUnit[];
  createdAt: number;
  lastExtendedAt: number;
  timerHandle: NodeJS.Timeout;
}

export class BufferClosedError extends Error {
  constructor() {
    super('Aggregation buffer is closed');
    this.name = 'BufferClosedError';
  }
}

// =============================================================================
// AGGREGATION BUFFER
// =============================================================================

export class AggregationBuffer {
  private batches: Map<string, PendingBatch> = new Map();
  private debounceWindowMs: number;
  private onFlush: FlushHandler;
  private logger: Logger;
  private metrics: PipelineMetrics;
  private now: () => number;
  private closed = false;

  constructor(options: AggregationBufferOptions) {
    if (!Number.isFinite(options.debounceWindowSeconds) || options.debounceWindowSeconds <= 0) {
      throw new RangeError('debounceWindowSeconds must be a positive number');
    }
    if (options.debounceWindowSeconds * 1000 > MAX_TIMER_MS) {
      throw new RangeError(`debounceWindowSeconds must be at most ${Math.floor(MAX_TIMER_MS / 1000)}`);
    }
    this.debounceWindowMs = Math.round(options.debounceWindowSeconds * 1000);
    this.onFlush = options.onFlush;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.now = options.now ?? Date.now;
  }

  /**
   * Append a unit to its user's batch and restart that user's debounce timer.
   */
  addUnit(unit: InboundUnit): AddUnitReceipt {
    if (this.closed) {
      throw new BufferClosedError();
    }

    const now = this.now();
    const existing = this.batches.get(unit.userId);

    if (!existing) {
      const batchId = uuidv4();
      this.batches.set(unit.userId, {
        batchId,
        userId: unit.userId,
        units: [unit],
        createdAt: now,
        lastExtendedAt: now,
        timerHandle: this.schedule(unit.userId, batchId),
      });
      this.logger.debug({ userId: unit.userId, batchId, unitId: unit.id }, 'Batch opened');
      return { batchId, position: 1 };
    }

    clearTimeout(existing.timerHandle);
    existing.units.push(unit);
    existing.lastExtendedAt = now;
    existing.timerHandle = this.schedule(unit.userId, existing.batchId);

    this.logger.debug(
      { userId: unit.userId, batchId: existing.batchId, unitId: unit.id, size: existing.units.length },
      'Batch extended'
    );
    return { batchId: existing.batchId, position: existing.units.length };
  }

  /**
   * Flush every pending batch now. Returns the number of batches handed off.
   */
  flushAll(): number {
    let flushed = 0;
    for (const [userId, batch] of [...this.batches]) {
      if (this.flush(userId, batch.batchId)) flushed++;
    }
    return flushed;
  }

  /**
   * Flush what is pending and refuse further units.
   */
  close(): number {
    const flushed = this.flushAll();
    this.closed = true;
    return flushed;
  }

  pendingUsers(): string[] {
    return [...this.batches.keys()];
  }

  pendingUnitCount(userId: string): number {
    return this.batches.get(userId)?.units.length ?? 0;
  }

  // ===========================================================================
  // PRIVATE: Timers and Handoff
  // ===========================================================================

  private schedule(userId: string, batchId: string): NodeJS.Timeout {
    return setTimeout(() => {
      this.flush(userId, batchId);
    }, this.debounceWindowMs);
  }

  /**
   * Swap the user's slot empty and hand the batch off, in one step.
   */
  private flush(userId: string, batchId: string): boolean {
    const pending = this.batches.get(userId);
    if (!pending || pending.batchId !== batchId) {
      return false;
    }

    this.batches.delete(userId);
    clearTimeout(pending.timerHandle);

    const flushedAt = this.now();
    const batch: UserBatch = Object.freeze({
      batchId: pending.batchId,
      userId: pending.userId,
      units: Object.freeze([...pending.units]),
      createdAt: pending.createdAt,
      lastExtendedAt: pending.lastExtendedAt,
      flushedAt,
    });

    this.metrics.batchFlushed(batch.units.length, flushedAt - batch.createdAt);
    this.logger.info(
      { userId, batchId, units: batch.units.length },
      'Batch flushed'
    );

    this.handOff(batch);
    return true;
  }

  private handOff(batch: UserBatch): void {
    let result: void | Promise<void>;
    try {
      result = this.onFlush(batch);
    } catch (error) {
      this.logger.error({ userId: batch.userId, batchId: batch.batchId, error }, 'Flush handler threw');
      return;
    }

    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        this.logger.error({ userId: batch.userId, batchId: batch.batchId, error }, 'Flush handler rejected');
      });
    }
  }
}
