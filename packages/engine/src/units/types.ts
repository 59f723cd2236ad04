/**
 * Inbound Unit Types
 *
 * The normalized shape of a user message once the channel transport has
 * verified and decoded it. The core never looks inside `payload` except to
 * join text units.
 */

export type UnitKind = 'text' | 'image' | 'video';

export const UNIT_KINDS: readonly UnitKind[] = ['text', 'image', 'video'];

export const MEDIA_KINDS: readonly UnitKind[] = ['image', 'video'];

/**
 * Event handed over by the transport collaborator.
 * `timestamp` is epoch milliseconds.
 */
export interface InboundEvent {
  userId: string;
  kind: UnitKind;
  payload: unknown;
  timestamp: number;
}

/**
 * One unit of user input. Frozen at creation.
 */
export interface InboundUnit {
  readonly id: string;
  readonly userId: string;
  readonly kind: UnitKind;
  readonly payload: unknown;
  readonly receivedAt: number;
}

/**
 * A complete batch, as handed from the buffer to the engine.
 */
export interface UserBatch {
  readonly batchId: string;
  readonly userId: string;
  readonly units: readonly InboundUnit[];
  readonly createdAt: number;
  readonly lastExtendedAt: number;
  readonly flushedAt: number;
}
