/**
 * Inbound event normalization.
 */

import { v4 as uuidv4 } from 'uuid';

import { ValidationError } from '../errors/taxonomy.js';
import { InboundEvent, InboundUnit, MEDIA_KINDS, UNIT_KINDS, UnitKind, UserBatch } from './types.js';

function isUnitKind(value: unknown): value is UnitKind {
  return UNIT_KINDS.some((kind) => kind === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an untyped request body against the InboundEvent shape.
 * Throws ValidationError naming the first offending field.
 */
export function parseInboundEvent(body: unknown): InboundEvent {
  if (!isRecord(body)) {
    throw new ValidationError('event must be a JSON object');
  }

  const { userId, kind, payload, timestamp } = body;

  if (typeof userId !== 'string' || userId.trim() === '') {
    throw new ValidationError('userId must be a non-empty string', 'userId');
  }
  if (!isUnitKind(kind)) {
    throw new ValidationError(`kind must be one of ${UNIT_KINDS.join(', ')}`, 'kind');
  }
  if (payload === undefined || payload === null) {
    throw new ValidationError('payload is required', 'payload');
  }
  if (kind === 'text' && (typeof payload !== 'string' || payload.trim() === '')) {
    throw new ValidationError('text payload must be a non-empty string', 'payload');
  }
  if (typeof timestamp !== 'number' || !Number.isInteger(timestamp) || timestamp < 0) {
    throw new ValidationError('timestamp must be a non-negative integer (epoch ms)', 'timestamp');
  }

  return { userId, kind, payload, timestamp };
}

export function toInboundUnit(event: InboundEvent): InboundUnit {
  return Object.freeze({
    id: uuidv4(),
    userId: event.userId,
    kind: event.kind,
    payload: event.payload,
    receivedAt: event.timestamp,
  });
}

export function isMediaUnit(unit: InboundUnit): boolean {
  return MEDIA_KINDS.includes(unit.kind);
}

export function mediaUnitsOf(batch: UserBatch): InboundUnit[] {
  return batch.units.filter(isMediaUnit);
}

/**
 * Text units joined with a blank line, in arrival order.
 */
export function combineText(batch: UserBatch): string {
  return batch.units
    .filter((unit) => unit.kind === 'text' && typeof unit.payload === 'string')
    .map((unit) => String(unit.payload).trim())
    .filter((text) => text.length > 0)
    .join('\n\n');
}
