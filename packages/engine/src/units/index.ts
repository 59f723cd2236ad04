/**
 * Units Module
 */

export type { UnitKind, InboundEvent, InboundUnit, UserBatch } from './types.js';

export { UNIT_KINDS, MEDIA_KINDS } from './types.js';
export {
  parseInboundEvent,
  toInboundUnit,
  isMediaUnit,
  mediaUnitsOf,
  combineText,
} from './inbound.js';
