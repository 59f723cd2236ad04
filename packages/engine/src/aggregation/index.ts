/**
 * Aggregation Module
 */

export type { FlushHandler, AggregationBufferOptions, AddUnitReceipt } from './buffer.js';

export { AggregationBuffer, BufferClosedError } from './buffer.js';
