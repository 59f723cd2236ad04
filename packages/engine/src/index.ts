/**
 * RelayPost
 *
 * Turns bursts of chat messages into published posts: a per-user debounce
 * buffer feeds a retrying, deadline-bounded publishing state machine.
 */

export * from './aggregation/index.js';
export * from './archive/index.js';
export * from './capabilities/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './execution/index.js';
export * from './http/index.js';
export * from './notify/index.js';
export * from './observability/index.js';
export * from './units/index.js';
export * from './utils/index.js';
export * from './workflows/index.js';

export type { ServiceOverrides } from './app.js';
export { RelayPostService, main } from './app.js';
