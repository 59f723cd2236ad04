/**
 * Observability Module
 */

export type { PipelineMetrics } from './metrics.js';

export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
