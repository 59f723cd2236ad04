/**
 * Notify Module
 */

export type { NotificationReport } from './result-notifier.js';

export { ResultNotifier } from './result-notifier.js';
export { buildOutcome, failureSummary, stepLabel } from './messages.js';
