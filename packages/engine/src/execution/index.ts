/**
 * Execution Module
 */

export { StepTimeoutError, withTimeout } from './timeout.js';
