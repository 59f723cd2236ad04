/**
 * Utilities Module
 */

export type { Logger, LogContext, LogLevel, LogSink } from './logger.js';

export { JsonLogger, createLogger, isLogLevel, silentLogger } from './logger.js';
