/**
 * Structured Logger
 *
 * One JSON object per line, carrying workflow and user context. Logging never
 * throws: fields JSON cannot represent (cycles, BigInt) are written as their
 * inspected text.
 */

import { inspect } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  workflowId?: string;
  userId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

/** Where serialized lines go. Defaults to stdout. */
export type LogSink = (line: string) => void;

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;
  private sink: LogSink;

  constructor(
    context: LogContext = {},
    level: LogLevel = 'info',
    sink: LogSink = (line) => console.log(line)
  ) {
    this.context = context;
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined)
    );

    if (cleaned.error instanceof Error) {
      cleaned.error = {
        name: cleaned.error.name,
        message: cleaned.error.message,
        stack: cleaned.error.stack,
      };
    }

    this.sink(serialize(cleaned));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.sink);
  }
}

function serialize(entry: Record<string, unknown>): string {
  try {
    return JSON.stringify(entry);
  } catch {
    return JSON.stringify(
      Object.fromEntries(Object.entries(entry).map(([key, value]) => [key, jsonSafe(value)]))
    );
  }
}

function jsonSafe(value: unknown): unknown {
  try {
    JSON.stringify(value);
    return value;
  } catch {
    return inspect(value, { depth: 2, breakLength: Infinity });
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
    sink?: LogSink;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'relaypost' },
    options?.level ?? 'info',
    options?.sink
  );
}

/**
 * Logger that drops everything. Used as the default collaborator in
 * components constructed without one.
 */
export const silentLogger: Logger = new JsonLogger({}, 'error', () => {});
