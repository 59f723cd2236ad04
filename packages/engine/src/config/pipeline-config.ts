/**
 * Configuration
 *
 * Environment-driven settings for the pipeline and the service around it.
 * The debounce window has no default: deployments have used very different
 * values, so it must be chosen explicitly.
 */

import { MAX_TIMER_MS } from '../execution/timeout.js';
import type { MediaUploadFailurePolicy, RetryPolicy } from '../workflows/types.js';
import { isLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PipelineConfig {
  debounceWindowSeconds: number;
  maxRetriesPerStep: number;
  backoffScheduleMs: number[];
  perStepTimeoutMs: number;
  mediaUploadFailurePolicy: MediaUploadFailurePolicy;
  rateLimitBackoffMultiplier: number;
  backoffJitter: boolean;
  /** Hard cap on one workflow's wall-clock time. Derived when absent. */
  maxWorkflowDurationMs?: number;
}

export interface ServiceConfig {
  // Server
  port: number;
  host: string;

  // Collaborators
  capabilityBaseUrl: string;
  databaseUrl?: string;

  // Logging
  logLevel: LogLevel;
  consoleMetrics: boolean;

  pipeline: PipelineConfig;
}

export type PipelineDefaults = Omit<PipelineConfig, 'debounceWindowSeconds' | 'maxWorkflowDurationMs'>;

export const PIPELINE_DEFAULTS: PipelineDefaults = {
  maxRetriesPerStep: 3,
  backoffScheduleMs: [1000, 2000, 4000],
  perStepTimeoutMs: 30_000,
  mediaUploadFailurePolicy: 'degrade',
  rateLimitBackoffMultiplier: 4,
  backoffJitter: false,
};

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

export type Env = Record<string, string | undefined>;

// =============================================================================
// LOADING
// =============================================================================

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const rawDebounce = env.DEBOUNCE_WINDOW_SECONDS;
  if (rawDebounce === undefined || rawDebounce.trim() === '') {
    throw new ConfigError('DEBOUNCE_WINDOW_SECONDS', 'is required');
  }

  const config: PipelineConfig = {
    debounceWindowSeconds: parsePositiveNumber('DEBOUNCE_WINDOW_SECONDS', rawDebounce),
    maxRetriesPerStep: parseInteger(
      'MAX_RETRIES_PER_STEP',
      env.MAX_RETRIES_PER_STEP,
      PIPELINE_DEFAULTS.maxRetriesPerStep
    ),
    backoffScheduleMs: parseSchedule(
      'BACKOFF_SCHEDULE_MS',
      env.BACKOFF_SCHEDULE_MS,
      PIPELINE_DEFAULTS.backoffScheduleMs
    ),
    perStepTimeoutMs: parseInteger(
      'PER_STEP_TIMEOUT_MS',
      env.PER_STEP_TIMEOUT_MS,
      PIPELINE_DEFAULTS.perStepTimeoutMs
    ),
    mediaUploadFailurePolicy: parsePolicy(env.MEDIA_UPLOAD_FAILURE_POLICY),
    rateLimitBackoffMultiplier: env.RATE_LIMIT_BACKOFF_MULTIPLIER
      ? parsePositiveNumber('RATE_LIMIT_BACKOFF_MULTIPLIER', env.RATE_LIMIT_BACKOFF_MULTIPLIER)
      : PIPELINE_DEFAULTS.rateLimitBackoffMultiplier,
    backoffJitter: env.BACKOFF_JITTER === 'true',
    maxWorkflowDurationMs: env.MAX_WORKFLOW_DURATION_MS
      ? parseInteger('MAX_WORKFLOW_DURATION_MS', env.MAX_WORKFLOW_DURATION_MS, 0)
      : undefined,
  };

  validatePipelineConfig(config);
  return config;
}

export function loadConfigFromEnv(env: Env = process.env): ServiceConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError('LOG_LEVEL', `unknown level "${logLevel}"`);
  }

  return {
    port: parseInteger('PORT', env.PORT, 3000),
    host: env.HOST ?? '0.0.0.0',
    capabilityBaseUrl: env.CAPABILITY_BASE_URL ?? 'http://localhost:8080',
    databaseUrl: env.DATABASE_URL || undefined,
    logLevel,
    consoleMetrics: env.CONSOLE_METRICS === 'true',
    pipeline: loadPipelineConfig(env),
  };
}

/**
 * Throws ConfigError on the first invalid field.
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  if (!Number.isFinite(config.debounceWindowSeconds) || config.debounceWindowSeconds <= 0) {
    throw new ConfigError('debounceWindowSeconds', 'must be a positive number');
  }
  if (config.debounceWindowSeconds * 1000 > MAX_TIMER_MS) {
    throw new ConfigError('debounceWindowSeconds', `must be at most ${Math.floor(MAX_TIMER_MS / 1000)}`);
  }
  if (!Number.isInteger(config.maxRetriesPerStep) || config.maxRetriesPerStep < 0) {
    throw new ConfigError('maxRetriesPerStep', 'must be a non-negative integer');
  }
  if (config.backoffScheduleMs.length === 0 || config.backoffScheduleMs.some((d) => !Number.isFinite(d) || d < 0)) {
    throw new ConfigError('backoffScheduleMs', 'must be a non-empty list of non-negative delays');
  }
  if (!Number.isInteger(config.perStepTimeoutMs) || config.perStepTimeoutMs <= 0) {
    throw new ConfigError('perStepTimeoutMs', 'must be a positive integer');
  }
  if (config.perStepTimeoutMs > MAX_TIMER_MS) {
    throw new ConfigError('perStepTimeoutMs', `must be at most ${MAX_TIMER_MS}`);
  }
  if (config.rateLimitBackoffMultiplier < 1) {
    throw new ConfigError('rateLimitBackoffMultiplier', 'must be at least 1');
  }
  if (Math.max(...config.backoffScheduleMs) * config.rateLimitBackoffMultiplier > MAX_TIMER_MS) {
    throw new ConfigError('backoffScheduleMs', `delays times the rate-limit multiplier must be at most ${MAX_TIMER_MS}`);
  }
  if (config.maxWorkflowDurationMs !== undefined && config.maxWorkflowDurationMs <= 0) {
    throw new ConfigError('maxWorkflowDurationMs', 'must be positive');
  }
  if (config.maxWorkflowDurationMs !== undefined && config.maxWorkflowDurationMs > MAX_TIMER_MS) {
    throw new ConfigError('maxWorkflowDurationMs', `must be at most ${MAX_TIMER_MS}`);
  }
}

export function retryPolicyOf(
  config: Pick<PipelineConfig, 'maxRetriesPerStep' | 'backoffScheduleMs' | 'rateLimitBackoffMultiplier' | 'backoffJitter'>
): RetryPolicy {
  return {
    maxRetriesPerStep: config.maxRetriesPerStep,
    backoffScheduleMs: config.backoffScheduleMs,
    rateLimitBackoffMultiplier: config.rateLimitBackoffMultiplier,
    jitter: config.backoffJitter,
  };
}

// =============================================================================
// PARSERS
// =============================================================================

function parseInteger(variable: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(variable, `expected an integer, got "${raw}"`);
  }
  return value;
}

function parsePositiveNumber(variable: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(variable, `expected a positive number, got "${raw}"`);
  }
  return value;
}

function parseSchedule(variable: string, raw: string | undefined, fallback: number[]): number[] {
  if (raw === undefined || raw.trim() === '') return [...fallback];
  return raw.split(',').map((part) => {
    const value = Number(part.trim());
    if (part.trim() === '' || !Number.isInteger(value) || value < 0) {
      throw new ConfigError(variable, `invalid delay "${part}"`);
    }
    return value;
  });
}

function parsePolicy(raw: string | undefined): MediaUploadFailurePolicy {
  if (raw === undefined || raw === '') return PIPELINE_DEFAULTS.mediaUploadFailurePolicy;
  if (raw === 'degrade' || raw === 'abort') return raw;
  throw new ConfigError('MEDIA_UPLOAD_FAILURE_POLICY', `expected "degrade" or "abort", got "${raw}"`);
}
