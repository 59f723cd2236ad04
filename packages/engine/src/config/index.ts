/**
 * Config Module
 */

export type { PipelineConfig, ServiceConfig, PipelineDefaults, Env } from './pipeline-config.js';

export {
  PIPELINE_DEFAULTS,
  ConfigError,
  loadPipelineConfig,
  loadConfigFromEnv,
  validatePipelineConfig,
  retryPolicyOf,
} from './pipeline-config.js';
