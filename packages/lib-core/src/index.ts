/**
 * @stagegate/lib-core
 *
 * Shared infrastructure for the policy and workflow cores:
 * structured logging, the error taxonomy and process configuration.
 */

export {
  createLogger,
  setLoggerConfig,
  getLoggerConfig,
  hashUserIdForLog,
  DEFAULT_LOGGER_CONFIG,
  DEFAULT_TENANT_ID,
  LOG_LEVELS,
  LOG_FORMATS,
} from './utils/logger';
export type { Logger, LogContext, LogLevel, LogFormat, LoggerConfig } from './utils/logger';

export * from './errors';

export { loadConfig, applyLoggerConfig, DEFAULT_CONFIG } from './config';
export type { StagegateConfig, StagegateEnv } from './config';
