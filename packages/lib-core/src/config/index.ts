/**
 * Process Configuration
 *
 * Read once at startup from environment variables. Logging keys fall back to
 * their defaults when unrecognised; booleans accept 'true' or '1'.
 */

import { z } from 'zod';
import {
  DEFAULT_LOGGER_CONFIG,
  setLoggerConfig,
  type LogFormat,
  type LogLevel,
} from '../utils/logger';

export interface StagegateConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  hashUserId: boolean;
  /** Log every policy decision at debug level */
  policyLogging: boolean;
  /** Register the built-in role catalogue when the policy engine is created */
  seedDefaultRoles: boolean;
}

export const DEFAULT_CONFIG: StagegateConfig = {
  logLevel: DEFAULT_LOGGER_CONFIG.level,
  logFormat: DEFAULT_LOGGER_CONFIG.format,
  hashUserId: DEFAULT_LOGGER_CONFIG.hashUserId,
  policyLogging: false,
  seedDefaultRoles: true,
};

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional().catch(undefined),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional().catch(undefined),
  LOG_HASH_USER_ID: z.string().optional(),
  ENABLE_POLICY_LOGGING: z.string().optional(),
  SEED_DEFAULT_ROLES: z.string().optional(),
});

export type StagegateEnv = Record<string, string | undefined>;

/**
 * Build the configuration from an environment map (usually process.env).
 */
export function loadConfig(env: StagegateEnv): StagegateConfig {
  const parsed = envSchema.parse(env);
  return {
    logLevel: parsed.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    logFormat: parsed.LOG_FORMAT ?? DEFAULT_CONFIG.logFormat,
    hashUserId: parseBool(parsed.LOG_HASH_USER_ID, DEFAULT_CONFIG.hashUserId),
    policyLogging: parseBool(parsed.ENABLE_POLICY_LOGGING, DEFAULT_CONFIG.policyLogging),
    seedDefaultRoles: parseBool(parsed.SEED_DEFAULT_ROLES, DEFAULT_CONFIG.seedDefaultRoles),
  };
}

/**
 * Apply the logging part of a configuration to the process-wide logger.
 */
export function applyLoggerConfig(config: StagegateConfig): void {
  setLoggerConfig({
    level: config.logLevel,
    format: config.logFormat,
    hashUserId: config.hashUserId,
  });
}
