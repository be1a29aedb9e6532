/**
 * Structured Logger with Tenant Context
 *
 * JSON-structured console logging with the tenant id on every entry, so
 * decisions and transitions can be filtered per tenant downstream.
 *
 * Output format:
 * {"timestamp":"2025-01-01T00:00:00.000Z","level":"info","tenantId":"default","message":"..."}
 */

/**
 * Log levels in order of severity (lowest to highest).
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

/**
 * Tenant used when the caller did not supply one.
 */
export const DEFAULT_TENANT_ID = 'default';

export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  level: LogLevel;
  /** 'json' for structured logs, 'pretty' for local development (default: 'json') */
  format: LogFormat;
  /** Replace userId with a stable hash (default: false) */
  hashUserId: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
  hashUserId: false,
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLoggerConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Replace the process-wide logger configuration (merged over the defaults).
 */
export function setLoggerConfig(config: Partial<LoggerConfig>): void {
  globalLoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalLoggerConfig };
}

/**
 * Fields carried on every entry written by a logger.
 */
export interface LogContext {
  tenantId: string;
  userId?: string;
  /** Module/component name for log categorization */
  module?: string;
  /** Action being performed (e.g. 'workflow:approve') */
  action?: string;
  workflowId?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: Partial<LogContext>): void;
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>, error?: Error): void;
  error(message: string, context?: Partial<LogContext>, error?: Error): void;
  /** Logger with additional context merged in */
  child(additionalContext: Partial<LogContext>): Logger;
  /** Logger with the module name set */
  module(moduleName: string): Logger;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
  userIdHash?: string;
  error?: { name: string; message: string; stack?: string };
}

/**
 * djb2 hash, enough to correlate entries without printing the raw id.
 */
export function hashUserIdForLog(userId: string): string {
  let hash = 5381;
  for (let i = 0; i < userId.length; i++) {
    hash = (hash * 33) ^ userId.charCodeAt(i);
  }
  return 'uid_' + (hash >>> 0).toString(16).padStart(8, '0');
}

const PRETTY_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

function format(entry: LogEntry, logFormat: LogFormat): string {
  if (logFormat === 'pretty') {
    const time = entry.timestamp.substring(11, 23);
    const module = entry.module ? `[${entry.module}] ` : '';
    return `${PRETTY_COLORS[entry.level]}${time} ${entry.level.toUpperCase().padEnd(5)}\x1b[0m ${module}${entry.message}`;
  }
  return JSON.stringify(entry);
}

/**
 * Create a logger instance with base context.
 *
 * @example
 * const log = createLogger({ tenantId: 'acme' }).module('WORKFLOW');
 * log.info('Transition applied', { workflowId: 'wf-1', action: 'workflow:submit' });
 */
export function createLogger(
  baseContext: Partial<LogContext> = {},
  config?: Partial<LoggerConfig>
): Logger {
  const ctx: LogContext = { tenantId: DEFAULT_TENANT_ID, ...baseContext };

  const write = (
    level: LogLevel,
    message: string,
    extra?: Partial<LogContext>,
    error?: Error
  ): void => {
    const effective = config ? { ...globalLoggerConfig, ...config } : globalLoggerConfig;
    if (LEVEL_RANK[level] < LEVEL_RANK[effective.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...ctx,
      ...extra,
    };

    if (effective.hashUserId && typeof entry.userId === 'string') {
      entry.userIdHash = hashUserIdForLog(entry.userId);
      delete entry.userId;
    }

    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    const output = format(entry, effective.format);
    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  };

  return {
    debug: (msg, extra) => write('debug', msg, extra),
    info: (msg, extra) => write('info', msg, extra),
    warn: (msg, extra, err) => write('warn', msg, extra, err),
    error: (msg, extra, err) => write('error', msg, extra, err),
    child: (additionalContext) => createLogger({ ...ctx, ...additionalContext }, config),
    module: (moduleName) => createLogger({ ...ctx, module: moduleName }, config),
  };
}
