/**
 * Logger Utility
 *
 * A small levelled logger with a module prefix per logger instance.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Parse attempts, candidate resolution, registry changes.
 *   - INFO  (1): Routine events. Default level.
 *   - WARN  (2): Conditions worth a look that do not stop an operation.
 *   - ERROR (3): Failures. Always shown.
 *
 * CONFIGURATION:
 *   The starting level comes from LOG_LEVEL. `trace` is accepted and behaves
 *   as `debug`; a missing or unknown value means INFO. Only LOG_LEVEL is read
 *   here, so the rest of the library configuration is not validated until a
 *   default registry is built. Change the level at runtime with setLogLevel().
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('URI:PARSER');
 *   log.debug('Resolved currency', { currency: 'bitcoin' });
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] Message key=value key=value
 */

import { LogLevelSchema } from '../config/schema';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  trace: LogLevel.DEBUG,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export type LogContext = Record<string, unknown>;

// Resolved from LOG_LEVEL on first use
let currentLogLevel: LogLevel | null = null;

const getLogLevel = (): LogLevel => {
  if (currentLogLevel === null) {
    const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL?.trim().toLowerCase());
    currentLogLevel = parsed.success ? LOG_LEVEL_MAP[parsed.data] : LogLevel.INFO;
  }
  return currentLogLevel;
};

// ANSI escape codes for terminal output
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Format context object as key=value pairs
 * Objects are JSON stringified, primitives are converted to strings
 */
const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  const formatted = Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (typeof value === 'bigint') {
        return `${key}=${value.toString()}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` ${colors.dim}${formatted}${colors.reset}`;
};

const log = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < getLogLevel()) return;

  const timestamp = new Date().toISOString();
  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset} ${message}${formatContext(context)}`
  );
};

/**
 * Logger interface returned by createLogger
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'URI:PARSER')
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message, context) => {
      log(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },
    info: (message, context) => {
      log(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },
    warn: (message, context) => {
      log(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },
    error: (message, context) => {
      log(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

/**
 * Update log level at runtime
 *
 * @example
 * setLogLevel('debug');
 * setLogLevel(LogLevel.WARN);
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Current log level as its lowercase name
 */
export const getConfiguredLogLevel = (): string => {
  const current = getLogLevel();
  const names: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'debug',
    [LogLevel.INFO]: 'info',
    [LogLevel.WARN]: 'warn',
    [LogLevel.ERROR]: 'error',
  };
  return names[current];
};

/**
 * Forget any runtime override so the level is read from LOG_LEVEL again
 */
export const resetLogLevel = (): void => {
  currentLogLevel = null;
};
