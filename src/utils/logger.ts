/**
 * Unified Logging Utility
 *
 * Provides consistent log output with component/action context and a
 * process-wide minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LogContext {
  component?: string;
  action?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.FORM_CHECK_LOG_LEVEL?.toLowerCase();
let minimumLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/**
 * Set the minimum level written by every logger.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Format a log message with context prefix.
 */
function formatMessage(context: LogContext, message: string): string {
  const parts: string[] = [];

  if (context.component) {
    parts.push(`[${context.component}]`);
  }
  if (context.action) {
    parts.push(`(${context.action})`);
  }

  const prefix = parts.length > 0 ? `${parts.join(' ')} ` : '';
  return `${prefix}${message}`;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

/**
 * Create a logger instance with optional default context.
 *
 * @example
 * const log = createLogger({ component: 'FormEvaluator' });
 * log.warn('Frame undetected', { action: 'evaluate' });
 * // Output: [FormEvaluator] (evaluate) Frame undetected
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  return {
    debug(message, context = {}) {
      if (!enabled('debug')) return;
      console.debug(formatMessage({ ...defaultContext, ...context }, message));
    },

    info(message, context = {}) {
      if (!enabled('info')) return;
      console.info(formatMessage({ ...defaultContext, ...context }, message));
    },

    warn(message, context = {}) {
      if (!enabled('warn')) return;
      console.warn(formatMessage({ ...defaultContext, ...context }, message));
    },

    error(message, error, context = {}) {
      if (!enabled('error')) return;
      const formattedMessage = formatMessage(
        { ...defaultContext, ...context },
        message
      );

      if (error) {
        console.error(formattedMessage, error);
      } else {
        console.error(formattedMessage);
      }
    },
  };
}

/**
 * Default logger instance for quick logging without context.
 */
export const log = createLogger();
