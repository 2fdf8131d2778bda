// Structured logging
//
// Components take a Logger instead of writing to the console, so tests can
// capture what was logged and hosts can route it elsewhere.

import { ProtoError } from '@protoforge/protocol';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

function isEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Console logger that drops entries below `level`.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  return {
    debug(message: string, data?: Record<string, unknown>) {
      if (isEnabled('debug', level)) console.debug(`[DEBUG] ${message}`, data ?? '');
    },
    info(message: string, data?: Record<string, unknown>) {
      if (isEnabled('info', level)) console.info(`[INFO] ${message}`, data ?? '');
    },
    warn(message: string, data?: Record<string, unknown>) {
      if (isEnabled('warn', level)) console.warn(`[WARN] ${message}`, data ?? '');
    },
    error(message: string, data?: Record<string, unknown>) {
      if (isEnabled('error', level)) console.error(`[ERROR] ${message}`, data ?? '');
    },
  };
}

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

/**
 * Fields describing an error in a log entry.
 */
export function errorData(error: unknown): Record<string, unknown> {
  if (error instanceof ProtoError) {
    return { error: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { error: error.message };
  }
  return { error: String(error) };
}
