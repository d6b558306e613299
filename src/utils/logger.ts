/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface for the key manager.
 * Implement this interface to route key lifecycle events to your own logger.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: unknown): void;
}

/**
 * Create a console logger with optional log level filtering.
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param name - Optional component name printed after the level tag
 * @returns A Logger instance
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('debug', 'jwks');
 * logger.info('Key rotated', { kid: 'abc' });
 * // [INFO] jwks: Key rotated {"kid":"abc"}
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = 'info', name?: string): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const scope = name ? `${name}: ` : '';

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

  const format = (level: LogLevel, message: string, meta?: unknown): string => {
    let suffix = '';
    if (meta !== undefined && meta !== null) {
      try {
        suffix = ' ' + JSON.stringify(meta instanceof Error ? { error: meta.message } : meta);
      } catch {
        suffix = ' [unserializable]';
      }
    }
    return `[${level.toUpperCase()}] ${scope}${message}${suffix}`;
  };

  return {
    debug(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('debug')) {
        console.debug(format('debug', message, meta));
      }
    },
    info(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('info')) {
        console.info(format('info', message, meta));
      }
    },
    warn(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('warn')) {
        console.warn(format('warn', message, meta));
      }
    },
    error(message: string, meta?: unknown): void {
      if (shouldLog('error')) {
        console.error(format('error', message, meta));
      }
    },
  };
}

/**
 * No-op logger that discards all log messages.
 * Useful for testing or when logging is not desired.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
