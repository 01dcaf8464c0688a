/**
 * Leveled console logger for the HA metadata client.
 *
 * Dependency-free: lines go to the matching `console` method as
 * `<ISO timestamp> <LEVEL> <prefix> <message>`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Level names in ascending severity, for config schemas and CLI help. */
export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export const DEFAULT_LOG_PREFIX = '[Metadata HA]';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a logger that drops messages below `minLevel`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[nn-proxy]');
 * logger.warn('Failover to another endpoint, retry count is 1');
 * // 2026-10-19T12:00:00.000Z WARN  [nn-proxy] Failover to another endpoint, retry count is 1
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = DEFAULT_LOG_PREFIX): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < currentLevel) return;

    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...args);
        break;
      case 'info':
        console.info(line, ...args);
        break;
      case 'warn':
        console.warn(line, ...args);
        break;
      case 'error':
        console.error(line, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/**
 * No-op logger. Default for a bare `RetryCoordinator`.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};
