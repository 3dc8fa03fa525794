/**
 * @fileoverview Logger - Engine Diagnostics Port
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The engine reports through a small logger port. The default writes to the
 * console and can be swapped for any structured logger:
 *
 * ```typescript
 * configureEngine({
 *   logger: {
 *     debug: (msg, meta) => pino.debug(meta, msg),
 *     info: (msg, meta) => pino.info(meta, msg),
 *     warn: (msg, meta) => pino.warn(meta, msg),
 *     error: (msg, meta) => pino.error(meta, msg),
 *   },
 * });
 * ```
 *
 * @version 1.0.0
 */

/**
 * Severity levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger port used by the engine.
 */
export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Check if a string names a log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);
}

/**
 * Read the default level from `PROVISIO_LOG_LEVEL`, falling back to `warn`.
 */
export function getDefaultLogLevel(): LogLevel {
  const fromEnv = typeof process !== 'undefined' ? process.env.PROVISIO_LOG_LEVEL : undefined;
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Console-backed logger with level filtering.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger('debug');
 * logger.debug('shared scope opened'); // [provisio] DEBUG shared scope opened
 * ```
 */
export class ConsoleLogger implements ILogger {
  constructor(private readonly level: LogLevel = getDefaultLogLevel()) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('debug')) {
      console.debug(this.format('DEBUG', message), ...this.extra(meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('info')) {
      console.info(this.format('INFO', message), ...this.extra(meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('warn')) {
      console.warn(this.format('WARN', message), ...this.extra(meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('error')) {
      console.error(this.format('ERROR', message), ...this.extra(meta));
    }
  }

  /**
   * Whether messages at `level` are written.
   */
  enabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private format(label: string, message: string): string {
    return `[provisio] ${label} ${message}`;
  }

  private extra(meta?: Record<string, unknown>): unknown[] {
    return meta ? [meta] : [];
  }
}
