/**
 * Console Logger - Default logger for the migration pipeline.
 *
 * Provides level-filtered console output. Pipeline stages receive a `Logger`
 * through their options so callers can plug in their own.
 *
 * @packageDocumentation
 */

/** Log levels, `silent` disables output entirely */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Minimal logger contract used throughout the pipeline
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/** Numeric log level for comparison */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type ConsoleLevel = Exclude<LogLevel, 'silent'>;

/** Console method each level writes through */
const CONSOLE_METHODS: Record<ConsoleLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Console-based logger with level filtering. Extra arguments that are absent
 * are left off the console call.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info'
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, error, context);
  }

  private write(level: ConsoleLevel, message: string, ...extras: unknown[]): void {
    if (this.minLevel > LOG_LEVEL_ORDER[level]) {
      return;
    }
    const present = extras.filter(extra => extra !== undefined);
    CONSOLE_METHODS[level](`[${this.prefix}] ${message}`, ...present);
  }
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return new ConsoleLogger('silent', 'silent');
}
