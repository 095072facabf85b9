/**
 * Logger interface for type-safe logging
 */
export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug?(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console-based logger that drops messages below its minimum level
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = 'info') {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    if (context !== undefined) {
      console.warn(message, context);
    } else {
      console.warn(message);
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    if (context !== undefined) {
      console.error(message, context);
    } else {
      console.error(message);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    if (context !== undefined) {
      console.info(message, context);
    } else {
      console.info(message);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    if (context !== undefined) {
      console.debug(message, context);
    } else {
      console.debug(message);
    }
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }
}
