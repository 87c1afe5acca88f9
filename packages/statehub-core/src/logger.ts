/**
 * Logging utilities with level control
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === 'string' && Object.hasOwn(LEVEL_NAMES, value);
}

/**
 * Parse a level name (case-insensitive). Returns undefined for anything unknown.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.trim().toLowerCase();
  return isLogLevelName(name) ? LEVEL_NAMES[name] : undefined;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console-based logger with level control. Every line is prefixed, e.g. `[statehub:store]`.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.WARN,
    readonly prefix = 'statehub',
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.format(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.format(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.format(message), ...args);
    }
  }

  /**
   * Logger sharing this level, with `:scope` appended to the prefix
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, `${this.prefix}:${scope}`);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private format(message: string): string {
    return `[${this.prefix}] ${message}`;
  }
}

/**
 * Silent logger that doesn't output anything
 * Useful for programmatic use or testing
 */
export class SilentLogger implements Logger {
  debug(): void {
    // no-op
  }

  info(): void {
    // no-op
  }

  warn(): void {
    // no-op
  }

  error(): void {
    // no-op
  }
}

/**
 * Create a logger for a level name
 */
export function createLogger(level: LogLevelName = 'warn'): Logger {
  if (level === 'silent') {
    return new SilentLogger();
  }
  return new ConsoleLogger(LEVEL_NAMES[level]);
}

/**
 * Scope a logger when it supports it (a `ConsoleLogger`); other loggers are shared as is
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return logger instanceof ConsoleLogger ? logger.child(scope) : logger;
}
