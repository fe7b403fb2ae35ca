/**
 * Logging system with level control
 *
 * Usage:
 * - logger.debug(...) - verbose diagnostics, off by default
 * - logger.info(...) - lifecycle messages, off by default
 * - logger.warn(...) - always enabled unless the level is NONE
 * - logger.error(...) - always enabled unless the level is NONE
 *
 * The starting level comes from LOG_LEVEL, or DEBUG when NODE_ENV is
 * "development".
 */

type LogArgs = unknown[];

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

/**
 * Parse a level name such as "debug" or "WARN"
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) {
    return null;
  }
  const level = LEVEL_NAMES[value.trim().toLowerCase()];
  return level === undefined ? null : level;
}

/**
 * Get the starting log level from the environment
 */
function getLogLevel(): LogLevel {
  const fromEnv = parseLogLevel(process.env.LOG_LEVEL);
  if (fromEnv !== null) {
    return fromEnv;
  }

  if (process.env.NODE_ENV === 'development') {
    return LogLevel.DEBUG;
  }

  return LogLevel.WARN;
}

/**
 * Logger class with level control
 */
class Logger {
  private level: LogLevel;

  constructor() {
    this.level = getLogLevel();
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(...args: LogArgs): void {
    if (this.level <= LogLevel.DEBUG) {
      console.log('[DEBUG]', ...args);
    }
  }

  info(...args: LogArgs): void {
    if (this.level <= LogLevel.INFO) {
      console.info('[INFO]', ...args);
    }
  }

  warn(...args: LogArgs): void {
    if (this.level <= LogLevel.WARN) {
      console.warn('[WARN]', ...args);
    }
  }

  error(...args: LogArgs): void {
    if (this.level <= LogLevel.ERROR) {
      console.error('[ERROR]', ...args);
    }
  }

  /**
   * Create a scoped logger with a prefix
   * @example
   * const storeLogger = logger.withScope('StateStore');
   * storeLogger.debug('State saved');
   */
  withScope(scope: string): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

/**
 * Scoped logger with automatic prefix
 */
export class ScopedLogger {
  constructor(private logger: Logger, private scope: string) {}

  private formatArgs(args: LogArgs): LogArgs {
    return [`[${this.scope}]`, ...args];
  }

  debug(...args: LogArgs): void {
    this.logger.debug(...this.formatArgs(args));
  }

  info(...args: LogArgs): void {
    this.logger.info(...this.formatArgs(args));
  }

  warn(...args: LogArgs): void {
    this.logger.warn(...this.formatArgs(args));
  }

  error(...args: LogArgs): void {
    this.logger.error(...this.formatArgs(args));
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
