/**
 * Leveled logging for the CLI.
 *
 * Everything goes to stderr; stdout carries only the report, so
 * `check --format json` output stays parseable.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Environment variable that sets the initial level of the shared logger. */
export const LOG_LEVEL_ENV = 'ARGCHECK_LOG_LEVEL';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

type Paint = (text: string) => string;

class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(level: LogLevel = 'info', prefix = '') {
    this.level = level;
    this.prefix = prefix;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.emit('error', chalk.red, message);
      if (this.isEnabled('error')) {
        console.error(chalk.red(error.stack || error.message));
      }
      return;
    }
    this.emit('error', chalk.red, message, error);
  }

  /**
   * Create a child logger whose prefix extends this one.
   */
  child(prefix: string): Logger {
    return new Logger(this.level, this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }

  private emit(
    level: Exclude<LogLevel, 'silent'>,
    paint: Paint,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    console.error(paint(`[${level.toUpperCase()}] ${text}`));
    if (data) {
      console.error(paint(JSON.stringify(data, null, 2)));
    }
  }
}

const envLevel = process.env[LOG_LEVEL_ENV];

// Singleton instance
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

export { Logger };
