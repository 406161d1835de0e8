/**
 * Level-filtered console logger shared by the engine and the CLI.
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

type Sink = 'log' | 'warn' | 'error';

class Logger {
  private level?: LogLevel;
  private prefix: string = '';
  private parent?: Logger;

  /**
   * Set this logger's level. A child without its own level follows its parent.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(
    sink: Sink,
    paint: (text: string) => string,
    label: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    console[sink](paint(`[${label}] ${this.formatMessage(message)}`));
    if (data) {
      console[sink](paint(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('debug')) return;
    this.emit('log', chalk.gray, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('info')) return;
    this.emit('log', chalk.blue, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('warn')) return;
    this.emit('warn', chalk.yellow, 'WARN', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success message (shown unless level is above info).
   */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (shown unless level is above info).
   */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
