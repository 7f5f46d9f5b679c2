/**
 * Leveled logging for the CLI.
 *
 * Everything goes to stderr: stdout belongs to command output, which is
 * often piped (`--json`) or evaluated by a shell (`print-env`).
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

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: LogLevel, line: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const color = level === 'debug' ? chalk.gray
      : level === 'warn' ? chalk.yellow
      : level === 'error' ? chalk.red
      : chalk.blue;
    const tag = `[${level.toUpperCase()}]`;
    console.error(color(this.prefix ? `${tag} [${this.prefix}] ${line}` : `${tag} ${line}`));
    if (data) {
      console.error(color(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.write('error', message);
    if (error instanceof Error) {
      // Stack traces only when debugging; the message already carries the cause.
      if (this.shouldLog('debug')) {
        console.error(chalk.red(error.stack ?? error.message));
      }
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.green(`✓ ${message}`));
  }

  /**
   * Create a child logger with a prefix. The child starts at the parent's level.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
