/**
 * Console logging for the CLI and the walkers' diagnostics.
 *
 * Every line goes to stderr: stdout carries the diagram when no output file is given.
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

type Paint = (text: string) => string;

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    this.emit('debug', chalk.gray, `[DEBUG] ${message}`);
  }

  info(message: string): void {
    this.emit('info', chalk.blue, `[INFO] ${message}`);
  }

  warn(message: string): void {
    this.emit('warn', chalk.yellow, `[WARN] ${message}`);
  }

  /**
   * Log an error, followed by the stack of `error` when one is given.
   */
  error(message: string, error?: Error): void {
    this.emit('error', chalk.red, `[ERROR] ${message}`);
    if (error) {
      this.emit('error', chalk.red, error.stack ?? error.message);
    }
  }

  /**
   * Log a completed step (shown at info level).
   */
  success(message: string): void {
    this.emit('info', chalk.green, `✓ ${message}`);
  }

  private emit(level: LogLevel, paint: Paint, line: string): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    console.error(paint(line));
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
