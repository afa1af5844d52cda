import chalk from 'chalk';

export interface LoggerOptions {
  enableDebug?: boolean;
  /** prefix printed before every message, e.g. "[HTTP]" */
  prefix?: string;
}

export class Logger {
  private debugEnabled: boolean;
  private prefix: string;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.enableDebug ?? process.env.DEBUG === 'true';
    this.prefix = options.prefix ? `${options.prefix} ` : '';
  }

  /**
   * Log an informational message
   */
  info(message: string): void {
    console.log(chalk.blue('ℹ'), `${this.prefix}${message}`);
  }

  /**
   * Log a warning message
   */
  warn(message: string): void {
    console.log(chalk.yellow('⚠'), `${this.prefix}${message}`);
  }

  /**
   * Log an error message. The stack is only printed with debug enabled.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red('✗'), `${this.prefix}${message}`);
    if (error && this.debugEnabled) {
      console.error(chalk.red(error.stack || error.message));
    }
  }

  /**
   * Log a debug message (only shown when debug is enabled)
   */
  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(chalk.gray('🐛'), chalk.gray(`${this.prefix}${message}`));
    }
  }

  /**
   * Log raw text without formatting
   */
  raw(message: string): void {
    console.log(message);
  }

  /**
   * Create a logger sharing this one's debug setting with its own prefix
   */
  child(prefix: string): Logger {
    return new Logger({ enableDebug: this.debugEnabled, prefix });
  }

  /**
   * Enable or disable debug logging
   */
  setDebugEnabled(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  /**
   * Check if debug logging is enabled
   */
  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }
}
