import chalk from 'chalk';
import { isReportError } from '../types/errors';

type Level = 'error' | 'warning' | 'info' | 'debug';

const PREFIXES: Record<Level, (text: string) => string> = {
  error: (text) => chalk.red(text),
  warning: (text) => chalk.yellow(text),
  info: (text) => chalk.cyan(text),
  debug: (text) => chalk.gray(text),
};

/**
 * Logger for report extensions. Everything goes to stderr so stdout stays
 * free for the rendered report; debug lines only in verbose mode.
 */
class Logger {
  private verbose: boolean = false;

  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  private write(level: Level, message: string, args: unknown[]): void {
    console.error(PREFIXES[level](`${level.toUpperCase()}:`), message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.write('warning', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      this.write('debug', message, args);
    }
  }

  /**
   * Log a failure; report errors print as "<Kind>: <message>", anything else
   * with its stack in verbose mode
   */
  failure(error: unknown): void {
    if (isReportError(error)) {
      this.error(error.toString());
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.error(message);
    if (error instanceof Error && error.stack) {
      this.debug(error.stack);
    }
  }
}

export const logger = new Logger();
