/**
 * Centralized error handler with stack trace logging
 * Provides consistent error reporting for the CLI commands
 */

import chalk from 'chalk';
import { isRegionError } from '../ui/region-errors.js';

export interface ErrorHandlingOptions {
  /** Whether to include full stack trace */
  includeStack?: boolean;
  /** Custom context message */
  context?: string;
  /** Whether to exit the process (default: false) */
  exitProcess?: boolean;
  /** Exit code (default: 1) */
  exitCode?: number;
  /** Whether to suppress output */
  silent?: boolean;
}

export function isDebugEnabled(): boolean {
  return process.env.NODE_ENV === 'development' || !!process.env.DEBUG;
}

export class ErrorHandler {
  static formatError(error: unknown, options: ErrorHandlingOptions = {}): string {
    const output: string[] = [];

    if (options.context) {
      output.push(chalk.red.bold(`Error in ${options.context}:`));
    }

    let message = this.getErrorMessage(error);
    if (isRegionError(error)) {
      message = `[${error.code}] ${message}`;
    }
    output.push(chalk.red(message));

    // Sink failures keep the stream's own error as the cause
    if (error instanceof Error && error.cause !== undefined) {
      output.push(chalk.gray(`Caused by: ${this.getErrorMessage(error.cause)}`));
    }

    const stackTrace = this.getStackTrace(error);
    if (options.includeStack && stackTrace) {
      output.push('');
      output.push(chalk.dim('Stack trace:'));
      output.push(chalk.gray(stackTrace));
    }

    output.push('');
    return output.join('\n');
  }

  /**
   * Handle an error with consistent logging and optional stack trace
   */
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const {
      includeStack = isDebugEnabled(),
      context,
      exitProcess = false,
      exitCode = 1,
      silent = false,
    } = options;

    if (!silent) {
      process.stderr.write(this.formatError(error, { includeStack, context }) + '\n');
    }

    if (exitProcess) {
      process.exit(exitCode);
    }
  }

  /**
   * Extract error message safely
   */
  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Extract stack trace safely
   */
  static getStackTrace(error: unknown): string | undefined {
    if (error instanceof Error) {
      return error.stack;
    }
    return undefined;
  }
}

/**
 * Convenience function for quick error handling
 */
export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}
