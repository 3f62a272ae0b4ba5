/**
 * Centralized logging utility
 *
 * NOTE: The region controller never logs on its own behalf. This logger
 * writes to stderr by default; route it through routeLoggerToRegion() to
 * have log lines scroll above an active bottom region instead.
 */

import chalk from 'chalk';
import type { RegionController } from '../ui/region-controller.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export type LogSink = (line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  useTimestamps: boolean;
  useColors: boolean;
  sink: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  useTimestamps: false, // Disabled by default for cleaner output
  useColors: true,
  sink: stderrSink,
};

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT],
]);

/**
 * Parse a level name such as "warn" (case-insensitive)
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES.get(name.trim().toLowerCase());
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(useColors: boolean): void {
    this.config.useColors = useColors;
  }

  setTimestamps(useTimestamps: boolean): void {
    this.config.useTimestamps = useTimestamps;
  }

  /**
   * Replace where formatted lines are written
   */
  setSink(sink: LogSink): void {
    this.config.sink = sink;
  }

  getSink(): LogSink {
    return this.config.sink;
  }

  /**
   * Check if a given log level would be printed
   */
  shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  private write(message: string, level: LogLevel): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.useTimestamps
      ? this.format(`[${new Date().toISOString()}] `, chalk.dim)
      : '';

    this.config.sink(timestamp + message);
  }

  /**
   * Format a message with color
   */
  private format(message: string, colorFn: (str: string) => string): string {
    if (this.config.useColors) {
      return colorFn(message);
    }
    return message;
  }

  debug(message: string): void {
    this.write(this.format(message, chalk.gray), LogLevel.DEBUG);
  }

  info(message: string): void {
    this.write(this.format(message, chalk.white), LogLevel.INFO);
  }

  success(message: string): void {
    this.write(this.format(message, chalk.green), LogLevel.INFO);
  }

  warn(message: string): void {
    this.write(this.format(message, chalk.yellow), LogLevel.WARN);
  }

  error(message: string): void {
    this.write(this.format(message, chalk.red), LogLevel.ERROR);
  }

  /**
   * Log message with custom color
   */
  log(message: string, colorFn: (str: string) => string = chalk.white): void {
    this.write(this.format(message, colorFn), LogLevel.INFO);
  }

  /**
   * Log a new line (for spacing)
   */
  newline(): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.config.sink('');
    }
  }

  /**
   * Log a separator line
   */
  separator(char: string = '─', length: number = 80): void {
    this.write(this.format(char.repeat(length), chalk.dim), LogLevel.INFO);
  }
}

/**
 * Send a logger's output above an active region.
 * While the region is not active, lines go to the logger's previous sink.
 * Returns a function that restores the previous sink.
 */
export function routeLoggerToRegion(target: Logger, region: RegionController): () => void {
  const previous = target.getSink();

  target.setSink((line) => {
    if (region.isActive()) {
      region.printLine(line);
    } else {
      previous(line);
    }
  });

  return () => target.setSink(previous);
}

/**
 * Global logger instance
 */
export const logger = new Logger();

/**
 * Convenience functions for direct import
 */
export const log = {
  debug: (message: string) => logger.debug(message),
  info: (message: string) => logger.info(message),
  success: (message: string) => logger.success(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
  log: (message: string, colorFn?: (str: string) => string) => logger.log(message, colorFn),
  newline: () => logger.newline(),
  separator: (char?: string, length?: number) => logger.separator(char, length),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
