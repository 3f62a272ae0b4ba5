import chalk from 'chalk';
import type { AppConfig } from '../utils/config.js';
import { LogLevel, logger, parseLogLevel } from '../utils/logger.js';

/**
 * Apply the logging section of the configuration to the global logger
 */
export function configureLogger(config: AppConfig): void {
  logger.setLevel(parseLogLevel(config.logging.level) ?? LogLevel.INFO);
  logger.setTimestamps(config.logging.timestamps);
  logger.setColors(config.logging.colors);

  if (!config.logging.colors) {
    chalk.level = 0;
  }
}
