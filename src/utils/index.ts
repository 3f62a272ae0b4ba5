// Utility exports

export { Logger, LogLevel, logger, log, parseLogLevel, routeLoggerToRegion, type LogSink, type LoggerConfig } from './logger.js';
export { ErrorHandler, handleError, isDebugEnabled, type ErrorHandlingOptions } from './error-handler.js';
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  validateConfig,
  readEnvOverrides,
  ConfigError,
  AppConfigSchema,
  type AppConfig,
} from './config.js';
export { getAppHomeDir, getConfigFile } from './app-paths.js';
