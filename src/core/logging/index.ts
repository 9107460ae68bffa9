export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, LOG_LEVELS, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getResourceLogger,
  logger,
} from './logger.js';
export type { LifecycleLogger, LoggerConfig, LoggerContext, LogLevel } from './types.js';
