export { createLogger } from './logger.js';
export { ENVIRONMENTS, LOG_LEVELS } from './types.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  LogFlushHandler,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
} from './types.js';
