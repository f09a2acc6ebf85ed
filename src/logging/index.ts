export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  settleLog,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
} from './logger.js';
