/**
 * Structured file logging
 */

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type LogSink,
} from './logger.js';
