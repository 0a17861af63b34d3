/**
 * Logging Module
 *
 * Provides:
 * - Scoped loggers ("[Backend] ...") with level filtering
 * - Injectable sinks for tests
 */

export {
  createLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from './logger.js';
