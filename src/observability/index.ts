/**
 * Observability module exports
 */

export {
  type LogLevel,
  type LogContext,
  type LogEntry,
  type Logger,
  LOG_LEVELS,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
} from './logging.js';
