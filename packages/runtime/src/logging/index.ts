export {
  createConsoleLogger,
  createCapturingLogger,
  silentLogger,
  errorData,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
