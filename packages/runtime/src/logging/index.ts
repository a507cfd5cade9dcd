export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  createLevelLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
