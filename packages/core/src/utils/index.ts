/**
 * Utility exports
 */
export {
  logger,
  createLogger,
  silentLogger,
  setLogAggregator,
  getLogAggregator,
  formatLogEntry,
  MemoryLogAggregator,
  FileLogAggregator,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogAggregator,
} from './logger.js'
