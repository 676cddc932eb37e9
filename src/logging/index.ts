export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  type LoggerOptions,
  LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  SubsystemLogger,
  createLogger,
  getLogger,
  setRootLogger,
} from "./logger.js";
