export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  type LogDestination,
  type LoggingOptions,
  LOG_LEVELS,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  FleetLogger,
  createLogger,
  createSilentLogger,
} from "./logger.js";
