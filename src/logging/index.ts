export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  LOG_LEVELS,
  REDACTED,
  isLogLevel,
  shouldLog,
  redactMetadata,
  createDefaultFormatter,
  StderrTransport,
  MemoryTransport,
  ProvisioningLogger,
  createLogger,
  getLogger,
  setRootLogger,
} from "./logger.js";
