/**
 * Ledger Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type LedgerLogger,
  type LogContext,
  type LoggingOptions,
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  logLevelFromEnv,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  createLedgerLogger,
  getLedgerLogger,
  setGlobalLedgerLogger,
} from "./logger.js";
