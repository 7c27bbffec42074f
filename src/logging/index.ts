/**
 * Logging Module Index
 */

export {
  type LabLogLevel,
  type LabLogEntry,
  type LogFormatter,
  type LogTransport,
  type LabLogger,
  type LogContext,
  type LoggerOptions,
  isLogLevel,
  compareLogLevels,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  LabLoggerImpl,
  createLabLogger,
  getLabLogger,
  setGlobalLabLogger,
} from "./logger.js";
