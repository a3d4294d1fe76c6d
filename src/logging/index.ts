/**
 * Logging utilities.
 */

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
