/**
 * Logging Module
 *
 * Provides:
 * - Scoped console logger ("[Scope] message")
 * - GitHub Actions workflow commands for annotations and log groups
 */

export {
  Logger,
  createLogger,
  escapeCommandData,
  type LoggerOptions,
  type LogSink,
} from './logger.js';
