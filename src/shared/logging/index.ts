/**
 * Logging module exports
 */

export {
  createLogger,
  createChildLogger,
  startTimer,
  type Logger,
  type LogContext,
  type LogError,
  type LogLevel,
  type Timer,
} from './logger.js';
