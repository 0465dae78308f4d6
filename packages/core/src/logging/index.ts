/**
 * @fileoverview Logging exports
 */

export {
  BurrowLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

export {
  withLoggingContext,
  getLoggingContext,
  updateLoggingContext,
  type LoggingContext,
} from './log-context.js';
