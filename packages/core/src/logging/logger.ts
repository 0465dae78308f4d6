/**
 * @fileoverview Centralized logging for Burrow
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output in production and under test
 * - Pretty printing for development
 * - Component child loggers
 * - Automatic session/turn context from AsyncLocalStorage
 */

import pino from 'pino';
import { getLoggingContext } from './log-context.js';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /** Write JSON lines here instead of stdout; ignored when pretty */
  destination?: pino.DestinationStream;
}

export interface LogContext {
  sessionId?: string;
  component?: string;
  toolName?: string;
  [key: string]: unknown;
}

// =============================================================================
// Logger Factory
// =============================================================================

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === fromEnv) ?? 'info';
}

function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const nodeEnv = process.env.NODE_ENV;
  const pretty = options.pretty ?? (nodeEnv !== 'production' && nodeEnv !== 'test');

  const pinoOptions: pino.LoggerOptions = {
    level: resolveLevel(options),
    name: options.name ?? 'burrow',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        name: bindings.name,
      }),
    },
    // Every line emitted inside withLoggingContext() carries its fields
    mixin: () => ({ ...getLoggingContext() }),
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class BurrowLogger {
  private readonly pino: pino.Logger;
  readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, base?: pino.Logger) {
    this.pino = base ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): BurrowLogger {
    return new BurrowLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  fatal(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.fatal({ err: error }, msg);
    } else {
      this.pino.fatal(error ?? {}, msg);
    }
  }

  /**
   * Start a timer; the returned function logs the elapsed time at debug level
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
    };
  }

  async timed<T>(label: string, fn: () => Promise<T>, level: LogLevel = 'debug'): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const duration = performance.now() - start;
      this.pino[level]({ durationMs: duration.toFixed(2) }, `${label} completed`);
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.error(`${label} failed`, {
        durationMs: duration.toFixed(2),
        err: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: BurrowLogger | null = null;

function getDefaultLogger(): BurrowLogger {
  defaultLogger ??= new BurrowLogger();
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): BurrowLogger {
  return getDefaultLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
