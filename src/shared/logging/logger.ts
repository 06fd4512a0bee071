/**
 * Structured logging with Pino
 *
 * Wraps a Pino instance behind a small interface so that services log with a
 * component/operation context and errors are serialized consistently.
 * All output goes to stderr; stdout is left to the indexing tools.
 */

import { performance } from 'node:perf_hooks';
import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Arbitrary structured fields attached to a log line
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Error shape accepted by Logger.error when no Error instance is at hand
 */
export interface LogError {
  message: string;
  code?: string;
  stack?: string;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | LogError, context?: LogContext): void;
  /**
   * Create a logger whose lines carry the given component (and operation)
   */
  child(component: string, operation?: string): Logger;
}

/**
 * Timer handle returned by startTimer
 */
export interface Timer {
  /** Stops the timer, logs the duration and returns it in milliseconds */
  end(): number;
}

function serializeError(error: Error | LogError): LogContext {
  const serialized: LogContext = { message: error.message };
  if (error instanceof Error) {
    serialized.name = error.name;
  }
  if ('code' in error && error.code !== undefined) {
    serialized.code = error.code;
  }
  if (error.stack) {
    serialized.stack = error.stack;
  }
  return serialized;
}

class PinoLoggerAdapter implements Logger {
  constructor(private readonly pinoLogger: PinoLogger) {}

  debug(message: string, context?: LogContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string, error?: Error | LogError, context?: LogContext): void {
    const fields: LogContext = { ...context };
    if (error) {
      fields.error = serializeError(error);
    }
    this.pinoLogger.error(fields, message);
  }

  child(component: string, operation?: string): Logger {
    const bindings: LogContext = { component };
    if (operation) {
      bindings.operation = operation;
    }
    return new PinoLoggerAdapter(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a root logger
 *
 * @param level - Minimum level written
 * @param pretty - Human-readable output through pino-pretty instead of JSON lines
 * @param destination - Stream to write to; overrides `pretty` (used by tests)
 */
export function createLogger(
  level: LogLevel = 'info',
  pretty: boolean = false,
  destination?: DestinationStream
): Logger {
  const options: pino.LoggerOptions = {
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (destination) {
    return new PinoLoggerAdapter(pino(options, destination));
  }

  if (pretty) {
    return new PinoLoggerAdapter(
      pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      })
    );
  }

  return new PinoLoggerAdapter(pino(options, pino.destination(2)));
}

/**
 * Create a component-scoped child logger
 */
export function createChildLogger(
  logger: Logger,
  component: string,
  operation?: string
): Logger {
  return logger.child(component, operation);
}

/**
 * Start timing an operation; the duration is logged at debug level on end()
 */
export function startTimer(
  operation: string,
  logger: Logger,
  context?: LogContext
): Timer {
  const startedAt = performance.now();
  let durationMs: number | null = null;

  return {
    end(): number {
      if (durationMs === null) {
        durationMs = Math.round(performance.now() - startedAt);
        logger.debug(`${operation} completed`, { ...context, operation, durationMs });
      }
      return durationMs;
    },
  };
}
