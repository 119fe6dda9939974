import pino, { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import { scrubSensitiveData, ScrubberOptions } from '@stackwire/observability-scrubber';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Component name, written as `service` on every line */
  name: string;
  /** Log level */
  level?: LogLevel;
  /** Environment name */
  environment?: string;
  /** Whether to pretty print (development only) */
  prettyPrint?: boolean;
  /** Additional base context to include in all logs */
  baseContext?: Record<string, unknown>;
  /** Scrubber options for sensitive data */
  scrubberOptions?: ScrubberOptions;
  /** Custom pino options */
  pinoOptions?: LoggerOptions;
  /** Where to write log lines (default: stdout) */
  destination?: DestinationStream;
}

/**
 * Context to be added to log entries
 */
export interface LogContext {
  [key: string]: unknown;
}

function createPinoLogger(config: LoggerConfig): PinoLogger {
  const {
    name,
    level = 'info',
    environment = process.env['NODE_ENV'] || 'development',
    prettyPrint = false,
    baseContext = {},
    pinoOptions = {},
    destination,
  } = config;

  const options: LoggerOptions = {
    name,
    level,
    base: {
      service: name,
      environment,
      ...scrubSensitiveData(baseContext, config.scrubberOptions),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    ...pinoOptions,
  };

  // pino-pretty runs in a worker and cannot share a caller-supplied stream
  if (prettyPrint && environment === 'development' && !destination) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}

function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause !== undefined) {
    serialized['cause'] = error.cause instanceof Error ? serializeError(error.cause) : error.cause;
  }
  return serialized;
}

/**
 * Stackwire Logger
 * Pino-based structured JSON logger; every context object is scrubbed
 * before it is written.
 */
export class Logger {
  private pino: PinoLogger;
  private scrubberOptions?: ScrubberOptions;

  constructor(config: LoggerConfig) {
    this.pino = createPinoLogger(config);
    this.scrubberOptions = config.scrubberOptions;
  }

  private prepareContext(context?: LogContext): Record<string, unknown> {
    return context ? scrubSensitiveData(context, this.scrubberOptions) : {};
  }

  debug(message: string, context?: LogContext): void {
    this.pino.debug(this.prepareContext(context), message);
  }

  info(message: string, context?: LogContext): void {
    this.pino.info(this.prepareContext(context), message);
  }

  warn(message: string, context?: LogContext): void {
    this.pino.warn(this.prepareContext(context), message);
  }

  /**
   * Log an error message
   */
  error(message: string, context?: LogContext): void;
  error(error: Error, context?: LogContext): void;
  error(message: string, error: Error, context?: LogContext): void;
  error(
    messageOrError: string | Error,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (messageOrError instanceof Error) {
      // error(error, context?)
      const extra = errorOrContext instanceof Error ? undefined : errorOrContext;
      this.pino.error(
        this.prepareContext({ error: serializeError(messageOrError), ...extra }),
        messageOrError.message,
      );
    } else if (errorOrContext instanceof Error) {
      // error(message, error, context?)
      this.pino.error(
        this.prepareContext({ error: serializeError(errorOrContext), ...context }),
        messageOrError,
      );
    } else {
      this.pino.error(this.prepareContext(errorOrContext), messageOrError);
    }
  }

  /**
   * Log a fatal message
   */
  fatal(message: string, context?: LogContext): void;
  fatal(error: Error, context?: LogContext): void;
  fatal(messageOrError: string | Error, context?: LogContext): void {
    if (messageOrError instanceof Error) {
      this.pino.fatal(
        this.prepareContext({ error: serializeError(messageOrError), ...context }),
        messageOrError.message,
      );
    } else {
      this.pino.fatal(this.prepareContext(context), messageOrError);
    }
  }

  /**
   * Create a child logger with additional base context
   */
  child(context: LogContext): Logger {
    const childLogger = Object.create(this) as Logger;
    childLogger.pino = this.pino.child(this.prepareContext(context));
    return childLogger;
  }

  /**
   * Get the underlying pino instance
   */
  getPino(): PinoLogger {
    return this.pino;
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

let defaultLogger: Logger | null = null;

/**
 * Configure the process-wide default logger
 */
export function configureLogger(config: LoggerConfig): Logger {
  defaultLogger = new Logger(config);
  return defaultLogger;
}

/**
 * Get the default logger instance
 * @throws Error if logger not configured
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    throw new Error('Logger not configured. Call configureLogger() first.');
  }
  return defaultLogger;
}
