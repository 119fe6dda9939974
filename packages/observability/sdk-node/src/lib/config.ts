import * as os from 'os';
import type { LogContext } from '@stackwire/observability-logger';
import { Event } from './event';
import type { StackTraceInput } from './stack-trace';
import type { HttpTransport } from './transport';

/** Time source for event and auth timestamps */
export type Clock = () => Date;

/** Produces the `event_id`: 32 hex characters, no dashes */
export type UuidGenerator = () => string;

/** Finds the stack of a thrown value when the caller passed none */
export type StackTraceSource = (exception: unknown) => StackTraceInput | undefined;

/**
 * What the client logs through. `Logger` from
 * `@stackwire/observability-logger` satisfies it.
 */
export interface ClientLogger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error: Error, context?: LogContext): void;
}

/**
 * Client configuration
 */
export interface StackwireClientConfig {
  /** DSN issued for the project (default: `STACKWIRE_DSN`) */
  dsn?: string;
  /**
   * Attributes mixed into every event with lower precedence than the
   * event's own: logger name, server name, release, environment
   */
  environmentAttributes?: Event;
  /** Gzip request bodies (default: true) */
  compressPayload?: boolean;
  /** Request timeout in ms for the default transport, positive (default: 5000) */
  timeout?: number;
  /** Replaces the default fetch transport */
  transport?: HttpTransport;
  clock?: Clock;
  uuidGenerator?: UuidGenerator;
  stackTraceSource?: StackTraceSource;
  /** Replaces the default pino logger */
  logger?: ClientLogger;
  /** Log every submission at debug level (default: false) */
  debug?: boolean;
}

/**
 * Environment attributes taken from the process: `NODE_ENV` as the
 * environment, `APP_VERSION` as the release and `HOSTNAME` (or the OS host
 * name) as the server name.
 */
export function environmentAttributesFromProcess(
  env: NodeJS.ProcessEnv = process.env,
): Event {
  return new Event({
    environment: env['NODE_ENV'] || undefined,
    release: env['APP_VERSION'] || undefined,
    serverName: env['HOSTNAME'] || os.hostname(),
  });
}
