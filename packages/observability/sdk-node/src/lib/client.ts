import { v4 as uuidv4 } from 'uuid';
import type { WireEvent } from '@stackwire/observability-contracts';
import { createLogger } from '@stackwire/observability-logger';
import { buildEventAttributes } from './attributes';
import { buildAuthHeader } from './auth';
import { CaptureResult, classifyResponse } from './capture-result';
import {
  ClientLogger,
  Clock,
  StackTraceSource,
  StackwireClientConfig,
  UuidGenerator,
} from './config';
import { Dsn, parseDsn } from './dsn';
import { ConfigurationError, TransportError } from './errors';
import { describeException, Event } from './event';
import { formatIsoSecondPrecision } from './iso-date';
import { encodePayload } from './payload-codec';
import { SeverityLevel } from './severity';
import type { StackFrameFilter, StackTraceInput } from './stack-trace';
import { FetchTransport, HttpResponse, HttpTransport } from './transport';
import type { User } from './user';
import { CLIENT_IDENTIFIER } from './version';

/**
 * Options for {@link StackwireClient.capture}
 */
export interface CaptureOptions {
  event: Event;
  /** Sees the frames just before they are encoded */
  stackFrameFilter?: StackFrameFilter;
}

/**
 * Options for {@link StackwireClient.captureException}
 */
export interface CaptureExceptionOptions {
  /** Defaults to what the configured stack trace source finds */
  stackTrace?: StackTraceInput;
  stackFrameFilter?: StackFrameFilter;
}

function generateUuidWithoutDashes(): string {
  return uuidv4().replace(/-/g, '');
}

function stackOfError(exception: unknown): StackTraceInput | undefined {
  return exception instanceof Error && typeof exception.stack === 'string'
    ? exception.stack
    : undefined;
}

/**
 * Stackwire Client
 *
 * Submits events to the store endpoint derived from a DSN. One capture is
 * one HTTP request; nothing is retried or queued, the caller gets the
 * outcome.
 */
export class StackwireClient {
  readonly dsn: Dsn;
  readonly environmentAttributes?: Event;
  readonly compressPayload: boolean;

  /**
   * Attached to every event captured after it is set. An event's own
   * `userContext` replaces it for that event.
   */
  userContext?: User;

  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly uuidGenerator: UuidGenerator;
  private readonly stackTraceSource: StackTraceSource;
  private readonly logger: ClientLogger;
  private closed = false;

  /**
   * @throws ConfigurationError when no DSN is given or it is malformed
   */
  constructor(config: StackwireClientConfig = {}) {
    const dsn = config.dsn || process.env['STACKWIRE_DSN'];
    if (!dsn) {
      throw new ConfigurationError('A DSN is required: pass `dsn` or set STACKWIRE_DSN');
    }

    this.dsn = parseDsn(dsn);
    this.environmentAttributes = config.environmentAttributes;
    this.compressPayload = config.compressPayload ?? true;
    this.transport = config.transport || new FetchTransport({ timeout: config.timeout });
    this.clock = config.clock || (() => new Date());
    this.uuidGenerator = config.uuidGenerator || generateUuidWithoutDashes;
    this.stackTraceSource = config.stackTraceSource || stackOfError;
    this.logger =
      config.logger ||
      createLogger({ name: 'stackwire', level: config.debug ? 'debug' : 'warn' });
  }

  get storeUrl(): string {
    return this.dsn.storeUrl;
  }

  /**
   * Report an event
   *
   * Resolves with a failure result when the endpoint answers with anything
   * but HTTP 200; rejects with {@link TransportError} when no answer arrives.
   */
  async capture(options: CaptureOptions): Promise<CaptureResult> {
    if (this.closed) {
      throw new TransportError('Client is closed');
    }

    const now = this.clock();
    const eventId = this.uuidGenerator();

    const attributes = buildEventAttributes({
      event: options.event,
      environmentAttributes: this.environmentAttributes,
      userContext: this.userContext,
      stackFrameFilter: options.stackFrameFilter,
      onTraceError: (error) => {
        this.logger.warn('Could not parse stack trace, sending the event without frames', {
          eventId,
          error,
        });
      },
    });

    const payload: WireEvent = {
      project: this.dsn.projectId,
      event_id: eventId,
      timestamp: formatIsoSecondPrecision(now),
      ...attributes,
    };

    const encoded = encodePayload(payload, { compress: this.compressPayload });

    const headers: Record<string, string> = {
      'User-Agent': CLIENT_IDENTIFIER,
      'Content-Type': 'application/json',
      'X-Sentry-Auth': buildAuthHeader({
        timestamp: now,
        publicKey: this.dsn.publicKey,
        secretKey: this.dsn.secretKey,
      }),
    };
    if (encoded.contentEncoding) {
      headers['Content-Encoding'] = encoded.contentEncoding;
    }

    this.logger.debug('Submitting event', {
      eventId,
      url: this.dsn.storeUrl,
      headers,
      bytes: encoded.body.length,
    });

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url: this.dsn.storeUrl,
        headers,
        body: encoded.body,
      });
    } catch (error) {
      const transportError =
        error instanceof TransportError ? error : new TransportError('Failed to submit event', error);
      this.logger.error('Failed to submit event', transportError, { eventId });
      throw transportError;
    }

    const result = classifyResponse(response);
    if (!result.isSuccessful) {
      this.logger.warn('Event was not accepted', {
        eventId,
        status: response.status,
        reason: result.error,
      });
    }
    return result;
  }

  /**
   * Report a thrown value, with its stack when one can be found
   */
  captureException(
    exception: unknown,
    options: CaptureExceptionOptions = {},
  ): Promise<CaptureResult> {
    const event = new Event({
      exception: describeException(exception),
      stackTrace: options.stackTrace ?? this.stackTraceSource(exception),
    });
    return this.capture({ event, stackFrameFilter: options.stackFrameFilter });
  }

  /**
   * Report a message
   */
  captureMessage(message: string, level: SeverityLevel = SeverityLevel.info): Promise<CaptureResult> {
    return this.capture({ event: new Event({ message, level }) });
  }

  /**
   * Release the transport. Captures after this reject.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.transport.close();
  }

  toString(): string {
    return `StackwireClient("${this.dsn.storeUrl}")`;
  }
}
