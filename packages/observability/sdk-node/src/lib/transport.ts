import { ConfigurationError, TransportError } from './errors';

export interface HttpRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: Buffer;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends one request and yields the response. Implementations own their
 * connections and release them on `close()`.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  close(): void;
}

export interface FetchTransportOptions {
  /** Request timeout in ms (default: 5000) */
  timeout?: number;
}

/**
 * Default transport on Node's global `fetch`.
 *
 * Rejects with {@link TransportError} when no response arrives: network
 * failure, timeout, or a send after `close()`.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  /**
   * @throws ConfigurationError when `timeout` is not a positive number
   */
  constructor(options: FetchTransportOptions = {}) {
    const timeout = options.timeout ?? 5000;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigurationError(`Timeout must be a positive number of ms, got ${timeout}`);
    }
    this.timeout = timeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new TransportError('Transport is closed');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    this.inFlight.add(controller);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(
          this.closed ? 'Request aborted, transport closed' : `Request timed out after ${this.timeout}ms`,
          error,
        );
      }
      throw new TransportError(`Request to ${request.url} failed`, error);
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }
  }

  /**
   * Abort requests still in flight and refuse new ones
   */
  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}
