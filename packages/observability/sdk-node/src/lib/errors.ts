/**
 * Base class for every error the SDK raises
 */
export class StackwireError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The DSN is missing or malformed. Raised at client construction.
 */
export class ConfigurationError extends StackwireError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

/**
 * A value object was built with arguments that break its contract
 * (a user without id or IP address, a breadcrumb without a timestamp).
 */
export class PreconditionError extends StackwireError {
  constructor(message: string) {
    super('PRECONDITION_FAILED', message);
  }
}

/**
 * The request never produced an HTTP response: network error, timeout,
 * or a transport that was already closed.
 */
export class TransportError extends StackwireError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_ERROR', message, cause === undefined ? undefined : { cause });
  }
}
