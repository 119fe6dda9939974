export { StackwireClient } from './lib/client';
export type { CaptureOptions, CaptureExceptionOptions } from './lib/client';
export { environmentAttributesFromProcess } from './lib/config';
export type {
  ClientLogger,
  Clock,
  StackTraceSource,
  StackwireClientConfig,
  UuidGenerator,
} from './lib/config';
export { CaptureResult, classifyResponse } from './lib/capture-result';
export { parseDsn } from './lib/dsn';
export type { Dsn } from './lib/dsn';
export { Event, describeException } from './lib/event';
export type { EventOptions, ExceptionLike } from './lib/event';
export { User } from './lib/user';
export type { UserOptions } from './lib/user';
export { Breadcrumb } from './lib/breadcrumb';
export type { BreadcrumbOptions } from './lib/breadcrumb';
export { SeverityLevel } from './lib/severity';
export { encodeStackTrace, parseStackTrace } from './lib/stack-trace';
export type { CallSiteLike, StackFrameFilter, StackTraceInput } from './lib/stack-trace';
export { buildEventAttributes, mergeAttributes, DEFAULT_LOGGER_NAME } from './lib/attributes';
export { encodePayload, decodePayload } from './lib/payload-codec';
export type { EncodedPayload } from './lib/payload-codec';
export { buildAuthHeader } from './lib/auth';
export { FetchTransport } from './lib/transport';
export type { HttpRequest, HttpResponse, HttpTransport, FetchTransportOptions } from './lib/transport';
export { StackwireError, ConfigurationError, PreconditionError, TransportError } from './lib/errors';
export { SDK_NAME, SDK_VERSION, CLIENT_IDENTIFIER } from './lib/version';
