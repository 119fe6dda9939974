import type {
  WireEventAttributes,
  WireException,
} from '@stackwire/observability-contracts';
import { Breadcrumb } from './breadcrumb';
import { SeverityLevel } from './severity';
import { encodeStackTrace, StackFrameFilter, StackTraceInput } from './stack-trace';
import { User } from './user';
import { SDK_NAME, SDK_PLATFORM, SDK_VERSION } from './version';

/**
 * What an event reports about the thrown value: a type name and a display
 * string. Use {@link describeException} to adapt anything that was thrown.
 */
export interface ExceptionLike {
  readonly type: string;
  readonly value: string;
}

/**
 * Describe a thrown value.
 *
 * - `Error`: its `name` and `message`
 * - other objects: the constructor name and `String(value)`
 * - primitives: `typeof` and `String(value)`
 */
export function describeException(thrown: unknown): ExceptionLike {
  if (thrown instanceof Error) {
    return { type: thrown.name || 'Error', value: thrown.message };
  }
  if (thrown !== null && typeof thrown === 'object') {
    const ctor: unknown = Object.getPrototypeOf(thrown)?.constructor;
    const type = typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
    return { type, value: String(thrown) };
  }
  return { type: thrown === null ? 'null' : typeof thrown, value: String(thrown) };
}

export interface EventOptions {
  /** The logger that logged the event */
  loggerName?: string;
  serverName?: string;
  /** Version of the application */
  release?: string;
  /** e.g. "production", "staging" */
  environment?: string;
  /** Generally an event carries a message or an exception */
  message?: string;
  /** e.g. the route name: "/users/<username>/" */
  transaction?: string;
  exception?: ExceptionLike;
  /** Stack of the exception, innermost frame first */
  stackTrace?: StackTraceInput;
  level?: SeverityLevel;
  /** What caused the event */
  culprit?: string;
  /** Searchable name/value pairs */
  tags?: Record<string, string>;
  /** Arbitrary JSON-serializable name/value pairs */
  extra?: Record<string, unknown>;
  /** Grouping override, see {@link Event.DEFAULT_FINGERPRINT} */
  fingerprint?: string[];
  /** Replaces the client's user for this event */
  userContext?: User;
  /** Sent in the order given */
  breadcrumbs?: Breadcrumb[];
}

export interface EventSerializationOptions {
  stackFrameFilter?: StackFrameFilter;
  /** Reports a stack trace that could not be parsed */
  onTraceError?: (error: unknown) => void;
}

function isNonEmpty(map: object | undefined): map is object {
  return map !== undefined && Object.keys(map).length > 0;
}

/**
 * An event to report. Immutable once created.
 *
 * Also used as the bag of environment attributes a client adds to every
 * event (`loggerName`, `serverName`, `release`, `environment`).
 */
export class Event {
  /**
   * Refers to the server's default grouping. Only needed when supplementing
   * it, e.g. `[Event.DEFAULT_FINGERPRINT, 'checkout']`.
   */
  static readonly DEFAULT_FINGERPRINT = '{{ default }}';

  readonly loggerName?: string;
  readonly serverName?: string;
  readonly release?: string;
  readonly environment?: string;
  readonly message?: string;
  readonly transaction?: string;
  readonly exception?: ExceptionLike;
  readonly stackTrace?: StackTraceInput;
  readonly level?: SeverityLevel;
  readonly culprit?: string;
  readonly tags?: Readonly<Record<string, string>>;
  readonly extra?: Readonly<Record<string, unknown>>;
  readonly fingerprint?: readonly string[];
  readonly userContext?: User;
  readonly breadcrumbs?: readonly Breadcrumb[];

  constructor(options: EventOptions = {}) {
    this.loggerName = options.loggerName;
    this.serverName = options.serverName;
    this.release = options.release;
    this.environment = options.environment;
    this.message = options.message;
    this.transaction = options.transaction;
    this.exception = options.exception
      ? Object.freeze({ type: options.exception.type, value: options.exception.value })
      : undefined;
    this.stackTrace =
      typeof options.stackTrace === 'string' || options.stackTrace === undefined
        ? options.stackTrace
        : Object.freeze([...options.stackTrace]);
    this.level = options.level;
    this.culprit = options.culprit;
    this.tags = options.tags ? Object.freeze({ ...options.tags }) : undefined;
    this.extra = options.extra ? Object.freeze({ ...options.extra }) : undefined;
    this.fingerprint = options.fingerprint ? Object.freeze([...options.fingerprint]) : undefined;
    this.userContext = options.userContext;
    this.breadcrumbs = options.breadcrumbs ? Object.freeze([...options.breadcrumbs]) : undefined;
    Object.freeze(this);
  }

  /**
   * Wire attributes of this event. Absent fields are left out; empty
   * `tags`, `extra`, `fingerprint` and `breadcrumbs` are left out too.
   */
  toJson(options: EventSerializationOptions = {}): WireEventAttributes {
    const json: WireEventAttributes = {
      platform: SDK_PLATFORM,
      sdk: {
        name: SDK_NAME,
        version: SDK_VERSION,
      },
    };

    if (this.loggerName !== undefined) json.logger = this.loggerName;
    if (this.serverName !== undefined) json.server_name = this.serverName;
    if (this.release !== undefined) json.release = this.release;
    if (this.environment !== undefined) json.environment = this.environment;
    if (this.message !== undefined) json.message = this.message;
    if (this.transaction !== undefined) json.transaction = this.transaction;

    if (this.exception !== undefined) {
      const exception: WireException = {
        type: this.exception.type,
        value: this.exception.value,
      };
      json.exception = [exception];
    }

    if (this.stackTrace !== undefined) {
      json.stacktrace = {
        frames: encodeStackTrace(this.stackTrace, {
          stackFrameFilter: options.stackFrameFilter,
          onError: options.onTraceError,
        }),
      };
    }

    if (this.level !== undefined) json.level = this.level;
    if (this.culprit !== undefined) json.culprit = this.culprit;
    if (isNonEmpty(this.tags)) json.tags = { ...this.tags };
    if (isNonEmpty(this.extra)) json.extra = { ...this.extra };

    if (this.userContext !== undefined) {
      const user = this.userContext.toJson();
      if (isNonEmpty(user)) json.user = user;
    }

    if (this.fingerprint !== undefined && this.fingerprint.length > 0) {
      json.fingerprint = [...this.fingerprint];
    }

    if (this.breadcrumbs !== undefined && this.breadcrumbs.length > 0) {
      json.breadcrumbs = {
        values: this.breadcrumbs.map((breadcrumb) => breadcrumb.toJson()),
      };
    }

    return json;
  }
}
