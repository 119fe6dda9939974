/**
 * Contracts for the Stackwire SDK
 * Defines the wire-format structures of the Sentry event protocol (v6)
 */

/**
 * Severity levels for events and breadcrumbs
 */
export type Severity = 'fatal' | 'error' | 'warning' | 'info' | 'debug';

/**
 * Stack frame as encoded on the wire
 */
export interface WireStackFrame {
  abs_path?: string;
  filename?: string;
  function?: string;
  lineno?: number;
  colno?: number;
  in_app?: boolean;
}

/**
 * Exception entry (`exception: [{ type, value }]`)
 */
export interface WireException {
  type: string;
  value: string;
}

/**
 * User interface
 */
export interface WireUser {
  id?: string;
  username?: string;
  email?: string;
  ip_address?: string;
  extras?: Record<string, unknown>;
}

/**
 * Breadcrumb entry
 */
export interface WireBreadcrumb {
  /** UTC, second precision, no zone suffix */
  timestamp: string;
  message?: string;
  category?: string;
  data?: Record<string, string>;
  level?: Severity;
  type?: string;
}

/**
 * SDK identification
 */
export interface WireSdk {
  name: string;
  version: string;
}

/**
 * Event attributes produced by a single event, before the client envelope
 */
export interface WireEventAttributes {
  platform: string;
  sdk: WireSdk;
  logger?: string;
  server_name?: string;
  release?: string;
  environment?: string;
  message?: string;
  transaction?: string;
  exception?: WireException[];
  stacktrace?: { frames: WireStackFrame[] };
  level?: Severity;
  culprit?: string;
  tags?: Record<string, string>;
  extra?: Record<string, unknown>;
  user?: WireUser;
  fingerprint?: string[];
  breadcrumbs?: { values: WireBreadcrumb[] };
}

/**
 * Full event body POSTed to the store endpoint
 */
export interface WireEvent extends WireEventAttributes {
  project: string;
  event_id: string;
  timestamp: string;
}
