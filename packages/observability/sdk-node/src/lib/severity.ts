import type { Severity } from '@stackwire/observability-contracts';

/**
 * Severity of an event or breadcrumb; values are the wire names
 */
export const SeverityLevel = Object.freeze({
  fatal: 'fatal',
  error: 'error',
  warning: 'warning',
  info: 'info',
  debug: 'debug',
} as const satisfies Record<Severity, Severity>);

export type SeverityLevel = Severity;

