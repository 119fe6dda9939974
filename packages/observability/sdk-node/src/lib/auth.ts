import { CLIENT_IDENTIFIER } from './version';

/** Protocol version announced in the auth header */
export const SENTRY_PROTOCOL_VERSION = 6;

export interface AuthHeaderParams {
  timestamp: Date;
  publicKey: string;
  secretKey?: string;
}

/**
 * Value of the `X-Sentry-Auth` header. The `sentry_secret` clause is only
 * present when the DSN carries a secret key.
 */
export function buildAuthHeader(params: AuthHeaderParams): string {
  const parts = [
    `sentry_version=${SENTRY_PROTOCOL_VERSION}`,
    `sentry_client=${CLIENT_IDENTIFIER}`,
    `sentry_timestamp=${params.timestamp.getTime()}`,
    `sentry_key=${params.publicKey}`,
  ];
  if (params.secretKey !== undefined) {
    parts.push(`sentry_secret=${params.secretKey}`);
  }
  return `Sentry ${parts.join(', ')}`;
}
