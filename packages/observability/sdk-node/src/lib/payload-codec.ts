import * as zlib from 'zlib';

/** Fixed so identical payloads always compress to identical bytes */
export const GZIP_LEVEL = 6;

export interface EncodedPayload {
  body: Buffer;
  /** `Content-Encoding` to send with the body, if any */
  contentEncoding?: 'gzip';
}

export interface EncodePayloadOptions {
  compress: boolean;
}

/**
 * UTF-8 JSON text of `attributes`, gzipped when `compress` is set
 */
export function encodePayload(attributes: object, options: EncodePayloadOptions): EncodedPayload {
  const json = Buffer.from(JSON.stringify(attributes), 'utf8');

  if (!options.compress) {
    return { body: json };
  }

  return {
    body: zlib.gzipSync(json, { level: GZIP_LEVEL }),
    contentEncoding: 'gzip',
  };
}

/**
 * Inverse of {@link encodePayload}
 */
export function decodePayload(payload: EncodedPayload): unknown {
  const json = payload.contentEncoding === 'gzip' ? zlib.gunzipSync(payload.body) : payload.body;
  return JSON.parse(json.toString('utf8'));
}
