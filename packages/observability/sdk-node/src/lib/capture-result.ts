import { z } from 'zod';
import type { HttpResponse } from './transport';

/**
 * Outcome of one capture: the ID the server assigned, or why it refused
 */
export type CaptureResult =
  | { readonly isSuccessful: true; readonly eventId: string }
  | { readonly isSuccessful: false; readonly error: string };

export const CaptureResult = {
  success(eventId: string): CaptureResult {
    const result: CaptureResult = { isSuccessful: true, eventId };
    return Object.freeze(result);
  },
  failure(error: string): CaptureResult {
    const result: CaptureResult = { isSuccessful: false, error };
    return Object.freeze(result);
  },
};

const storeResponseSchema = z.object({
  id: z.string(),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * HTTP 200 with `{ "id": ... }` is a success; anything else is a failure
 * carrying the status and, when sent, the `x-sentry-error` reason.
 */
export function classifyResponse(response: HttpResponse): CaptureResult {
  if (response.status !== 200) {
    let error = `Store endpoint responded with HTTP ${response.status}`;
    const reason = response.headers['x-sentry-error'];
    if (reason !== undefined) {
      error += `: ${reason}`;
    }
    return CaptureResult.failure(error);
  }

  const parsed = storeResponseSchema.safeParse(parseJson(response.body));
  if (!parsed.success) {
    return CaptureResult.failure('Store endpoint responded with HTTP 200 but no event id in the body');
  }
  return CaptureResult.success(parsed.data.id);
}
