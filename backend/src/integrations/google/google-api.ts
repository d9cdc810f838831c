import { withTimeout } from '../with-timeout.js';

export interface GoogleApiResponse {
  ok: boolean;
  status: number;
  body: unknown;
  text: string;
}

export async function postGoogleJson(
  url: string,
  accessToken: string,
  payload: unknown,
  timeoutMs: number,
): Promise<GoogleApiResponse> {
  const controller = new AbortController();
  const response = await withTimeout(
    fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${accessToken}`,
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    }),
    timeoutMs,
    controller,
  );

  const text = await response.text();
  return {
    ok: response.ok,
    status: response.status,
    body: parseJson(text),
    text,
  };
}

function parseJson(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** Extracts Google's `error.message`, falling back to the raw body. */
export function describeGoogleError(response: GoogleApiResponse): string {
  const body = response.body;
  if (body !== null && typeof body === 'object' && 'error' in body) {
    const error = body.error;
    if (error !== null && typeof error === 'object' && 'message' in error) {
      if (typeof error.message === 'string') {
        return error.message;
      }
    }
  }
  return response.text.slice(0, 500) || 'no response body';
}
