import type { Result } from '../types';
import { TransportError } from '../lib/errors';

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

/**
 * Fetch with an explicit timeout.
 *
 * Any status code is a successful transport; callers inspect `response.status`
 * themselves. Network failures and timeouts come back as TransportError. The
 * timeout also bounds reading the body afterwards.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS
): Promise<Result<Response, TransportError>> {
  const signal = AbortSignal.timeout(timeoutMs);
  const method = init.method ?? 'GET';

  try {
    const response = await fetch(url, { ...init, signal });
    return { ok: true, value: response };
  } catch (error) {
    const message = signal.aborted
      ? `${method} ${url} timed out after ${timeoutMs}ms`
      : `${method} ${url} failed`;
    return { ok: false, error: new TransportError(message, { cause: error }) };
  }
}

/**
 * Read a response body as text, mapping a broken stream to TransportError.
 */
export async function readText(response: Response): Promise<Result<string, TransportError>> {
  try {
    return { ok: true, value: await response.text() };
  } catch (error) {
    return {
      ok: false,
      error: new TransportError('failed to read response body', { cause: error }),
    };
  }
}

/**
 * Read a response body as bytes, mapping a broken stream to TransportError.
 */
export async function readBytes(response: Response): Promise<Result<Uint8Array, TransportError>> {
  try {
    return { ok: true, value: new Uint8Array(await response.arrayBuffer()) };
  } catch (error) {
    return {
      ok: false,
      error: new TransportError('failed to read response body', { cause: error }),
    };
  }
}
