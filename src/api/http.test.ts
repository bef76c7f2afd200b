import { describe, it, expect, vi, afterEach } from 'vitest';
import { fetchWithTimeout, readBytes, readText } from './http';
import { TransportError } from '../lib/errors';

describe('http', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('fetchWithTimeout', () => {
    it('returns any response, whatever its status', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('oops', { status: 500 })));

      const result = await fetchWithTimeout('https://api.test/a');

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.status).toBe(500);
    });

    it('passes the init through with an abort signal', async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response(''));
      vi.stubGlobal('fetch', fetchMock);

      await fetchWithTimeout('https://api.test/a', { method: 'HEAD' }, 1000);

      expect(fetchMock).toHaveBeenCalledWith('https://api.test/a', {
        method: 'HEAD',
        signal: expect.any(AbortSignal),
      });
    });

    it('maps a network failure to TransportError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNRESET')));

      const result = await fetchWithTimeout('https://api.test/a');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error.message).toBe('GET https://api.test/a failed');
        expect(result.error.kind).toBe('transport');
      }
    });

    it('maps a timeout to TransportError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(
          (_url: string, init: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
            })
        )
      );

      const result = await fetchWithTimeout('https://api.test/slow', { method: 'HEAD' }, 5);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('HEAD https://api.test/slow timed out after 5ms');
      }
    });
  });

  describe('readText', () => {
    it('reads the body', async () => {
      expect(await readText(new Response('hello'))).toEqual({ ok: true, value: 'hello' });
    });

    it('maps a body that cannot be read to TransportError', async () => {
      const response = new Response('hello');
      await response.text();

      const result = await readText(response);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error.message).toBe('failed to read response body');
      }
    });
  });

  describe('readBytes', () => {
    it('reads the body as bytes', async () => {
      const result = await readBytes(new Response(new Uint8Array([1, 2, 3])));
      expect(result).toEqual({ ok: true, value: new Uint8Array([1, 2, 3]) });
    });
  });
});
