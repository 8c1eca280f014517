import { describe, it, expect, afterEach, vi } from 'vitest';
import { createFetchClient } from './fetch-client.js';

const TEST_URL = 'https://api.example.com/token';

describe('createFetchClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('text', () => {
    describe('given a successful response', () => {
      it('returns the body text', async () => {
        vi.stubGlobal(
          'fetch',
          vi.fn(() => Promise.resolve(new Response('a.b.c', { status: 200 })))
        );
        const client = createFetchClient();

        const result = await client.text({ url: TEST_URL, method: 'POST', body: '{}' });

        expect(result._unsafeUnwrap().body).toBe('a.b.c');
      });

      it('sends the method, headers and body it was given', async () => {
        const fetchMock = vi.fn((_url: string, _init?: RequestInit) =>
          Promise.resolve(new Response('', { status: 200 }))
        );
        vi.stubGlobal('fetch', fetchMock);
        const client = createFetchClient();

        await client.text({
          url: TEST_URL,
          method: 'POST',
          headers: { apikey: 'test-api-key' },
          body: '{"tenant":"test-tenant"}',
        });

        const init = fetchMock.mock.calls[0]?.[1];
        expect(fetchMock.mock.calls[0]?.[0]).toBe(TEST_URL);
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({ apikey: 'test-api-key' });
        expect(init?.body).toBe('{"tenant":"test-tenant"}');
      });
    });

    describe('given a non-success status', () => {
      it('returns an http error with status and body', async () => {
        vi.stubGlobal(
          'fetch',
          vi.fn(() =>
            Promise.resolve(new Response('denied', { status: 401, statusText: 'Unauthorized' }))
          )
        );
        const client = createFetchClient();

        const result = await client.text({ url: TEST_URL, method: 'POST' });

        expect(result._unsafeUnwrapErr()).toEqual({
          type: 'http',
          message: 'HTTP 401: Unauthorized',
          url: TEST_URL,
          status: 401,
          body: 'denied',
        });
      });
    });

    describe('given a network failure', () => {
      it('returns a network error', async () => {
        vi.stubGlobal('fetch', vi.fn(() => Promise.reject(new TypeError('fetch failed'))));
        const client = createFetchClient();

        const result = await client.text({ url: TEST_URL, method: 'POST' });

        const error = result._unsafeUnwrapErr();
        expect(error.type).toBe('network');
        expect(error.message).toBe('fetch failed');
        expect(error.url).toBe(TEST_URL);
      });
    });

    describe('given a request that outlives the timeout', () => {
      it('returns a timeout error', async () => {
        vi.stubGlobal(
          'fetch',
          vi.fn(
            (_url: string, init?: RequestInit) =>
              new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => {
                  const abort = new Error('aborted');
                  abort.name = 'AbortError';
                  reject(abort);
                });
              })
          )
        );
        const client = createFetchClient({ timeoutMs: 5 });

        const result = await client.text({ url: TEST_URL, method: 'POST' });

        const error = result._unsafeUnwrapErr();
        expect(error.type).toBe('timeout');
        expect(error.message).toBe('Request timed out after 5ms');
      });
    });
  });

  describe('json', () => {
    describe('given a JSON body', () => {
      it('parses it', async () => {
        vi.stubGlobal(
          'fetch',
          vi.fn(() => Promise.resolve(new Response('{"access_token":"opaque"}', { status: 200 })))
        );
        const client = createFetchClient();

        const result = await client.json<{ access_token: string }>({ url: TEST_URL, method: 'GET' });

        expect(result._unsafeUnwrap()).toEqual({ status: 200, body: { access_token: 'opaque' } });
      });

      it('asks for JSON unless the caller says otherwise', async () => {
        const fetchMock = vi.fn((_url: string, _init?: RequestInit) =>
          Promise.resolve(new Response('{}', { status: 200 }))
        );
        vi.stubGlobal('fetch', fetchMock);
        const client = createFetchClient();

        await client.json({ url: TEST_URL, method: 'GET', headers: { apikey: 'test-api-key' } });

        expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
          Accept: 'application/json',
          apikey: 'test-api-key',
        });
      });
    });

    describe('given a body that is not JSON', () => {
      it('returns a parse error', async () => {
        vi.stubGlobal(
          'fetch',
          vi.fn(() => Promise.resolve(new Response('<html>', { status: 200 })))
        );
        const client = createFetchClient();

        const result = await client.json({ url: TEST_URL, method: 'GET' });

        expect(result._unsafeUnwrapErr()).toMatchObject({
          type: 'parse',
          message: 'Response body is not JSON',
          url: TEST_URL,
          status: 200,
          body: '<html>',
        });
      });
    });
  });
});
