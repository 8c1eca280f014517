import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createManagementTokenFetcher } from './management-token-fetcher.js';
import type { ManagementTokenFetcherConfig } from './types.js';
import { createScriptedHttpClient, createSilentLogger } from '../test/mocks.js';
import { FIXED_NOW_SECONDS, TEST_CLIENT_SECRET, TEST_MANAGEMENT_URL } from '../test/fixtures.js';

const config: ManagementTokenFetcherConfig = {
  tokenUrl: TEST_MANAGEMENT_URL,
  clientId: 'robot:test-tenant',
  clientSecret: TEST_CLIENT_SECRET,
};

const tokenResponse = JSON.stringify({
  access_token: 'opaque-token',
  expires_in: 60,
  token_type: 'Bearer',
});

describe('createManagementTokenFetcher', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(FIXED_NOW_SECONDS * 1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('getToken', () => {
    describe('given an empty cache', () => {
      it('posts the client credentials form and returns a bearer header value', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_MANAGEMENT_URL]: { body: tokenResponse },
        });
        const fetcher = createManagementTokenFetcher(config, httpClient, createSilentLogger());

        const result = await fetcher.getToken();

        expect(result._unsafeUnwrap()).toBe('Bearer opaque-token');
        expect(httpClient.requests).toEqual([
          {
            url: TEST_MANAGEMENT_URL,
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: 'grant_type=client_credentials&client_id=robot%3Atest-tenant&client_secret=test-secret',
          },
        ]);
      });
    });

    describe('given a token that is still valid', () => {
      it('reuses it up to the validity margin', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_MANAGEMENT_URL]: { body: tokenResponse },
        });
        const fetcher = createManagementTokenFetcher(config, httpClient, createSilentLogger());

        await fetcher.getToken();
        vi.setSystemTime((FIXED_NOW_SECONDS + 55) * 1000);
        await fetcher.getToken();

        expect(httpClient.requests).toHaveLength(1);
      });
    });

    describe('given a token inside the validity margin', () => {
      it('fetches a new one', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_MANAGEMENT_URL]: { body: tokenResponse },
        });
        const fetcher = createManagementTokenFetcher(config, httpClient, createSilentLogger());

        await fetcher.getToken();
        vi.setSystemTime((FIXED_NOW_SECONDS + 56) * 1000);
        await fetcher.getToken();

        expect(httpClient.requests).toHaveLength(2);
      });
    });

    describe('given a rejected request', () => {
      it('returns issuance_rejected', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_MANAGEMENT_URL]: { status: 401, body: '{"error":"unauthorized_client"}' },
        });
        const fetcher = createManagementTokenFetcher(config, httpClient, createSilentLogger());

        const result = await fetcher.getToken();

        expect(result._unsafeUnwrapErr()).toEqual({
          code: 'issuance_rejected',
          message: `Error calling ${TEST_MANAGEMENT_URL}: status 401, body: {"error":"unauthorized_client"}`,
          url: TEST_MANAGEMENT_URL,
          status: 401,
          body: '{"error":"unauthorized_client"}',
        });
      });
    });

    describe('given a response without expires_in', () => {
      it('returns malformed_claims', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_MANAGEMENT_URL]: { body: '{"access_token":"opaque-token"}' },
        });
        const fetcher = createManagementTokenFetcher(config, httpClient, createSilentLogger());

        const result = await fetcher.getToken();

        const error = result._unsafeUnwrapErr();
        expect(error.code).toBe('malformed_claims');
        expect(error.message).toBe('Token response is missing access_token or expires_in');
      });
    });
  });
});
