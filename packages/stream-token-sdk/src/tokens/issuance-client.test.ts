import { describe, it, expect } from 'vitest';
import { createIssuanceClient, credentialHeaders } from './issuance-client.js';
import { createScriptedHttpClient, createSilentLogger } from '../test/mocks.js';
import { TEST_API_KEY, TEST_AUTH_URL, TEST_TENANT } from '../test/fixtures.js';

describe('credentialHeaders', () => {
  describe('given an api key', () => {
    it('uses the apikey header', () => {
      expect(credentialHeaders({ scheme: 'apikey', apiKey: TEST_API_KEY })).toEqual({
        apikey: TEST_API_KEY,
      });
    });
  });

  describe('given a bearer token', () => {
    it('uses the Authorization header', () => {
      expect(credentialHeaders({ scheme: 'bearer', token: 'a.b.c' })).toEqual({
        Authorization: 'Bearer a.b.c',
      });
    });
  });
});

describe('createIssuanceClient', () => {
  describe('issue', () => {
    describe('given a successful response', () => {
      it('posts the JSON body and returns the response text verbatim', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_AUTH_URL]: { status: 200, body: 'header.claims.signature' },
        });
        const issuance = createIssuanceClient(httpClient, createSilentLogger());

        const result = await issuance.issue({
          url: TEST_AUTH_URL,
          credentials: { scheme: 'apikey', apiKey: TEST_API_KEY },
          body: { tenant: TEST_TENANT },
        });

        expect(result._unsafeUnwrap()).toBe('header.claims.signature');
        expect(httpClient.requests).toEqual([
          {
            url: TEST_AUTH_URL,
            method: 'POST',
            headers: { 'Content-Type': 'application/json', apikey: TEST_API_KEY },
            body: '{"tenant":"test-tenant"}',
          },
        ]);
      });
    });

    describe('given a rejected request', () => {
      it('returns issuance_rejected with url, status and body', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_AUTH_URL]: { status: 403, body: 'unknown api key' },
        });
        const issuance = createIssuanceClient(httpClient, createSilentLogger());

        const result = await issuance.issue({
          url: TEST_AUTH_URL,
          credentials: { scheme: 'apikey', apiKey: TEST_API_KEY },
          body: { tenant: TEST_TENANT },
        });

        expect(result._unsafeUnwrapErr()).toEqual({
          code: 'issuance_rejected',
          message: `Error calling ${TEST_AUTH_URL}: status 403, body: unknown api key`,
          url: TEST_AUTH_URL,
          status: 403,
          body: 'unknown api key',
        });
      });
    });

    describe('given a transport failure', () => {
      it('returns transport_error', async () => {
        const httpClient = createScriptedHttpClient({
          [TEST_AUTH_URL]: { error: { type: 'network', message: 'connection refused' } },
        });
        const issuance = createIssuanceClient(httpClient, createSilentLogger());

        const result = await issuance.issue({
          url: TEST_AUTH_URL,
          credentials: { scheme: 'bearer', token: 'a.b.c' },
          body: {},
        });

        expect(result._unsafeUnwrapErr()).toMatchObject({
          code: 'transport_error',
          message: `Request to ${TEST_AUTH_URL} failed: connection refused`,
          url: TEST_AUTH_URL,
        });
      });
    });

    describe('given a body that cannot be serialised', () => {
      it('returns invalid_request without sending anything', async () => {
        const httpClient = createScriptedHttpClient({});
        const issuance = createIssuanceClient(httpClient, createSilentLogger());

        const result = await issuance.issue({
          url: TEST_AUTH_URL,
          credentials: { scheme: 'apikey', apiKey: TEST_API_KEY },
          body: { tenant: TEST_TENANT, exp: 10n },
        });

        const error = result._unsafeUnwrapErr();
        expect(error.code).toBe('invalid_request');
        expect(error.message).toMatch(/^Request cannot be serialised: /);
        expect(httpClient.requests).toHaveLength(0);
      });
    });
  });
});
