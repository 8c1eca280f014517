/**
 * Shared test fixtures and constants.
 */

import { SignJWT, type JWTPayload } from 'jose';

// ============================================================================
// Time Constants
// ============================================================================

/** Fixed "now" for tests that fake the clock (Unix timestamp, seconds) */
export const FIXED_NOW_SECONDS = 1_700_000_000;

/** One hour in seconds */
export const ONE_HOUR_SECONDS = 60 * 60;

// ============================================================================
// URL Constants
// ============================================================================

export const TEST_AUTH_URL = 'https://api.example.com/auth/v0/token';
export const TEST_PROTOCOL_URL = 'https://api.example.com/protocol/v0/token';
export const TEST_BROKER_HOST = 'broker.example.com';
export const TEST_DATA_ACCESS_URL = `https://${TEST_BROKER_HOST}/datastreams/v0/mqtt/token`;
export const TEST_MANAGEMENT_URL = 'https://auth.example.com/realms/test/protocol/openid-connect/token';

// ============================================================================
// Credentials
// ============================================================================

export const TEST_TENANT = 'test-tenant';
export const TEST_API_KEY = 'test-api-key';
export const TEST_CLIENT_ID = 'sensor-01';
export const TEST_CLIENT_SECRET = 'test-secret';
export const TEST_JWT_SECRET = 'test-secret';

// ============================================================================
// Claims
// ============================================================================

export const TEST_PERMISSION = {
  action: 'subscribe',
  resource: { type: 'topic', stream: 'weather', prefix: '/tt', topic: '+/+/+/forecast/#' },
} as const;

/** Wire claims of an access token valid for an hour after FIXED_NOW_SECONDS */
export const accessTokenClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  gen: 1,
  endpoint: TEST_BROKER_HOST,
  iss: 'test-issuer',
  exp: FIXED_NOW_SECONDS + ONE_HOUR_SECONDS,
  'tenant-id': TEST_TENANT,
  claims: { 'datastreams/v0/mqtt/token': {} },
  ...overrides,
});

/** Wire claims of a data-access token valid for an hour after FIXED_NOW_SECONDS */
export const dataAccessTokenClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  gen: 1,
  endpoint: TEST_BROKER_HOST,
  ports: { mqtts: [8884], mqttwss: [8443] },
  iss: 'test-issuer',
  claims: [TEST_PERMISSION],
  exp: FIXED_NOW_SECONDS + ONE_HOUR_SECONDS,
  'client-id': TEST_CLIENT_ID,
  iat: FIXED_NOW_SECONDS,
  'tenant-id': TEST_TENANT,
  ...overrides,
});

/** Wire claims of a protocol token valid for an hour after FIXED_NOW_SECONDS */
export const protocolTokenClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  gen: 1,
  endpoint: TEST_BROKER_HOST,
  iss: 'test-issuer',
  claims: [TEST_PERMISSION],
  exp: FIXED_NOW_SECONDS + ONE_HOUR_SECONDS,
  'client-id': TEST_CLIENT_ID,
  iat: FIXED_NOW_SECONDS,
  'tenant-id': TEST_TENANT,
  ...overrides,
});

// ============================================================================
// Tokens
// ============================================================================

/**
 * Signs claims into a compact HS256 token.
 */
export const createTestJwt = (claims: JWTPayload): Promise<string> =>
  new SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .sign(new TextEncoder().encode(TEST_JWT_SECRET));

/**
 * Builds a compact token whose claims segment is the given text, unsigned.
 */
export const createRawToken = (claimsSegment: string): string =>
  `eyJhbGciOiJIUzI1NiJ9.${claimsSegment}.c2lnbmF0dXJl`;
