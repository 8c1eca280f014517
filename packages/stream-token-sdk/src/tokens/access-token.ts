/**
 * Control-plane access tokens ("REST tokens").
 *
 * An access token is exchanged for data-access and protocol tokens. It is
 * issued by the access-token endpoint against an API key.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { MalformedClaimsError, MalformedTokenError } from '../errors.js';
import { parseSignedToken } from './codec.js';
import type { SignedToken } from './types.js';

/** Wire name of the claim that scopes an access token to a client. */
export const STREAM_TOKEN_CLAIM = 'datastreams/v0/mqtt/token';

/**
 * Client-scoping claim of an access token. All fields are optional both in
 * requests and in issued tokens.
 */
export interface StreamTokenClaim {
  /** Client identifier the access token is restricted to */
  readonly id?: string | undefined;
  /** Tenant the client belongs to */
  readonly tenant?: string | undefined;
  /** Requested lifetime of derived tokens, relative (seconds) */
  readonly relexp?: number | undefined;
  /** Requested expiry of derived tokens (Unix timestamp, seconds) */
  readonly exp?: number | undefined;
}

/**
 * Decoded claims of an access token.
 */
export interface AccessTokenClaims {
  /** Token generation */
  readonly gen: number;
  /** Host that issues data-access tokens for this access token */
  readonly endpoint: string;
  /** Issuer */
  readonly iss: string;
  /** Expiration time (Unix timestamp, seconds) */
  readonly exp: number;
  /** Tenant the token was issued to */
  readonly tenantId: string;
  /** Client-scoping claim, empty when the token is not client-scoped */
  readonly streamClaim: StreamTokenClaim;
}

/**
 * A control-plane access token.
 */
export type AccessToken = SignedToken<AccessTokenClaims>;

export const streamTokenClaimSchema = z.object({
  id: z.string().optional(),
  tenant: z.string().optional(),
  relexp: z.number().int().optional(),
  exp: z.number().int().optional(),
});

const accessTokenClaimsSchema: z.ZodType<AccessTokenClaims, z.ZodTypeDef, unknown> = z
  .object({
    gen: z.number().int().default(0),
    endpoint: z.string(),
    iss: z.string(),
    exp: z.number().int(),
    'tenant-id': z.string(),
    claims: z
      .object({ [STREAM_TOKEN_CLAIM]: streamTokenClaimSchema.default({}) })
      .default({}),
  })
  .transform((claims) => ({
    gen: claims.gen,
    endpoint: claims.endpoint,
    iss: claims.iss,
    exp: claims.exp,
    tenantId: claims['tenant-id'],
    streamClaim: claims.claims[STREAM_TOKEN_CLAIM],
  }));

/**
 * Parses a raw access token.
 *
 * @param raw - The compact token string returned by the endpoint
 * @returns Result with the token, or a malformed error
 */
export const parseAccessToken = (
  raw: string
): Result<AccessToken, MalformedTokenError | MalformedClaimsError> =>
  parseSignedToken(raw, accessTokenClaimsSchema);

/**
 * The client an access token is scoped to, falling back to its tenant.
 */
export const accessTokenClientId = (token: AccessToken): string =>
  token.claims.streamClaim.id ?? token.claims.tenantId;
