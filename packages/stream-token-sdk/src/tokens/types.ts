/**
 * Token types shared by every token kind.
 *
 * @packageDocumentation
 */

/**
 * The capability every cacheable token has: its raw credential and expiry.
 */
export interface TokenLifetime {
  /** The compact token string, used verbatim as a bearer credential */
  readonly raw: string;
  /** Expiration time (Unix timestamp, seconds) */
  readonly expiresAt: number;
}

/**
 * A decoded compact signed token.
 *
 * Only ever built by decoding `raw`, so `claims` and `expiresAt` always agree
 * with it. The signature segment is not verified locally; trust in the token
 * rests on the TLS channel to the issuer.
 */
export interface SignedToken<TClaims> extends TokenLifetime {
  readonly claims: TClaims;
}

/**
 * Claims every token kind carries.
 */
export interface BaseClaims {
  /** Expiration time (Unix timestamp, seconds) */
  readonly exp: number;
}

/**
 * Credential presented to an issuing endpoint.
 */
export type IssuanceCredentials =
  | { readonly scheme: 'apikey'; readonly apiKey: string }
  | { readonly scheme: 'bearer'; readonly token: string };

/**
 * A value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };
