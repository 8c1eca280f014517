/**
 * Decoding of compact signed tokens (`header.claims.signature`).
 *
 * Only the claims segment is read. The signature is never checked here.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import { base64url } from 'jose';
import type { z } from 'zod';
import type { MalformedClaimsError, MalformedTokenError } from '../errors.js';
import { createMalformedClaimsError, createMalformedTokenError } from '../errors.js';
import type { BaseClaims, SignedToken } from './types.js';

/**
 * The three segments of a compact token.
 */
export interface TokenSegments {
  readonly header: string;
  readonly claims: string;
  readonly signature: string;
}

/**
 * Splits a compact token into its three segments.
 *
 * @param raw - The compact token string
 * @returns Result with the segments, or `malformed_token`
 */
export const splitToken = (raw: string): Result<TokenSegments, MalformedTokenError> => {
  const parts = raw.split('.');
  const [header, claims, signature] = parts;

  if (
    parts.length !== 3 ||
    header === undefined ||
    claims === undefined ||
    signature === undefined ||
    header.length === 0 ||
    claims.length === 0 ||
    signature.length === 0
  ) {
    return err(
      createMalformedTokenError(
        `Expected 3 non-empty dot-separated segments, found ${String(parts.length)}`
      )
    );
  }

  return ok({ header, claims, signature });
};

/**
 * Decodes the claims segment of a compact token into a JSON value.
 *
 * @param raw - The compact token string
 * @returns Result with the parsed claims object, or a malformed error
 */
export const decodeClaims = (
  raw: string
): Result<unknown, MalformedTokenError | MalformedClaimsError> => {
  const segments = splitToken(raw);
  if (segments.isErr()) {
    return err(segments.error);
  }

  let json: string;
  try {
    json = new TextDecoder('utf-8', { fatal: true }).decode(
      base64url.decode(segments.value.claims)
    );
  } catch (error) {
    return err(createMalformedClaimsError('Claims segment is not valid base64url', error));
  }

  try {
    return ok(JSON.parse(json));
  } catch (error) {
    return err(createMalformedClaimsError('Claims segment is not valid JSON', error));
  }
};

/**
 * Freezes a value and everything reachable from it.
 */
const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

/**
 * Decodes a compact token and validates its claims against a schema.
 *
 * @param raw - The compact token string
 * @param schema - Schema for the token kind's claims
 * @returns Result with the token, frozen down to its nested claims, or a malformed error
 */
export const parseSignedToken = <TClaims extends BaseClaims>(
  raw: string,
  schema: z.ZodType<TClaims, z.ZodTypeDef, unknown>
): Result<SignedToken<TClaims>, MalformedTokenError | MalformedClaimsError> => {
  const decoded = decodeClaims(raw);
  if (decoded.isErr()) {
    return err(decoded.error);
  }

  const parsed = schema.safeParse(decoded.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    return err(
      createMalformedClaimsError(
        `Claims do not match the expected shape${where}: ${issue?.message ?? 'invalid'}`,
        parsed.error
      )
    );
  }

  return ok(
    Object.freeze({
      raw,
      expiresAt: parsed.data.exp,
      claims: deepFreeze(parsed.data),
    })
  );
};

/**
 * Strips the signature so a token can be logged.
 *
 * @param raw - The compact token string
 * @returns The header and claims segments joined by `.`
 */
export const redactToken = (raw: string): string => raw.split('.').slice(0, 2).join('.');
