/**
 * Error types returned by token issuance, decoding and caching.
 *
 * Every failure is returned to the immediate caller as a `Result` error; nothing
 * on the token path is retried or recovered internally.
 *
 * @packageDocumentation
 */

import type { HttpError } from './http/types.js';

/**
 * The HTTP call itself failed (DNS, connection, timeout, unreadable body).
 */
export interface TransportError {
  readonly code: 'transport_error';
  readonly message: string;
  readonly url: string;
  readonly cause: HttpError;
}

/**
 * The issuing endpoint answered with a non-success status.
 */
export interface IssuanceRejectedError {
  readonly code: 'issuance_rejected';
  readonly message: string;
  readonly url: string;
  readonly status: number;
  /** Free-form diagnostic text returned by the endpoint */
  readonly body: string;
}

/**
 * The response is not three non-empty dot-separated segments.
 */
export interface MalformedTokenError {
  readonly code: 'malformed_token';
  readonly message: string;
}

/**
 * The claims segment is not base64url, not JSON, or not the expected shape.
 */
export interface MalformedClaimsError {
  readonly code: 'malformed_claims';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A client identifier failed local validation; no request was sent.
 */
export interface InvalidClientIdError {
  readonly code: 'invalid_client_id';
  readonly message: string;
  readonly clientId: string;
  readonly reason: string;
}

/**
 * The request could not be serialised (a BigInt or a cycle in client
 * claims); no request was sent.
 */
export interface InvalidRequestError {
  readonly code: 'invalid_request';
  readonly message: string;
  readonly cause: unknown;
}

/**
 * Discriminated union of all token errors.
 */
export type TokenError =
  | TransportError
  | IssuanceRejectedError
  | MalformedTokenError
  | MalformedClaimsError
  | InvalidClientIdError
  | InvalidRequestError;

/**
 * Error codes for token failures.
 */
export type TokenErrorCode = TokenError['code'];

/**
 * Maps an HTTP client error onto the token error taxonomy.
 *
 * @param error - The error returned by the HTTP client
 * @returns `issuance_rejected` for status errors, `transport_error` otherwise
 */
export const fromHttpError = (error: HttpError): TransportError | IssuanceRejectedError => {
  if (error.type === 'http' && error.status !== undefined) {
    return {
      code: 'issuance_rejected',
      message: `Error calling ${error.url}: status ${String(error.status)}, body: ${error.body ?? ''}`,
      url: error.url,
      status: error.status,
      body: error.body ?? '',
    };
  }

  return {
    code: 'transport_error',
    message: `Request to ${error.url} failed: ${error.message}`,
    url: error.url,
    cause: error,
  };
};

export const createMalformedTokenError = (message: string): MalformedTokenError => ({
  code: 'malformed_token',
  message,
});

export const createMalformedClaimsError = (
  message: string,
  cause?: unknown
): MalformedClaimsError => ({
  code: 'malformed_claims',
  message,
  cause,
});

export const createInvalidRequestError = (cause: unknown): InvalidRequestError => ({
  code: 'invalid_request',
  message: `Request cannot be serialised: ${cause instanceof Error ? cause.message : String(cause)}`,
  cause,
});
