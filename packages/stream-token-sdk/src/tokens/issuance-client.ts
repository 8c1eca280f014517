/**
 * Client for the authentication endpoints that issue tokens.
 *
 * @packageDocumentation
 */

import { ok, err, Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { HttpClient } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createLogger } from '../logging/logger.js';
import {
  createInvalidRequestError,
  fromHttpError,
  type InvalidRequestError,
  type IssuanceRejectedError,
  type TransportError,
} from '../errors.js';
import type { IssuanceCredentials } from './types.js';

/**
 * A single token issuance request.
 */
export interface IssuanceRequest {
  /** Endpoint URL */
  readonly url: string;
  /** Credential presented to the endpoint */
  readonly credentials: IssuanceCredentials;
  /** JSON request body */
  readonly body: Readonly<Record<string, unknown>>;
}

/**
 * Token issuance client interface.
 */
export interface IssuanceClient {
  /**
   * Sends one POST to an issuing endpoint. No retries.
   *
   * @param request - Endpoint, credential and body
   * @returns Result with the response body verbatim, or the mapped error
   */
  readonly issue: (request: IssuanceRequest) => Promise<Result<string, IssuanceError>>;
}

/** Errors `issue` returns. */
export type IssuanceError = TransportError | IssuanceRejectedError | InvalidRequestError;

const serializeBody = Result.fromThrowable(
  (body: Readonly<Record<string, unknown>>): string => JSON.stringify(body),
  createInvalidRequestError
);

/**
 * Builds the credential header for a request.
 */
export const credentialHeaders = (credentials: IssuanceCredentials): Record<string, string> => {
  switch (credentials.scheme) {
    case 'apikey':
      return { apikey: credentials.apiKey };
    case 'bearer':
      return { Authorization: `Bearer ${credentials.token}` };
  }
};

/**
 * Creates a token issuance client.
 *
 * @param httpClient - HTTP client (optional)
 * @param logger - Logger (optional)
 * @returns IssuanceClient instance
 *
 * @example
 * ```typescript
 * const issuance = createIssuanceClient();
 * const result = await issuance.issue({
 *   url: 'https://api.example.com/auth/v0/token',
 *   credentials: { scheme: 'apikey', apiKey: process.env['STREAM_TOKEN_API_KEY'] ?? '' },
 *   body: { tenant: 'my-tenant' },
 * });
 * ```
 */
export const createIssuanceClient = (
  httpClient: HttpClient = createFetchClient(),
  logger: Logger = createLogger()
): IssuanceClient => {
  const issue = async (request: IssuanceRequest): Promise<Result<string, IssuanceError>> => {
    const body = serializeBody(request.body);
    if (body.isErr()) {
      return err(body.error);
    }

    logger.debug({ url: request.url, body: request.body }, 'Requesting token');

    const response = await httpClient.text({
      url: request.url,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...credentialHeaders(request.credentials),
      },
      body: body.value,
    });

    if (response.isErr()) {
      const error = fromHttpError(response.error);
      logger.debug({ url: request.url, code: error.code }, 'Token request failed');
      return err(error);
    }

    return ok(response.value.body);
  };

  return { issue };
};
