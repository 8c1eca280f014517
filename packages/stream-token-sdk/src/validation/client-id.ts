/**
 * Local validation of client identifiers, run before any request is sent.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { InvalidClientIdError } from '../errors.js';

/** Longest client identifier the platform accepts. */
export const MAX_CLIENT_ID_LENGTH = 64;

const CLIENT_ID_PATTERN = /^[A-Za-z0-9@\-_.:]*$/;

const invalidClientId = (clientId: string, reason: string): InvalidClientIdError => ({
  code: 'invalid_client_id',
  message: `Invalid client id "${clientId}": ${reason}`,
  clientId,
  reason,
});

/**
 * Validates a client identifier.
 *
 * The character set is checked before the length, so an identifier that is
 * both too long and contains illegal characters reports the character set.
 *
 * @param clientId - The identifier to check
 * @returns Result with the identifier unchanged, or an invalid_client_id error
 *
 * @example
 * ```typescript
 * validateClientId('sensor-01@plant:a').isOk(); // true
 * validateClientId('sensor 01').isErr(); // true
 * ```
 */
export const validateClientId = (clientId: string): Result<string, InvalidClientIdError> => {
  if (!CLIENT_ID_PATTERN.test(clientId)) {
    return err(
      invalidClientId(
        clientId,
        'Can only contain: Alphanumeric characters (a-z, A-Z, 0-9), @, -, _, . and :'
      )
    );
  }

  if (clientId.length > MAX_CLIENT_ID_LENGTH) {
    return err(
      invalidClientId(clientId, `Exceeded a maximum of ${String(MAX_CLIENT_ID_LENGTH)} characters`)
    );
  }

  return ok(clientId);
};
