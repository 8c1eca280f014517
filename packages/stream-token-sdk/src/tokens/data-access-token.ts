/**
 * Data-access tokens: scoped credentials for the MQTT and HTTP brokers,
 * obtained by presenting an access token.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { MalformedClaimsError, MalformedTokenError } from '../errors.js';
import { parseSignedToken } from './codec.js';
import { topicPermissionSchema, type TopicPermission } from './permissions.js';
import type { SignedToken } from './types.js';

/** Port used for `mqtts` when the token lists none. */
export const DEFAULT_MQTT_PORT = 8883;

/** Port used for `mqttwss` when the token lists none. */
export const DEFAULT_WEBSOCKET_PORT = 443;

/**
 * Broker ports a data-access token may connect to.
 */
export interface BrokerPorts {
  readonly mqtts: readonly number[];
  readonly mqttwss: readonly number[];
}

/**
 * Decoded claims of a data-access token.
 */
export interface DataAccessTokenClaims {
  readonly gen: number;
  /** Broker host the client should connect to */
  readonly endpoint: string;
  readonly ports: BrokerPorts;
  readonly iss: string;
  /** Granted topic permissions */
  readonly permissions: readonly TopicPermission[];
  readonly exp: number;
  readonly clientId: string;
  readonly iat: number;
  readonly tenantId: string;
}

/**
 * A data-access token.
 */
export type DataAccessToken = SignedToken<DataAccessTokenClaims>;

export const brokerPortsSchema = z.object({
  mqtts: z.array(z.number().int()).default([]),
  mqttwss: z.array(z.number().int()).default([]),
});

const dataAccessTokenClaimsSchema: z.ZodType<DataAccessTokenClaims, z.ZodTypeDef, unknown> = z
  .object({
    gen: z.number().int().default(0),
    endpoint: z.string(),
    ports: brokerPortsSchema.default({}),
    iss: z.string(),
    claims: z.array(topicPermissionSchema).default([]),
    exp: z.number().int(),
    'client-id': z.string(),
    iat: z.number().int(),
    'tenant-id': z.string(),
  })
  .transform((claims) => ({
    gen: claims.gen,
    endpoint: claims.endpoint,
    ports: claims.ports,
    iss: claims.iss,
    permissions: claims.claims,
    exp: claims.exp,
    clientId: claims['client-id'],
    iat: claims.iat,
    tenantId: claims['tenant-id'],
  }));

/**
 * Parses a raw data-access token.
 *
 * @param raw - The compact token string returned by the endpoint
 * @returns Result with the token, or a malformed error
 */
export const parseDataAccessToken = (
  raw: string
): Result<DataAccessToken, MalformedTokenError | MalformedClaimsError> =>
  parseSignedToken(raw, dataAccessTokenClaimsSchema);

/**
 * Port for a `mqtts` connection.
 */
export const mqttPort = (token: DataAccessToken): number =>
  token.claims.ports.mqtts[0] ?? DEFAULT_MQTT_PORT;

/**
 * Port for a websocket (`mqttwss`) connection.
 */
export const websocketPort = (token: DataAccessToken): number =>
  token.claims.ports.mqttwss[0] ?? DEFAULT_WEBSOCKET_PORT;

/**
 * Websocket URL of the broker.
 */
export const websocketEndpoint = (token: DataAccessToken): string =>
  `wss://${token.claims.endpoint}/mqtt`;
