/**
 * Protocol tokens: credentials a device presents when it connects to the
 * streaming transport directly.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { MalformedClaimsError, MalformedTokenError } from '../errors.js';
import { parseSignedToken } from './codec.js';
import { brokerPortsSchema, type BrokerPorts } from './data-access-token.js';
import { topicPermissionSchema, type TopicPermission } from './permissions.js';
import type { SignedToken } from './types.js';

export interface ProtocolTokenClaims {
  readonly gen: number;
  readonly endpoint: string;
  readonly iss: string;
  readonly permissions: readonly TopicPermission[];
  readonly exp: number;
  readonly clientId: string;
  readonly iat: number;
  readonly tenantId: string;
  /** Only present when the issuer lists ports */
  readonly ports?: BrokerPorts | undefined;
}

export type ProtocolToken = SignedToken<ProtocolTokenClaims>;

const protocolTokenClaimsSchema: z.ZodType<ProtocolTokenClaims, z.ZodTypeDef, unknown> = z
  .object({
    gen: z.number().int().default(0),
    endpoint: z.string(),
    iss: z.string(),
    claims: z.array(topicPermissionSchema).default([]),
    exp: z.number().int(),
    'client-id': z.string(),
    iat: z.number().int(),
    'tenant-id': z.string(),
    ports: brokerPortsSchema.optional(),
  })
  .transform((claims) => ({
    gen: claims.gen,
    endpoint: claims.endpoint,
    iss: claims.iss,
    permissions: claims.claims,
    exp: claims.exp,
    clientId: claims['client-id'],
    iat: claims.iat,
    tenantId: claims['tenant-id'],
    ports: claims.ports,
  }));

export const parseProtocolToken = (
  raw: string
): Result<ProtocolToken, MalformedTokenError | MalformedClaimsError> =>
  parseSignedToken(raw, protocolTokenClaimsSchema);
