export type {
  TokenLifetime,
  SignedToken,
  BaseClaims,
  IssuanceCredentials,
  JsonValue,
} from './types.js';
export { isTokenValid, nowInSeconds, VALIDITY_MARGIN_SECONDS } from './validity.js';
export { splitToken, decodeClaims, parseSignedToken, redactToken } from './codec.js';
export type { TokenSegments } from './codec.js';
export {
  topicActionSchema,
  topicPermissionSchema,
  createTopicPermission,
  fullyQualifiedTopicName,
} from './permissions.js';
export type { TopicAction, TopicResource, TopicPermission } from './permissions.js';
export {
  STREAM_TOKEN_CLAIM,
  streamTokenClaimSchema,
  parseAccessToken,
  accessTokenClientId,
} from './access-token.js';
export type { AccessToken, AccessTokenClaims, StreamTokenClaim } from './access-token.js';
export {
  DEFAULT_MQTT_PORT,
  DEFAULT_WEBSOCKET_PORT,
  brokerPortsSchema,
  parseDataAccessToken,
  mqttPort,
  websocketPort,
  websocketEndpoint,
} from './data-access-token.js';
export type { DataAccessToken, DataAccessTokenClaims, BrokerPorts } from './data-access-token.js';
export { parseProtocolToken } from './protocol-token.js';
export type { ProtocolToken, ProtocolTokenClaims } from './protocol-token.js';
export { createIssuanceClient, credentialHeaders } from './issuance-client.js';
export type { IssuanceClient, IssuanceRequest, IssuanceError } from './issuance-client.js';
