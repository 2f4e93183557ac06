/**
 * Connection Module - Public API
 *
 * Broker session lifecycle, reconnect policy, inbound dispatch and commands.
 */

// Types
export type {
  BrokerCredentials,
  ConnectionEvent,
  ConnectionManager,
  ConnectionManagerOptions,
  ConnectionState,
  ConnectionStatistics,
  ConnectivityChecker,
  ControlAck,
  CredentialProvider,
  DeviceIdentity,
  DeviceInfo,
  ReconnectPolicy,
  RequestKind,
  ResponseRoute,
  SessionTopics,
} from "./schema.js";
export type { ConnectionError } from "./errors.js";
export type { StatusChannel } from "./channel.js";
export type {
  CloseHandler,
  ConnectRequest,
  MessageHandler,
  PublishOptions,
  Transport,
  TransportConnector,
} from "./transport.js";

export {
  ConnectionStateSchema,
  DEFAULT_RECONNECT_POLICY,
  DeviceIdentitySchema,
  ReconnectPolicySchema,
} from "./schema.js";

// Errors
export { formatConnectionError, isRetryable } from "./errors.js";

// Transformations
export {
  applyJitter,
  buildSessionTopics,
  computeBackoffDelay,
  correlatedResponseTopic,
  DEFAULT_TOPIC_PREFIX,
  deviceTopicId,
  nextState,
  parseResponseTopic,
  reconnectDelay,
  requestTopicFor,
  TRANSITIONS,
} from "./transform.js";

// Channel, transport and credentials
export { createStatusChannel } from "./channel.js";
export { createStaticCredentialProvider } from "./credentials.js";
export { AUTH_REASON_CODES, classifyConnectError, connectMqtt } from "./transport.js";

// Service functions
export {
  createConnectionManager,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_SECONDS,
  DEFAULT_STATUS_QUEUE_CAPACITY,
  DEFAULT_TEMPERATURE_RANGE,
} from "./service.js";
