/**
 * hpwh-link - Public API
 *
 * Library entry point. The HTTP server in index.ts is one consumer of it.
 */

// URL signing
export type { Credentials, SignerError } from "./signer/index.js";
export { formatSignerError, sign } from "./signer/index.js";

// Binary codec
export type {
  CodecError,
  ControlRequest,
  ControlResponse,
  DecodedFrame,
  DeviceFeatureFields,
  FrameBody,
  RawStatusFields,
  ReservationEntry,
  ReservationSchedule,
} from "./codec/index.js";
export {
  buildControlRequest,
  decode,
  encode,
  encodeControlRequest,
  formatCodecError,
  OPCODES,
  parseControlResponse,
} from "./codec/index.js";

// Status normalization
export type {
  Activity,
  ComponentState,
  DeviceFeatures,
  DeviceStatus,
  DhwModeSetting,
  HeatingSource,
  NormalizerOptions,
  OperationMode,
  StatusAnomaly,
} from "./status/index.js";
export {
  calibrateFromRaw,
  calibrateToRaw,
  DEFAULT_NORMALIZER_OPTIONS,
  describeFeatures,
  DHW_MODES,
  normalize,
} from "./status/index.js";

// Connection management
export type {
  BrokerCredentials,
  ConnectionError,
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
  StatusChannel,
  Transport,
  TransportConnector,
} from "./connection/index.js";
export {
  createConnectionManager,
  createStaticCredentialProvider,
  DEFAULT_RECONNECT_POLICY,
  formatConnectionError,
  isRetryable,
} from "./connection/index.js";

// Polling
export type { PollingScheduler, PollingError } from "./polling/index.js";
export { createPollingScheduler, formatPollingError } from "./polling/index.js";
