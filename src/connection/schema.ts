/**
 * Connection Module - Schemas and Types
 *
 * Connection states, reconnect policy, device identity, collaborator
 * interfaces and the manager's public contract.
 */
import type { Result } from "neverthrow";
import { z } from "zod";
import type {
  DeviceFeatureFields,
  DecodedFrame,
  ReservationSchedule,
} from "../codec/index.js";
import type { Credentials } from "../signer/index.js";
import type {
  DeviceFeatures,
  DeviceStatus,
  NormalizerOptions,
} from "../status/index.js";
import type { ConnectionError } from "./errors.js";
import type { StatusChannel } from "./channel.js";
import type { TransportConnector } from "./transport.js";

// =============================================================================
// Connection State
// =============================================================================

export const ConnectionStateSchema = z.enum([
  "disconnected",
  "connecting",
  "connected",
  "reconnecting",
  "failed",
]);

export type ConnectionState = z.infer<typeof ConnectionStateSchema>;

/**
 * Inputs to the state machine. Each edge of the transition table is keyed
 * by the current state and one of these events.
 */
export type ConnectionEvent =
  | "connect"
  | "established"
  | "retryableFailure"
  | "fatalFailure"
  | "connectionLost"
  | "backoffElapsed"
  | "retriesExhausted"
  | "disconnect"
  | "reset";

// =============================================================================
// Reconnect Policy
// =============================================================================

export const ReconnectPolicySchema = z
  .object({
    maxRetries: z.number().int().nonnegative(),
    initialDelayMs: z.number().positive(),
    maxDelayMs: z.number().positive(),
    backoffMultiplier: z.number().gt(1),
    jitter: z.boolean(),
  })
  .refine((policy) => policy.maxDelayMs >= policy.initialDelayMs, {
    message: "maxDelayMs must be at least initialDelayMs",
    path: ["maxDelayMs"],
  });

export type ReconnectPolicy = Readonly<z.infer<typeof ReconnectPolicySchema>>;

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = Object.freeze({
  maxRetries: 20,
  initialDelayMs: 2000,
  maxDelayMs: 120000,
  backoffMultiplier: 2,
  jitter: true,
});

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Where to build topics from and which bytes identify the device in frames.
 */
export const DeviceIdentitySchema = z.object({
  deviceType: z.number().int().nonnegative(),
  macAddress: z.string().min(1),
  additionalValue: z.string(),
  groupId: z.string().min(1),
  userId: z.string().min(1),
});

export type DeviceIdentity = Readonly<z.infer<typeof DeviceIdentitySchema>>;

/**
 * Temporary broker credentials plus the broker they are valid for.
 */
export type BrokerCredentials = Credentials &
  Readonly<{
    endpoint: string;
    region: string;
  }>;

/**
 * Supplies fresh credentials; called before every connection attempt.
 */
export interface CredentialProvider {
  getCredentials(): Promise<BrokerCredentials>;
}

/**
 * Out-of-band reachability check (for example the account REST API).
 */
export interface ConnectivityChecker {
  isDeviceOnline(): Promise<boolean>;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Correlated request kinds; each is a response topic segment.
 */
export type RequestKind = "status" | "info" | "rsv" | "ctrl";

export type ResponseRoute =
  | Readonly<{ kind: "status" }>
  | Readonly<{ kind: "correlated"; requestKind: string; requestId: string }>;

export type SessionTopics = Readonly<{
  /** cmd/{type}/{prefix}-{mac} */
  commandBase: string;
  /** cmd/{type}/{group}/{user}/{session}/res */
  responseBase: string;
  statusRequest: string;
  statusResponse: string;
  /** Matches `{responseBase}/{kind}/{requestId}` only, never the status topic. */
  correlatedWildcard: string;
  control: string;
}>;

export type DeviceInfo = Readonly<{
  fields: DeviceFeatureFields;
  features: DeviceFeatures;
}>;

export type ControlAck = Readonly<{
  requestId: string;
  command: number;
  response: Readonly<Record<string, unknown>>;
}>;

// =============================================================================
// Statistics
// =============================================================================

export type ConnectionStatistics = Readonly<{
  messagesSent: number;
  messagesReceived: number;
  decodeFailures: number;
  staleFramesDropped: number;
  statusUpdatesDropped: number;
  reconnectionCount: number;
  /** Epoch ms of the current session's establishment. */
  connectedSince: number | null;
  lastMessageAt: number | null;
  uptimeMs: number;
  lastError: ConnectionError | null;
}>;

// =============================================================================
// Manager
// =============================================================================

export type ConnectionManagerOptions = Readonly<{
  credentials: CredentialProvider;
  device: DeviceIdentity;
  policy?: ReconnectPolicy;
  /** Opens a transport; defaults to mqtt.js over WebSocket. */
  connector?: TransportConnector;
  /** Jitter source in [0, 1). */
  random?: () => number;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
  normalizer?: Partial<NormalizerOptions>;
  signingService?: string;
  protocolVersion?: 4 | 5;
  keepaliveSeconds?: number;
  topicPrefix?: string;
  clientIdPrefix?: string;
  statusQueueCapacity?: number;
  /** Command code for temperature changes. */
  setTemperatureOpcode?: number;
  /** Settable displayed temperature range (°F). */
  temperatureRange?: Readonly<{ min: number; max: number }>;
  onStatus?: (status: DeviceStatus) => void | Promise<void>;
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
  connectivity?: ConnectivityChecker;
}>;

export interface ConnectionManager {
  connect(): Promise<Result<void, ConnectionError>>;
  disconnect(): Promise<void>;
  /** Failed → Disconnected. No effect in any other state. */
  reset(): void;
  /** Disconnect and end every status iterator. */
  close(): Promise<void>;

  requestStatusUpdate(): Promise<Result<void, ConnectionError>>;
  requestStatus(): Promise<Result<DeviceStatus, ConnectionError>>;
  getDeviceInfo(): Promise<Result<DeviceInfo, ConnectionError>>;
  getReservations(): Promise<Result<ReservationSchedule, ConnectionError>>;
  setDhwMode(mode: number): Promise<Result<ControlAck, ConnectionError>>;
  setTemperature(displayTemperature: number): Promise<Result<ControlAck, ConnectionError>>;
  checkConnectivity(): Promise<Result<void, ConnectionError>>;

  startPolling(intervalSeconds: number): Result<void, ConnectionError>;
  stopPolling(): void;
  isPolling(): boolean;

  getState(): ConnectionState;
  getStatistics(): ConnectionStatistics;
  getLastStatus(): DeviceStatus | null;
  getLastFrame(): DecodedFrame | null;
  getLastError(): ConnectionError | null;
  statusUpdates(): AsyncIterableIterator<DeviceStatus>;
  readonly channel: StatusChannel<DeviceStatus>;
}
