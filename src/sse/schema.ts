/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { ConnectionState } from "../connection/index.js";
import type { DeviceStatus } from "../status/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * A fresh normalized status reading.
 */
export type StatusEvent = Readonly<{
  type: "status";
  status: DeviceStatus;
}>;

/**
 * Connection manager state change.
 */
export type ConnectionStateEvent = Readonly<{
  type: "connection_state";
  state: ConnectionState;
  previous: ConnectionState;
}>;

/**
 * Current state sent to a client right after it subscribes.
 */
export type SnapshotEvent = Readonly<{
  type: "snapshot";
  state: ConnectionState;
  status: DeviceStatus | null;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = StatusEvent | ConnectionStateEvent | SnapshotEvent;

/**
 * Registry of open SSE streams. One per HTTP server.
 */
export interface SseBroadcaster {
  createSseStream(): { stream: ReadableStream<Uint8Array>; clientId: number };
  removeClient(clientId: number): void;
  getClientCount(): number;
  broadcast(event: SseEvent): void;
  broadcastStatus(status: DeviceStatus): void;
  broadcastConnectionState(state: ConnectionState, previous: ConnectionState): void;
  sendToClient(clientId: number, event: SseEvent): boolean;
  disconnectAllClients(): void;
}
