/**
 * SSE Module - Public API
 */

// Types
export type {
  ConnectionStateEvent,
  SnapshotEvent,
  SseBroadcaster,
  SseEvent,
  StatusEvent,
} from "./schema.js";

// Service functions
export { createSseBroadcaster, formatSseEvent } from "./service.js";
