/**
 * Connection Module - Pure Transformations
 *
 * The state transition table, backoff arithmetic and topic naming.
 * No side effects: the service owns timers, transports and state.
 */
import type {
  ConnectionEvent,
  ConnectionState,
  DeviceIdentity,
  ReconnectPolicy,
  RequestKind,
  ResponseRoute,
  SessionTopics,
} from "./schema.js";

// =============================================================================
// State Machine
// =============================================================================

/**
 * Every legal edge. Anything not listed here is rejected.
 * There is no connected → connecting edge; failed only leaves through reset.
 */
export const TRANSITIONS: Readonly<
  Record<ConnectionState, Readonly<Partial<Record<ConnectionEvent, ConnectionState>>>>
> = {
  disconnected: {
    connect: "connecting",
    disconnect: "disconnected",
  },
  connecting: {
    established: "connected",
    retryableFailure: "reconnecting",
    fatalFailure: "failed",
    retriesExhausted: "failed",
    disconnect: "disconnected",
  },
  connected: {
    connectionLost: "reconnecting",
    disconnect: "disconnected",
  },
  reconnecting: {
    backoffElapsed: "connecting",
    retriesExhausted: "failed",
    disconnect: "disconnected",
  },
  failed: {
    reset: "disconnected",
  },
};

/**
 * Next state for an event, or null when the edge does not exist.
 *
 * @example
 * nextState("connected", "connectionLost") // "reconnecting"
 * nextState("failed", "connect")           // null
 */
export function nextState(
  state: ConnectionState,
  event: ConnectionEvent,
): ConnectionState | null {
  return TRANSITIONS[state][event] ?? null;
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * Pre-jitter delay for a zero-based attempt number.
 * Always within [initialDelayMs, maxDelayMs].
 *
 * @example
 * computeBackoffDelay(3, { initialDelayMs: 2000, backoffMultiplier: 2, maxDelayMs: 120000 })
 * // 16000
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<ReconnectPolicy, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier">,
): number {
  const exponent = Math.max(0, attempt);
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, exponent);
  // Infinity from a huge exponent still clamps
  return Math.min(policy.maxDelayMs, delay);
}

/**
 * Full jitter: uniform in [0, delay].
 */
export function applyJitter(delay: number, random: () => number): number {
  const sample = Math.min(1, Math.max(0, random()));
  return sample * delay;
}

/**
 * Delay to wait before the given attempt, jitter applied when enabled.
 */
export function reconnectDelay(
  attempt: number,
  policy: ReconnectPolicy,
  random: () => number = Math.random,
): number {
  const delay = computeBackoffDelay(attempt, policy);
  return policy.jitter ? applyJitter(delay, random) : delay;
}

// =============================================================================
// Topics
// =============================================================================

export const DEFAULT_TOPIC_PREFIX = "navilink";

/**
 * Device segment of command topics.
 *
 * @example
 * deviceTopicId("04786332fca0") // "navilink-04786332fca0"
 */
export function deviceTopicId(
  macAddress: string,
  prefix: string = DEFAULT_TOPIC_PREFIX,
): string {
  return `${prefix}-${macAddress}`;
}

/**
 * All topics for one session. The session id is part of every response
 * topic, so replies addressed to an earlier session never match.
 */
export function buildSessionTopics(
  device: DeviceIdentity,
  sessionId: string,
  prefix: string = DEFAULT_TOPIC_PREFIX,
): SessionTopics {
  const commandBase = `cmd/${device.deviceType}/${deviceTopicId(device.macAddress, prefix)}`;
  const responseBase = `cmd/${device.deviceType}/${device.groupId}/${device.userId}/${sessionId}/res`;

  return {
    commandBase,
    responseBase,
    statusRequest: `${commandBase}/st`,
    statusResponse: `${responseBase}/st`,
    correlatedWildcard: `${responseBase}/+/+`,
    control: `${commandBase}/ctrl`,
  };
}

/**
 * Request topic for a correlated request kind.
 */
export function requestTopicFor(
  topics: SessionTopics,
  kind: RequestKind,
): string {
  switch (kind) {
    case "status":
      return topics.statusRequest;
    case "info":
      return `${topics.commandBase}/status/start`;
    case "rsv":
      return `${topics.commandBase}/rsv/rd`;
    case "ctrl":
      return topics.control;
  }
}

/**
 * Response topic a correlated request asks the device to reply on.
 */
export function correlatedResponseTopic(
  topics: SessionTopics,
  kind: RequestKind,
  requestId: string,
): string {
  return `${topics.responseBase}/${kind}/${requestId}`;
}

/**
 * Classify an inbound topic against the session's response base.
 * Returns null for topics that belong to another session or layout.
 */
export function parseResponseTopic(
  topics: SessionTopics,
  topic: string,
): ResponseRoute | null {
  const prefix = `${topics.responseBase}/`;
  if (!topic.startsWith(prefix)) return null;

  const segments = topic.slice(prefix.length).split("/");
  if (segments.length === 1 && segments[0] === "st") {
    return { kind: "status" };
  }
  if (segments.length === 2) {
    const [requestKind, requestId] = segments;
    if (requestKind && requestId) {
      return { kind: "correlated", requestKind, requestId };
    }
  }
  return null;
}
