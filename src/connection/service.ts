/**
 * Connection Module - Service Layer
 *
 * Owns the broker session for one device: the reconnect state machine,
 * inbound frame dispatch, correlated requests, control commands, polling
 * and statistics. Each call to createConnectionManager() is independent;
 * there is no module-level client.
 */
import { randomUUID } from "node:crypto";
import { err, ok, type Result } from "neverthrow";

import {
  buildControlRequest,
  type DecodedFrame,
  decode,
  encode,
  encodeControlRequest,
  OPCODES,
  parseControlResponse,
  type ReservationSchedule,
} from "../codec/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { createPollingScheduler } from "../polling/index.js";
import { DEFAULT_SIGNING_SERVICE, sign } from "../signer/index.js";
import {
  calibrateToRaw,
  DEFAULT_NORMALIZER_OPTIONS,
  describeFeatures,
  type DeviceStatus,
  DHW_MODES,
  normalize,
  type NormalizerOptions,
} from "../status/index.js";
import { createStatusChannel } from "./channel.js";
import {
  cancelled,
  commandTimeout,
  type ConnectionError,
  connectionTimeout,
  credentialsUnavailable,
  deviceOffline,
  formatConnectionError,
  fromCodecError,
  fromSignerError,
  invalidArgument,
  isRetryable,
  notConnected,
  protocolDecode,
  retriesExhausted,
  transportError,
} from "./errors.js";
import {
  type BrokerCredentials,
  type ConnectionEvent,
  type ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionState,
  type ConnectionStatistics,
  type ControlAck,
  DEFAULT_RECONNECT_POLICY,
  type DeviceInfo,
  DeviceIdentitySchema,
  type ReconnectPolicy,
  ReconnectPolicySchema,
  type RequestKind,
  type ResponseRoute,
  type SessionTopics,
} from "./schema.js";
import {
  buildSessionTopics,
  correlatedResponseTopic,
  DEFAULT_TOPIC_PREFIX,
  nextState,
  parseResponseTopic,
  reconnectDelay,
  requestTopicFor,
} from "./transform.js";
import { connectMqtt, type Transport } from "./transport.js";

const log = createLogger("connection");

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONNECT_TIMEOUT_MS = 20_000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
export const DEFAULT_KEEPALIVE_SECONDS = 60;
export const DEFAULT_STATUS_QUEUE_CAPACITY = 100;
export const DEFAULT_TEMPERATURE_RANGE = Object.freeze({ min: 90, max: 151 });

const DHW_MODE_CODES: ReadonlySet<number> = new Set(Object.values(DHW_MODES));

// =============================================================================
// Internal Types
// =============================================================================

type Session = Readonly<{
  generation: number;
  transport: Transport;
  topics: SessionTopics;
  clientId: string;
  sessionId: string;
}>;

type Reply = Readonly<{
  payload: Uint8Array;
  /** Null for JSON control acknowledgements. */
  frame: DecodedFrame | null;
}>;

type PendingRequest = Readonly<{
  kind: RequestKind;
  settle: (result: Result<Reply, ConnectionError>) => void;
}>;

type MutableStatistics = {
  messagesSent: number;
  messagesReceived: number;
  decodeFailures: number;
  staleFramesDropped: number;
  reconnectionCount: number;
  connectedSince: number | null;
  lastMessageAt: number | null;
};

// =============================================================================
// Helpers
// =============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolve true after `ms`, or false as soon as the signal aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

async function endQuietly(transport: Transport): Promise<void> {
  try {
    await transport.end();
  } catch (error) {
    log.warn({ error: errorMessage(error) }, "Transport did not close cleanly");
  }
}

/**
 * Which correlated request kind a decoded frame answers.
 */
function replyKind(frame: DecodedFrame): RequestKind | null {
  switch (frame.body.kind) {
    case "status":
      return "status";
    case "deviceInfo":
      return "info";
    case "reservations":
      return "rsv";
    case "unknown":
      return null;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a connection manager for one device.
 *
 * @returns The manager, or INVALID_ARGUMENT when the policy or identity is invalid
 *
 * @example
 * const manager = createConnectionManager({ credentials, device, onStatus: console.log })
 *   ._unsafeUnwrap();
 * await manager.connect();
 * manager.startPolling(300);
 */
export function createConnectionManager(
  options: ConnectionManagerOptions,
): Result<ConnectionManager, ConnectionError> {
  const policyResult = ReconnectPolicySchema.safeParse(options.policy ?? DEFAULT_RECONNECT_POLICY);
  if (!policyResult.success) {
    const issue = policyResult.error.issues[0];
    return err(
      invalidArgument(
        `policy.${issue?.path.join(".") ?? ""}`,
        issue?.message ?? "Invalid reconnect policy",
      ),
    );
  }
  const policy: ReconnectPolicy = Object.freeze(policyResult.data);

  const deviceResult = DeviceIdentitySchema.safeParse(options.device);
  if (!deviceResult.success) {
    const issue = deviceResult.error.issues[0];
    return err(
      invalidArgument(
        `device.${issue?.path.join(".") ?? ""}`,
        issue?.message ?? "Invalid device identity",
      ),
    );
  }
  const device = Object.freeze(deviceResult.data);

  const capacity = options.statusQueueCapacity ?? DEFAULT_STATUS_QUEUE_CAPACITY;
  if (!Number.isInteger(capacity) || capacity < 1) {
    return err(invalidArgument("statusQueueCapacity", "Must be a positive integer"));
  }

  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  if (!(connectTimeoutMs > 0) || !(commandTimeoutMs > 0)) {
    return err(invalidArgument("timeout", "Timeouts must be positive"));
  }

  const temperatureRange = options.temperatureRange ?? DEFAULT_TEMPERATURE_RANGE;
  if (!(temperatureRange.min <= temperatureRange.max)) {
    return err(invalidArgument("temperatureRange", "min must not exceed max"));
  }

  const connector = options.connector ?? connectMqtt;
  const random = options.random ?? Math.random;
  const normalizerOptions: NormalizerOptions = {
    ...DEFAULT_NORMALIZER_OPTIONS,
    ...options.normalizer,
  };
  const signingService = options.signingService ?? DEFAULT_SIGNING_SERVICE;
  const protocolVersion = options.protocolVersion ?? 5;
  const keepaliveSeconds = options.keepaliveSeconds ?? DEFAULT_KEEPALIVE_SECONDS;
  const topicPrefix = options.topicPrefix ?? DEFAULT_TOPIC_PREFIX;
  const clientIdPrefix = options.clientIdPrefix ?? "hpwh-link";
  const setTemperatureOpcode = options.setTemperatureOpcode ?? OPCODES.SetTemperature;

  // ===========================================================================
  // State (owned exclusively by this closure)
  // ===========================================================================

  let state: ConnectionState = "disconnected";
  let current: Session | null = null;
  let generation = 0;
  let attempt = 0;
  let inflight: Promise<Result<void, ConnectionError>> | null = null;
  let lifecycle = new AbortController();
  let lastError: ConnectionError | null = null;
  let lastStatus: DeviceStatus | null = null;
  let lastFrame: DecodedFrame | null = null;
  let pollingIntervalSeconds: number | null = null;

  const stats: MutableStatistics = {
    messagesSent: 0,
    messagesReceived: 0,
    decodeFailures: 0,
    staleFramesDropped: 0,
    reconnectionCount: 0,
    connectedSince: null,
    lastMessageAt: null,
  };

  const pending = new Map<string, PendingRequest>();
  const channel = createStatusChannel<DeviceStatus>(capacity);

  const poller = createPollingScheduler({
    name: `status:${device.macAddress}`,
    send: () => requestStatusUpdate(),
  });

  // ===========================================================================
  // State Machine
  // ===========================================================================

  const transition = (event: ConnectionEvent): boolean => {
    const next = nextState(state, event);
    if (next === null) {
      log.warn({ state, event }, "Rejected illegal state transition");
      return false;
    }

    const previous = state;
    state = next;
    if (next === previous) return true;

    log.info({ from: previous, to: next, event }, "Connection state changed");
    if (options.onStateChange) {
      try {
        options.onStateChange(next, previous);
      } catch (error) {
        log.error({ error: errorMessage(error) }, "State change listener threw");
      }
    }
    return true;
  };

  // ===========================================================================
  // Pending Requests
  // ===========================================================================

  const settleAll = (error: ConnectionError): void => {
    const waiters = [...pending.values()];
    pending.clear();
    for (const waiter of waiters) {
      waiter.settle(err(error));
    }
  };

  const failPending = (requestId: string, error: ConnectionError): void => {
    const waiter = pending.get(requestId);
    if (!waiter) return;
    pending.delete(requestId);
    waiter.settle(err(error));
  };

  const settleKind = (kind: RequestKind, reply: Reply): number => {
    let settled = 0;
    for (const [requestId, waiter] of pending) {
      if (waiter.kind === kind) {
        pending.delete(requestId);
        waiter.settle(ok(reply));
        settled++;
      }
    }
    return settled;
  };

  // ===========================================================================
  // Inbound
  // ===========================================================================

  const deliverStatus = (status: DeviceStatus): void => {
    channel.push(status);

    const onStatus = options.onStatus;
    if (!onStatus) return;

    const report = (error: unknown): void => {
      log.error({ error: errorMessage(error) }, "Status callback failed");
    };
    try {
      void Promise.resolve(onStatus(status)).catch(report);
    } catch (error) {
      report(error);
    }
  };

  const decodeFrame = (payload: Uint8Array, topic: string): DecodedFrame | null => {
    const decoded = decode(payload);
    if (decoded.isErr()) {
      stats.decodeFailures++;
      log.warn(
        { topic, bytes: payload.length, error: formatConnectionError(fromCodecError(decoded.error)) },
        "Dropped undecodable frame",
      );
      return null;
    }

    const frame = decoded.value;
    lastFrame = frame;
    if (frame.body.kind === "status") {
      const status = normalize(frame.body.fields, normalizerOptions);
      lastStatus = status;
      if (status.anomalies.length > 0) {
        log.debug({ anomalies: status.anomalies }, "Status normalized with anomalies");
      }
      deliverStatus(status);
    }
    if (frame.trailingBytes > 0) {
      log.debug({ opcode: frame.opcode, trailingBytes: frame.trailingBytes }, "Ignored trailing bytes");
    }
    return frame;
  };

  const handleCorrelated = (
    route: Extract<ResponseRoute, { kind: "correlated" }>,
    topic: string,
    payload: Uint8Array,
  ): void => {
    const waiter = pending.get(route.requestId);

    if (route.requestKind === "ctrl") {
      if (waiter) {
        pending.delete(route.requestId);
        waiter.settle(ok({ payload, frame: null }));
      }
      return;
    }

    const frame = decodeFrame(payload, topic);
    if (!waiter) return;
    pending.delete(route.requestId);
    if (frame) {
      waiter.settle(ok({ payload, frame }));
    } else {
      waiter.settle(err(protocolDecode("Reply could not be decoded", null)));
    }
  };

  const handleMessage = (session: Session, topic: string, payload: Uint8Array): void => {
    if (current !== session) {
      stats.staleFramesDropped++;
      log.debug({ topic, generation: session.generation }, "Dropped frame from a closed session");
      return;
    }

    stats.messagesReceived++;
    stats.lastMessageAt = Date.now();

    const route = parseResponseTopic(session.topics, topic);
    if (route === null) {
      log.debug({ topic }, "Ignored message on unexpected topic");
      return;
    }

    if (route.kind === "correlated") {
      handleCorrelated(route, topic, payload);
      return;
    }

    // Replies without a correlation topic (MQTT 3.1.1) land here
    const frame = decodeFrame(payload, topic);
    const kind = frame ? replyKind(frame) : null;
    if (frame && kind) {
      settleKind(kind, { payload, frame });
    }
  };

  // ===========================================================================
  // Session Lifecycle
  // ===========================================================================

  const fetchCredentials = async (): Promise<Result<BrokerCredentials, ConnectionError>> => {
    try {
      return ok(await options.credentials.getCredentials());
    } catch (error) {
      return err(credentialsUnavailable(error));
    }
  };

  const openTransport = async (
    url: string,
    clientId: string,
  ): Promise<Result<Transport, ConnectionError>> => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;

    const opening = connector({
      url,
      clientId,
      protocolVersion,
      keepaliveSeconds,
      connectTimeoutMs,
    })
      .catch((error: unknown): Result<Transport, ConnectionError> =>
        err(transportError(errorMessage(error), error)),
      )
      .then(async (result) => {
        if (timedOut && result.isOk()) {
          log.debug({ clientId }, "Closing transport that opened after the timeout");
          await endQuietly(result.value);
        }
        return result;
      });

    const timeout = new Promise<Result<Transport, ConnectionError>>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true;
        resolve(err(connectionTimeout(connectTimeoutMs)));
      }, connectTimeoutMs);
    });

    try {
      return await Promise.race([opening, timeout]);
    } finally {
      clearTimeout(timer);
    }
  };

  /**
   * One connection attempt: fresh credentials, fresh signature, fresh session.
   */
  const attemptConnection = async (signal: AbortSignal): Promise<Result<void, ConnectionError>> => {
    const startTime = Date.now();
    logOperationStart(log, "connect", { attempt });

    const credentials = await fetchCredentials();
    if (credentials.isErr()) return err(credentials.error);
    if (signal.aborted) return err(cancelled("Disconnected during connect"));

    const { endpoint, region } = credentials.value;
    const signed = sign(endpoint, region, credentials.value, new Date(), signingService);
    if (signed.isErr()) return err(fromSignerError(signed.error));

    const sessionId = randomUUID();
    const clientId = `${clientIdPrefix}-${randomUUID()}`;
    const opened = await openTransport(signed.value, clientId);
    if (opened.isErr()) return err(opened.error);

    const transport = opened.value;
    if (signal.aborted) {
      await endQuietly(transport);
      return err(cancelled("Disconnected during connect"));
    }

    generation++;
    const session: Session = {
      generation,
      transport,
      topics: buildSessionTopics(device, sessionId, topicPrefix),
      clientId,
      sessionId,
    };
    current = session;
    transport.onMessage((topic, payload) => handleMessage(session, topic, payload));
    transport.onClose((error) => handleConnectionLost(session, error));

    const subscribed = await transport.subscribe([
      session.topics.statusResponse,
      session.topics.correlatedWildcard,
    ]);
    const failure: ConnectionError | null = subscribed.isErr()
      ? subscribed.error
      : signal.aborted
        ? cancelled("Disconnected during connect")
        : current !== session
          ? transportError("Connection closed while subscribing")
          : null;
    if (failure !== null) {
      if (current === session) current = null;
      await endQuietly(transport);
      return err(failure);
    }

    attempt = 0;
    stats.connectedSince = Date.now();
    transition("established");
    logOperationComplete(log, "connect", startTime, { sessionId, generation });

    if (pollingIntervalSeconds !== null) {
      poller.start(pollingIntervalSeconds);
    }
    return ok(undefined);
  };

  /**
   * Drive connecting/reconnecting until connected, failed or cancelled.
   * Never rejects.
   */
  const runConnectLoop = async (signal: AbortSignal): Promise<Result<void, ConnectionError>> => {
    for (;;) {
      if (state === "reconnecting") {
        if (attempt >= policy.maxRetries) {
          const exhausted = retriesExhausted(attempt, lastError);
          lastError = exhausted;
          transition("retriesExhausted");
          log.error({ error: formatConnectionError(exhausted) }, "Reconnect budget exhausted");
          return err(exhausted);
        }

        const delayMs = reconnectDelay(attempt, policy, random);
        attempt++;
        log.info({ attempt, delayMs: Math.round(delayMs) }, "Waiting before reconnect");
        const elapsed = await sleep(delayMs, signal);
        if (!elapsed) return err(cancelled("Disconnected during backoff"));
        transition("backoffElapsed");
      }

      const result = await attemptConnection(signal);
      if (result.isOk()) return result;
      if (signal.aborted) return err(cancelled("Disconnected during connect"));

      const error = result.error;
      lastError = error;
      logOperationFailed(log, "connect", formatConnectionError(error), { attempt });

      if (!isRetryable(error)) {
        transition("fatalFailure");
        return err(error);
      }
      if (attempt >= policy.maxRetries) {
        const exhausted = retriesExhausted(attempt, error);
        lastError = exhausted;
        transition("retriesExhausted");
        return err(exhausted);
      }
      transition("retryableFailure");
    }
  };

  const startLoop = (): Promise<Result<void, ConnectionError>> => {
    const run: Promise<Result<void, ConnectionError>> = runConnectLoop(lifecycle.signal).finally(() => {
      if (inflight === run) inflight = null;
    });
    inflight = run;
    return run;
  };

  function handleConnectionLost(session: Session, error: ConnectionError | null): void {
    if (current !== session) return;

    current = null;
    endQuietly(session.transport).catch((endError: unknown) => {
      log.warn({ error: errorMessage(endError) }, "Lost transport did not release");
    });

    // Still subscribing: attemptConnection sees the session is gone and fails the attempt.
    if (state !== "connected") {
      log.debug({ generation: session.generation, state }, "Session closed before it was established");
      return;
    }

    lastError = error ?? transportError("Connection closed by broker");
    stats.connectedSince = null;
    stats.reconnectionCount++;
    poller.stop();
    settleAll(transportError("Connection lost before a reply arrived"));

    log.warn(
      { generation: session.generation, error: formatConnectionError(lastError) },
      "Connection lost",
    );

    if (transition("connectionLost")) {
      startLoop().catch((loopError: unknown) => {
        log.error({ error: errorMessage(loopError) }, "Reconnect loop failed");
      });
    }
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  const requireSession = (): Result<Session, ConnectionError> => {
    if (state !== "connected" || current === null) {
      return err(notConnected(state));
    }
    return ok(current);
  };

  const publish = async (
    session: Session,
    topic: string,
    payload: Uint8Array,
    responseTopic?: string,
    correlationData?: string,
  ): Promise<Result<void, ConnectionError>> => {
    const published = await session.transport.publish(topic, payload, { responseTopic, correlationData });
    if (published.isOk()) {
      stats.messagesSent++;
    }
    return published;
  };

  /**
   * Publish and wait for the reply on `…/res/{kind}/{requestId}`.
   * A timeout fails only this caller.
   */
  const request = async (
    kind: RequestKind,
    payloadFor: (session: Session, requestId: string, responseTopic: string) => Result<Uint8Array, ConnectionError>,
  ): Promise<Result<Reply, ConnectionError>> => {
    const sessionResult = requireSession();
    if (sessionResult.isErr()) return err(sessionResult.error);
    const session = sessionResult.value;

    const requestId = randomUUID();
    const responseTopic = correlatedResponseTopic(session.topics, kind, requestId);
    const payload = payloadFor(session, requestId, responseTopic);
    if (payload.isErr()) return err(payload.error);

    const reply = new Promise<Result<Reply, ConnectionError>>((resolve) => {
      const timer = setTimeout(() => {
        if (pending.delete(requestId)) {
          log.warn({ kind, requestId, timeoutMs: commandTimeoutMs }, "Request timed out");
          resolve(err(commandTimeout(requestId, commandTimeoutMs)));
        }
      }, commandTimeoutMs);

      pending.set(requestId, {
        kind,
        settle: (result) => {
          clearTimeout(timer);
          resolve(result);
        },
      });
    });

    // The reply timer bounds the wait; a publish still waiting on its ack must not hold the caller.
    publish(session, requestTopicFor(session.topics, kind), payload.value, responseTopic, requestId)
      .then((published) => {
        if (published.isErr()) failPending(requestId, published.error);
      })
      .catch((publishError: unknown) => {
        failPending(requestId, transportError(errorMessage(publishError)));
      });

    return reply;
  };

  const frameRequest = (opcode: number) =>
    (): Result<Uint8Array, ConnectionError> =>
      encode(opcode, device.macAddress).mapErr(fromCodecError);

  async function requestStatusUpdate(): Promise<Result<void, ConnectionError>> {
    const sessionResult = requireSession();
    if (sessionResult.isErr()) return err(sessionResult.error);
    const session = sessionResult.value;

    const frame = encode(OPCODES.GetStatus, device.macAddress);
    if (frame.isErr()) return err(fromCodecError(frame.error));

    return publish(session, session.topics.statusRequest, frame.value, session.topics.statusResponse);
  }

  const requestStatus = async (): Promise<Result<DeviceStatus, ConnectionError>> => {
    const reply = await request("status", frameRequest(OPCODES.GetStatus));
    if (reply.isErr()) return err(reply.error);

    const body = reply.value.frame?.body;
    if (body?.kind !== "status") {
      return err(protocolDecode("Reply is not a status frame", reply.value.frame?.opcode ?? null));
    }
    return ok(normalize(body.fields, normalizerOptions));
  };

  const getDeviceInfo = async (): Promise<Result<DeviceInfo, ConnectionError>> => {
    const reply = await request("info", frameRequest(OPCODES.GetDeviceInfo));
    if (reply.isErr()) return err(reply.error);

    const body = reply.value.frame?.body;
    if (body?.kind !== "deviceInfo") {
      return err(protocolDecode("Reply is not a device info frame", reply.value.frame?.opcode ?? null));
    }
    return ok({
      fields: body.fields,
      features: describeFeatures(body.fields, normalizerOptions.calibrationOffset),
    });
  };

  const getReservations = async (): Promise<Result<ReservationSchedule, ConnectionError>> => {
    const reply = await request("rsv", frameRequest(OPCODES.GetReservations));
    if (reply.isErr()) return err(reply.error);

    const body = reply.value.frame?.body;
    if (body?.kind !== "reservations") {
      return err(protocolDecode("Reply is not a reservation frame", reply.value.frame?.opcode ?? null));
    }
    return ok(body.schedule);
  };

  /**
   * Send a structured control command and wait for its acknowledgement.
   */
  const sendControl = async (
    command: number,
    mode: string,
    param: readonly number[],
  ): Promise<Result<ControlAck, ConnectionError>> => {
    const startTime = Date.now();
    logOperationStart(log, mode, { command, param });

    let requestId = "";
    const reply = await request("ctrl", (session, id, responseTopic) => {
      requestId = id;
      return buildControlRequest({
        clientId: session.clientId,
        sessionId: session.sessionId,
        command,
        mode,
        param,
        deviceType: device.deviceType,
        macAddress: device.macAddress,
        additionalValue: device.additionalValue,
        requestTopic: session.topics.control,
        responseTopic,
      })
        .map(encodeControlRequest)
        .mapErr(fromCodecError);
    });

    if (reply.isErr()) {
      logOperationFailed(log, mode, formatConnectionError(reply.error), { command });
      return err(reply.error);
    }

    const parsed = parseControlResponse(reply.value.payload);
    if (parsed.isErr()) {
      const error = fromCodecError(parsed.error);
      logOperationFailed(log, mode, formatConnectionError(error), { command });
      return err(error);
    }

    logOperationComplete(log, mode, startTime, { command, requestId });
    return ok({ requestId, command, response: parsed.value });
  };

  const setDhwMode = async (mode: number): Promise<Result<ControlAck, ConnectionError>> => {
    if (!DHW_MODE_CODES.has(mode)) {
      return err(invalidArgument("mode", `DHW mode must be one of ${[...DHW_MODE_CODES].join(", ")}, got ${mode}`));
    }
    return sendControl(OPCODES.SetDhwMode, "dhw-mode", [mode]);
  };

  const setTemperature = async (
    displayTemperature: number,
  ): Promise<Result<ControlAck, ConnectionError>> => {
    if (
      !Number.isFinite(displayTemperature) ||
      displayTemperature < temperatureRange.min ||
      displayTemperature > temperatureRange.max
    ) {
      return err(
        invalidArgument(
          "temperature",
          `Temperature must be within ${temperatureRange.min}-${temperatureRange.max}, got ${displayTemperature}`,
        ),
      );
    }
    const raw = calibrateToRaw(displayTemperature, normalizerOptions.calibrationOffset);
    return sendControl(setTemperatureOpcode, "dhw-temp-setting", [raw]);
  };

  const checkConnectivity = async (): Promise<Result<void, ConnectionError>> => {
    if (!options.connectivity) return ok(undefined);

    try {
      const online = await options.connectivity.isDeviceOnline();
      if (!online) {
        log.warn({ mac: device.macAddress }, "Device reported offline; polling continues");
        return err(deviceOffline());
      }
      return ok(undefined);
    } catch (error) {
      return err(transportError(`Connectivity check failed: ${errorMessage(error)}`, error));
    }
  };

  // ===========================================================================
  // Public Lifecycle
  // ===========================================================================

  const connect = async (): Promise<Result<void, ConnectionError>> => {
    if (inflight) return inflight;

    switch (state) {
      case "connected":
        return ok(undefined);
      case "failed":
        return err(lastError ?? notConnected(state));
      default:
        break;
    }

    if (!transition("connect")) {
      return err(notConnected(state));
    }
    return startLoop();
  };

  const disconnect = async (): Promise<void> => {
    lifecycle.abort();
    lifecycle = new AbortController();
    inflight = null;
    poller.stop();

    const session = current;
    current = null;
    stats.connectedSince = null;
    settleAll(cancelled("Disconnected"));

    // Failed stays Failed until reset()
    if (state !== "failed") {
      transition("disconnect");
    }

    if (session) {
      await endQuietly(session.transport);
      log.info({ generation: session.generation }, "Disconnected");
    }
  };

  const reset = (): void => {
    if (state !== "failed") return;
    attempt = 0;
    transition("reset");
  };

  const close = async (): Promise<void> => {
    pollingIntervalSeconds = null;
    await disconnect();
    channel.close();
  };

  const startPolling = (intervalSeconds: number): Result<void, ConnectionError> => {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      return err(invalidArgument("intervalSeconds", `Polling interval must be positive, got ${intervalSeconds}`));
    }
    pollingIntervalSeconds = intervalSeconds;
    if (state !== "connected") {
      log.info({ intervalSeconds }, "Polling will start once connected");
      return ok(undefined);
    }
    return poller
      .start(intervalSeconds)
      .mapErr((error) => invalidArgument("intervalSeconds", error.message));
  };

  const stopPolling = (): void => {
    pollingIntervalSeconds = null;
    poller.stop();
  };

  const getStatistics = (): ConnectionStatistics => {
    const now = Date.now();
    return Object.freeze({
      ...stats,
      statusUpdatesDropped: channel.getDroppedCount(),
      uptimeMs: stats.connectedSince === null ? 0 : now - stats.connectedSince,
      lastError,
    });
  };

  const manager: ConnectionManager = {
    connect,
    disconnect,
    reset,
    close,
    requestStatusUpdate,
    requestStatus,
    getDeviceInfo,
    getReservations,
    setDhwMode,
    setTemperature,
    checkConnectivity,
    startPolling,
    stopPolling,
    isPolling: () => poller.isRunning(),
    getState: () => state,
    getStatistics,
    getLastStatus: () => lastStatus,
    getLastFrame: () => lastFrame,
    getLastError: () => lastError,
    statusUpdates: () => channel[Symbol.asyncIterator](),
    channel,
  };

  return ok(manager);
}
