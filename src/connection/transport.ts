/**
 * Connection Module - Transport
 *
 * The narrow surface the connection manager needs from an MQTT client,
 * and the default connector over mqtt.js (WebSocket, signed URL).
 * One transport is one broker session: mqtt.js auto-reconnect is off and
 * the manager opens a fresh transport for every attempt.
 */
import mqtt from "mqtt";
import type { IClientPublishOptions, MqttClient } from "mqtt";
import { err, ok, type Result } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  authenticationFailed,
  type ConnectionError,
  transportError,
} from "./errors.js";

const log = createLogger("connection");

// =============================================================================
// Types
// =============================================================================

export type PublishOptions = Readonly<{
  /** MQTT 5 response topic property. Ignored on protocol 4. */
  responseTopic?: string;
  /** MQTT 5 correlation data property. Ignored on protocol 4. */
  correlationData?: string;
}>;

export type MessageHandler = (topic: string, payload: Uint8Array) => void;

export type CloseHandler = (error: ConnectionError | null) => void;

export interface Transport {
  subscribe(topics: readonly string[]): Promise<Result<void, ConnectionError>>;
  publish(
    topic: string,
    payload: Uint8Array,
    options?: PublishOptions,
  ): Promise<Result<void, ConnectionError>>;
  onMessage(handler: MessageHandler): void;
  /** Fires once when the session ends for any reason other than end(). */
  onClose(handler: CloseHandler): void;
  end(): Promise<void>;
}

export type ConnectRequest = Readonly<{
  url: string;
  clientId: string;
  protocolVersion: 4 | 5;
  keepaliveSeconds: number;
  connectTimeoutMs: number;
}>;

/**
 * Opens one session. Resolves once the broker acknowledged it.
 */
export type TransportConnector = (
  request: ConnectRequest,
) => Promise<Result<Transport, ConnectionError>>;

// =============================================================================
// Error Classification
// =============================================================================

/**
 * CONNACK reason codes that mean the credentials were refused.
 * 4/5 are MQTT 3.1.1, 134/135 are MQTT 5.
 */
export const AUTH_REASON_CODES: ReadonlySet<number> = new Set([4, 5, 134, 135]);

const HTTP_AUTH_REJECTION = /Unexpected server response: (401|403)/;

function reasonCodeOf(error: Error): number | undefined {
  if ("code" in error && typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

/**
 * Map an mqtt.js connect error to the connection taxonomy.
 */
export function classifyConnectError(error: Error): ConnectionError {
  const code = reasonCodeOf(error);
  if (code !== undefined && AUTH_REASON_CODES.has(code)) {
    return authenticationFailed(error.message, code);
  }
  if (HTTP_AUTH_REJECTION.test(error.message)) {
    return authenticationFailed(error.message);
  }
  return transportError(error.message, error);
}

// =============================================================================
// mqtt.js Adapter
// =============================================================================

function wrapClient(client: MqttClient, protocolVersion: 4 | 5): Transport {
  let ending = false;
  let lastError: ConnectionError | null = null;
  let closeHandler: CloseHandler | null = null;
  let closed = false;

  client.on("error", (error) => {
    lastError = transportError(error.message, error);
    log.warn({ error: error.message }, "Transport error");
  });

  client.on("close", () => {
    if (ending || closed) return;
    closed = true;
    closeHandler?.(lastError);
  });

  const publishOptions = (options: PublishOptions): IClientPublishOptions => {
    if (protocolVersion !== 5 || options.responseTopic === undefined) {
      return { qos: 1 };
    }
    return {
      qos: 1,
      properties: {
        responseTopic: options.responseTopic,
        ...(options.correlationData === undefined
          ? {}
          : { correlationData: Buffer.from(options.correlationData) }),
      },
    };
  };

  return {
    async subscribe(topics) {
      try {
        await client.subscribeAsync([...topics], { qos: 1 });
        return ok(undefined);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return err(transportError(`Subscribe failed: ${message}`, error));
      }
    },

    async publish(topic, payload, options = {}) {
      try {
        await client.publishAsync(topic, Buffer.from(payload), publishOptions(options));
        return ok(undefined);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return err(transportError(`Publish to ${topic} failed: ${message}`, error));
      }
    },

    onMessage(handler) {
      client.on("message", (topic, payload) => {
        handler(topic, new Uint8Array(payload.buffer, payload.byteOffset, payload.byteLength));
      });
    },

    onClose(handler) {
      closeHandler = handler;
    },

    async end() {
      ending = true;
      await client.endAsync(true);
    },
  };
}

/**
 * Default connector: mqtt.js over the signed WebSocket URL.
 */
export const connectMqtt: TransportConnector = (request) =>
  new Promise((resolve) => {
    const client = mqtt.connect(request.url, {
      clientId: request.clientId,
      protocolVersion: request.protocolVersion,
      keepalive: request.keepaliveSeconds,
      connectTimeout: request.connectTimeoutMs,
      reconnectPeriod: 0,
      clean: true,
    });

    const settle = (result: Result<Transport, ConnectionError>): void => {
      client.removeListener("connect", onConnect);
      client.removeListener("error", onError);
      client.removeListener("close", onClose);
      if (result.isErr()) {
        // The failed client can still emit stream errors while it tears down.
        client.on("error", (error) => {
          log.debug({ error: error.message }, "Error from abandoned connection");
        });
      }
      resolve(result);
    };

    const onConnect = (): void => {
      settle(ok(wrapClient(client, request.protocolVersion)));
    };

    const onError = (error: Error): void => {
      settle(err(classifyConnectError(error)));
      client.end(true);
    };

    const onClose = (): void => {
      settle(err(transportError("Connection closed before the broker acknowledged it")));
    };

    client.once("connect", onConnect);
    client.once("error", onError);
    client.once("close", onClose);
  });
