/**
 * Transport Tests
 *
 * mqtt.js is replaced by an EventEmitter client; nothing leaves the process.
 */
import { EventEmitter } from "node:events";
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

class FakeMqttClient extends EventEmitter {
  subscribeAsync = vi.fn((_topics: string[], _opts: unknown) => Promise.resolve([]));
  publishAsync = vi.fn((_topic: string, _payload: Buffer, _opts: unknown) => Promise.resolve(undefined));
  endAsync = vi.fn((_force?: boolean) => {
    this.emit("close");
    return Promise.resolve();
  });
  end = vi.fn((_force?: boolean) => this);
}

const { mqttState } = vi.hoisted(() => {
  const mqttState: { client: FakeMqttClient | null; connectArgs: unknown[] } = {
    client: null,
    connectArgs: [],
  };
  return { mqttState };
});

vi.mock("mqtt", () => ({
  default: {
    connect: (...args: unknown[]) => {
      mqttState.connectArgs = args;
      return mqttState.client;
    },
  },
}));

import { classifyConnectError, connectMqtt } from "../transport.js";

const REQUEST = {
  url: "wss://broker.test/mqtt?X-Amz-Signature=abc",
  clientId: "client-1",
  protocolVersion: 5 as const,
  keepaliveSeconds: 60,
  connectTimeoutMs: 5000,
};

function errorWithCode(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}

describe("Transport", () => {
  let client: FakeMqttClient;

  beforeEach(() => {
    client = new FakeMqttClient();
    mqttState.client = client;
  });

  describe("classifyConnectError", () => {
    test("treats CONNACK auth reason codes as authentication failures", () => {
      for (const code of [4, 5, 134, 135]) {
        const error = classifyConnectError(errorWithCode("Connection refused", code));
        expect(error).toMatchObject({ type: "AUTHENTICATION_FAILED", reasonCode: code });
      }
    });

    test("treats an HTTP 403 upgrade rejection as an authentication failure", () => {
      const error = classifyConnectError(new Error("Unexpected server response: 403"));
      expect(error.type).toBe("AUTHENTICATION_FAILED");
    });

    test("treats anything else as a transport error", () => {
      expect(classifyConnectError(new Error("ECONNRESET")).type).toBe("TRANSPORT_ERROR");
      expect(classifyConnectError(errorWithCode("Server unavailable", 3)).type).toBe("TRANSPORT_ERROR");
    });
  });

  describe("connectMqtt", () => {
    test("disables mqtt.js reconnects and passes the session options", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const result = await opening;

      expect(result.isOk()).toBe(true);
      expect(mqttState.connectArgs).toEqual([
        REQUEST.url,
        {
          clientId: "client-1",
          protocolVersion: 5,
          keepalive: 60,
          connectTimeout: 5000,
          reconnectPeriod: 0,
          clean: true,
        },
      ]);
    });

    test("resolves an authentication failure when the broker refuses", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("error", errorWithCode("Not authorized", 135));
      const result = await opening;

      expect(result._unsafeUnwrapErr()).toMatchObject({ type: "AUTHENTICATION_FAILED", reasonCode: 135 });
      expect(client.end).toHaveBeenCalledWith(true);
    });

    test("resolves a transport error when closed before CONNACK", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("close");

      expect((await opening)._unsafeUnwrapErr().type).toBe("TRANSPORT_ERROR");
    });

    test("keeps a failed client's late stream errors from going unhandled", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("error", new Error("connect ECONNREFUSED"));
      await opening;

      expect(client.listenerCount("error")).toBe(1);
      expect(() => client.emit("error", new Error("write after end"))).not.toThrow();
    });

    test("publishes with MQTT 5 response properties", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();

      await transport.publish("cmd/52/dev/st", new Uint8Array([1, 2]), {
        responseTopic: "res/info/r1",
        correlationData: "r1",
      });

      const [topic, payload, opts] = client.publishAsync.mock.calls[0] ?? [];
      expect(topic).toBe("cmd/52/dev/st");
      expect(payload).toEqual(Buffer.from([1, 2]));
      expect(opts).toEqual({
        qos: 1,
        properties: { responseTopic: "res/info/r1", correlationData: Buffer.from("r1") },
      });
    });

    test("omits properties on MQTT 3.1.1", async () => {
      const opening = connectMqtt({ ...REQUEST, protocolVersion: 4 });
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();

      await transport.publish("t", new Uint8Array([1]), { responseTopic: "r" });

      expect(client.publishAsync.mock.calls[0]?.[2]).toEqual({ qos: 1 });
    });

    test("reports a failed publish as a transport error", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();
      client.publishAsync.mockRejectedValueOnce(new Error("client disconnecting"));

      const result = await transport.publish("t", new Uint8Array([1]));

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "TRANSPORT_ERROR",
        message: "Publish to t failed: client disconnecting",
      });
    });

    test("subscribes at QoS 1", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();

      await transport.subscribe(["a/st", "a/+/+"]);

      expect(client.subscribeAsync).toHaveBeenCalledWith(["a/st", "a/+/+"], { qos: 1 });
    });

    test("forwards messages as Uint8Array", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();
      const received: Array<[string, number[]]> = [];
      transport.onMessage((topic, payload) => received.push([topic, [...payload]]));

      client.emit("message", "a/st", Buffer.from([9, 8, 7]));

      expect(received).toEqual([["a/st", [9, 8, 7]]]);
    });

    test("reports an unexpected close once, with the last error", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();
      const onClose = vi.fn();
      transport.onClose(onClose);

      client.emit("error", new Error("socket hang up"));
      client.emit("close");
      client.emit("close");

      expect(onClose).toHaveBeenCalledTimes(1);
      expect(onClose.mock.calls[0]?.[0]).toMatchObject({ type: "TRANSPORT_ERROR", message: "socket hang up" });
    });

    test("does not report a close it asked for", async () => {
      const opening = connectMqtt(REQUEST);
      client.emit("connect");
      const transport = (await opening)._unsafeUnwrap();
      const onClose = vi.fn();
      transport.onClose(onClose);

      await transport.end();

      expect(client.endAsync).toHaveBeenCalledWith(true);
      expect(onClose).not.toHaveBeenCalled();
    });
  });
});
