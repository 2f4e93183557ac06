/**
 * Polling Scheduler Tests
 *
 * Timer behaviour under fake timers; send is a vi.fn.
 */
import { err, ok, type Result } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const { logSpy } = vi.hoisted(() => ({
  logSpy: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  },
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => logSpy,
}));

import type { SendError } from "../schema.js";
import { createPollingScheduler } from "../service.js";

function okSend() {
  return vi.fn(
    (): Promise<Result<void, SendError>> => Promise.resolve(ok(undefined)),
  );
}

describe("Polling Scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("fires immediately and then at the interval", async () => {
    const send = okSend();
    const poller = createPollingScheduler({ name: "test", send });

    poller.start(5);
    expect(send).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(4999);
    expect(send).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(send).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(10000);
    expect(send).toHaveBeenCalledTimes(4);
    expect(poller.getTickCount()).toBe(4);

    poller.stop();
  });

  test("does not wait for slow sends", async () => {
    const send = vi.fn(
      (): Promise<Result<void, SendError>> => new Promise(() => undefined),
    );
    const poller = createPollingScheduler({ name: "test", send });

    poller.start(1);
    await vi.advanceTimersByTimeAsync(3000);

    expect(send).toHaveBeenCalledTimes(4);
    poller.stop();
  });

  test("stop is synchronous and final", async () => {
    const send = okSend();
    const poller = createPollingScheduler({ name: "test", send });

    poller.start(1);
    poller.stop();
    await vi.advanceTimersByTimeAsync(10000);

    expect(send).toHaveBeenCalledTimes(1);
    expect(poller.isRunning()).toBe(false);
  });

  test("start while running replaces the timer", async () => {
    const send = okSend();
    const poller = createPollingScheduler({ name: "test", send });

    poller.start(2);
    poller.start(2);
    poller.start(2);
    expect(send).toHaveBeenCalledTimes(3);

    await vi.advanceTimersByTimeAsync(2000);

    // One timer only: a single extra tick, not three
    expect(send).toHaveBeenCalledTimes(4);
    expect(vi.getTimerCount()).toBe(1);
    poller.stop();
    expect(vi.getTimerCount()).toBe(0);
  });

  test("restart reuses the last interval", async () => {
    const send = okSend();
    const poller = createPollingScheduler({ name: "test", send });

    poller.start(3);
    poller.stop();
    expect(poller.restart().isOk()).toBe(true);
    expect(send).toHaveBeenCalledTimes(2);
    expect(poller.getIntervalSeconds()).toBe(3);

    await vi.advanceTimersByTimeAsync(3000);
    expect(send).toHaveBeenCalledTimes(3);
    poller.stop();
  });

  test("restart before any start reports NOT_STARTED", () => {
    const poller = createPollingScheduler({ name: "test", send: okSend() });

    expect(poller.restart()._unsafeUnwrapErr().type).toBe("NOT_STARTED");
  });

  test("rejects a non-positive interval", () => {
    const send = okSend();
    const poller = createPollingScheduler({ name: "test", send });

    expect(poller.start(0)._unsafeUnwrapErr().type).toBe("INVALID_ARGUMENT");
    expect(poller.start(Number.NaN).isErr()).toBe(true);
    expect(send).not.toHaveBeenCalled();
    expect(poller.isRunning()).toBe(false);
  });

  test("keeps polling after failed, rejected and throwing sends", async () => {
    let call = 0;
    const send = vi.fn((): Promise<Result<void, SendError>> => {
      call++;
      if (call === 1) return Promise.resolve(err({ type: "NOT_CONNECTED", message: "offline" }));
      if (call === 2) return Promise.reject(new Error("boom"));
      if (call === 3) throw new Error("sync boom");
      return Promise.resolve(ok(undefined));
    });
    const poller = createPollingScheduler({ name: "test", send });

    poller.start(1);
    await vi.advanceTimersByTimeAsync(3000);

    expect(send).toHaveBeenCalledTimes(4);
    expect(logSpy.warn).toHaveBeenCalledWith(
      expect.objectContaining({ errorType: "NOT_CONNECTED", error: "offline" }),
      "Poll send failed",
    );
    expect(logSpy.error).toHaveBeenCalledWith(
      expect.objectContaining({ error: "boom" }),
      "Poll send rejected",
    );
    expect(logSpy.error).toHaveBeenCalledWith(
      expect.objectContaining({ error: "sync boom" }),
      "Poll send rejected",
    );
    poller.stop();
  });
});
