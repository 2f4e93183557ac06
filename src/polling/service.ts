/**
 * Polling Module - Service Layer
 *
 * Fixed-interval, fire-and-forget request scheduling. Ticks never wait for
 * the previous send to finish or for a response to arrive.
 */
import { err, ok } from "neverthrow";
import { createLogger } from "../logger.js";
import { invalidInterval, notStarted } from "./errors.js";
import type { PollingScheduler, PollingSchedulerOptions } from "./schema.js";

const log = createLogger("polling");

/**
 * Call send, turning a synchronous throw into a rejection.
 */
function invoke(send: PollingSchedulerOptions["send"]): ReturnType<PollingSchedulerOptions["send"]> {
  try {
    return send();
  } catch (error) {
    return Promise.reject(error);
  }
}

/**
 * Create a polling scheduler. Each instance owns at most one timer.
 *
 * @example
 * const poller = createPollingScheduler({ name: "status", send: () => manager.requestStatusUpdate() });
 * poller.start(300);
 */
export function createPollingScheduler(options: PollingSchedulerOptions): PollingScheduler {
  const { send, name } = options;

  let timer: ReturnType<typeof setInterval> | null = null;
  let intervalSeconds: number | null = null;
  let tickCount = 0;

  const tick = (): void => {
    tickCount++;
    const tickNumber = tickCount;
    log.debug({ scheduler: name, tick: tickNumber }, "Polling tick");

    invoke(send).then(
      (result) => {
        if (result.isErr()) {
          log.warn(
            { scheduler: name, tick: tickNumber, errorType: result.error.type, error: result.error.message },
            "Poll send failed",
          );
        }
      },
      (error: unknown) => {
        log.error(
          { scheduler: name, tick: tickNumber, error: error instanceof Error ? error.message : String(error) },
          "Poll send rejected",
        );
      },
    );
  };

  const stop = (): void => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
      log.info({ scheduler: name, ticks: tickCount }, "Polling stopped");
    }
  };

  const start: PollingScheduler["start"] = (seconds) => {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      return err(invalidInterval(seconds));
    }

    stop();
    intervalSeconds = seconds;
    timer = setInterval(tick, seconds * 1000);
    log.info({ scheduler: name, intervalSeconds: seconds }, "Polling started");
    tick();

    return ok(undefined);
  };

  const restart: PollingScheduler["restart"] = () => {
    if (intervalSeconds === null) {
      return err(notStarted(name));
    }
    return start(intervalSeconds);
  };

  return {
    start,
    stop,
    restart,
    isRunning: () => timer !== null,
    getTickCount: () => tickCount,
    getIntervalSeconds: () => intervalSeconds,
  };
}
