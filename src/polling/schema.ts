/**
 * Polling Module - Types
 */
import type { Result } from "neverthrow";
import type { PollingError } from "./errors.js";

/**
 * Errors a send may report. Only the tag and message are logged.
 */
export type SendError = Readonly<{ type: string; message: string }>;

export type PollingSchedulerOptions = Readonly<{
  /** Issues one request. Never awaited by the schedule. */
  send: () => Promise<Result<void, SendError>>;
  /** Label used in logs. */
  name: string;
}>;

export type PollingScheduler = Readonly<{
  /** Fire now, then every intervalSeconds. Replaces a running timer. */
  start: (intervalSeconds: number) => Result<void, PollingError>;
  /** Synchronous: once it returns, send is not called again. */
  stop: () => void;
  /** Start again with the last interval. */
  restart: () => Result<void, PollingError>;
  isRunning: () => boolean;
  getTickCount: () => number;
  getIntervalSeconds: () => number | null;
}>;
