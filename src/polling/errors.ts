/**
 * Polling Module - Error Types
 */

export type PollingError =
  | {
      readonly type: "INVALID_ARGUMENT";
      readonly message: string;
      readonly intervalSeconds: number;
    }
  | {
      readonly type: "NOT_STARTED";
      readonly message: string;
    };

export const invalidInterval = (intervalSeconds: number): PollingError => ({
  type: "INVALID_ARGUMENT",
  message: `Polling interval must be a positive number of seconds, got ${intervalSeconds}`,
  intervalSeconds,
});

export const notStarted = (name: string): PollingError => ({
  type: "NOT_STARTED",
  message: `Scheduler ${name} has never been started`,
});

export function formatPollingError(error: PollingError): string {
  switch (error.type) {
    case "INVALID_ARGUMENT":
      return `Invalid polling interval: ${error.message}`;
    case "NOT_STARTED":
      return `Polling not started: ${error.message}`;
  }
}
