/**
 * Connection Module - Error Types
 *
 * Errors are values, not exceptions.
 * Retryable causes drive Reconnecting; everything else surfaces.
 */
import type { CodecError } from "../codec/index.js";
import type { SignerError } from "../signer/index.js";

export type ConnectionError =
  | {
      readonly type: "CREDENTIAL_EXPIRED";
      readonly message: string;
      readonly expiresAt: Date;
    }
  | {
      readonly type: "CREDENTIALS_UNAVAILABLE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "AUTHENTICATION_FAILED";
      readonly message: string;
      readonly reasonCode?: number;
    }
  | {
      readonly type: "CONNECTION_TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "TRANSPORT_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PROTOCOL_DECODE";
      readonly message: string;
      readonly opcode: number | null;
    }
  | {
      readonly type: "COMMAND_TIMEOUT";
      readonly message: string;
      readonly requestId: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "DEVICE_OFFLINE";
      readonly message: string;
    }
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    }
  | {
      readonly type: "CANCELLED";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_ARGUMENT";
      readonly message: string;
      readonly field: string;
    }
  | {
      readonly type: "RETRIES_EXHAUSTED";
      readonly message: string;
      readonly attempts: number;
      readonly lastError: ConnectionError | null;
    };

// =============================================================================
// Factories
// =============================================================================

export const credentialsUnavailable = (cause: unknown): ConnectionError => ({
  type: "CREDENTIALS_UNAVAILABLE",
  message: `Credential provider failed: ${cause instanceof Error ? cause.message : String(cause)}`,
  cause: cause instanceof Error ? cause : undefined,
});

export const authenticationFailed = (
  message: string,
  reasonCode?: number,
): ConnectionError => ({
  type: "AUTHENTICATION_FAILED",
  message,
  reasonCode,
});

export const connectionTimeout = (timeoutMs: number): ConnectionError => ({
  type: "CONNECTION_TIMEOUT",
  message: `Broker did not acknowledge within ${timeoutMs}ms`,
  timeoutMs,
});

export const transportError = (message: string, cause?: unknown): ConnectionError => ({
  type: "TRANSPORT_ERROR",
  message,
  cause: cause instanceof Error ? cause : undefined,
});

export const protocolDecode = (message: string, opcode: number | null): ConnectionError => ({
  type: "PROTOCOL_DECODE",
  message,
  opcode,
});

export const commandTimeout = (requestId: string, timeoutMs: number): ConnectionError => ({
  type: "COMMAND_TIMEOUT",
  message: `No response to ${requestId} within ${timeoutMs}ms`,
  requestId,
  timeoutMs,
});

export const deviceOffline = (): ConnectionError => ({
  type: "DEVICE_OFFLINE",
  message: "Device is not reachable",
});

export const notConnected = (state: string): ConnectionError => ({
  type: "NOT_CONNECTED",
  message: `Not connected (state: ${state})`,
});

export const cancelled = (reason: string): ConnectionError => ({
  type: "CANCELLED",
  message: reason,
});

export const invalidArgument = (field: string, message: string): ConnectionError => ({
  type: "INVALID_ARGUMENT",
  message,
  field,
});

export const retriesExhausted = (
  attempts: number,
  lastError: ConnectionError | null,
): ConnectionError => ({
  type: "RETRIES_EXHAUSTED",
  message: `Gave up after ${attempts} reconnect attempts`,
  attempts,
  lastError,
});

/**
 * Lift a signer error into the connection taxonomy.
 */
export function fromSignerError(error: SignerError): ConnectionError {
  switch (error.type) {
    case "CREDENTIAL_EXPIRED":
      return { type: "CREDENTIAL_EXPIRED", message: error.message, expiresAt: error.expiresAt };
    case "INVALID_ARGUMENT":
      return invalidArgument(error.field, error.message);
  }
}

/**
 * Lift a codec error into the connection taxonomy.
 */
export function fromCodecError(error: CodecError): ConnectionError {
  switch (error.type) {
    case "PROTOCOL_DECODE":
      return protocolDecode(error.message, error.opcode);
    case "INVALID_ARGUMENT":
      return invalidArgument(error.field, error.message);
  }
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Whether a failed connection attempt may be retried under the policy.
 */
export function isRetryable(error: ConnectionError): boolean {
  switch (error.type) {
    case "CONNECTION_TIMEOUT":
    case "TRANSPORT_ERROR":
    case "CREDENTIALS_UNAVAILABLE":
      return true;
    default:
      return false;
  }
}

/**
 * Format a ConnectionError for logging.
 */
export function formatConnectionError(error: ConnectionError): string {
  switch (error.type) {
    case "CREDENTIAL_EXPIRED":
      return `Credentials expired: ${error.message}`;
    case "CREDENTIALS_UNAVAILABLE":
      return `Credentials unavailable: ${error.message}`;
    case "AUTHENTICATION_FAILED":
      return error.reasonCode === undefined
        ? `Authentication failed: ${error.message}`
        : `Authentication failed (${error.reasonCode}): ${error.message}`;
    case "CONNECTION_TIMEOUT":
      return `Connection timeout: ${error.message}`;
    case "TRANSPORT_ERROR":
      return `Transport error: ${error.message}`;
    case "PROTOCOL_DECODE":
      return `Decode error: ${error.message}`;
    case "COMMAND_TIMEOUT":
      return `Command timeout: ${error.message}`;
    case "DEVICE_OFFLINE":
      return `Device offline: ${error.message}`;
    case "NOT_CONNECTED":
      return error.message;
    case "CANCELLED":
      return `Cancelled: ${error.message}`;
    case "INVALID_ARGUMENT":
      return `Invalid ${error.field}: ${error.message}`;
    case "RETRIES_EXHAUSTED":
      return error.lastError
        ? `${error.message}; last error: ${formatConnectionError(error.lastError)}`
        : error.message;
  }
}
