/**
 * Global error boundary - catches all unhandled errors.
 * Never let errors bubble up without logging and a clean response.
 */
import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { config } from "../config.js";
import type { ConnectionError } from "../connection/index.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler for Hono.
 * Logs errors with context and returns clean JSON response.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Don't expose internal errors in production
  const message = config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};

/**
 * HTTP status for a connection error returned by a route.
 */
export function httpStatusFor(error: ConnectionError): ContentfulStatusCode {
  switch (error.type) {
    case "INVALID_ARGUMENT":
      return 400;
    case "NOT_CONNECTED":
    case "DEVICE_OFFLINE":
    case "CANCELLED":
      return 503;
    case "COMMAND_TIMEOUT":
    case "CONNECTION_TIMEOUT":
      return 504;
    case "AUTHENTICATION_FAILED":
    case "CREDENTIAL_EXPIRED":
    case "CREDENTIALS_UNAVAILABLE":
    case "RETRIES_EXHAUSTED":
    case "TRANSPORT_ERROR":
    case "PROTOCOL_DECODE":
      return 502;
  }
}
