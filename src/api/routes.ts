/**
 * API routes for hpwh-link.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/connection - Connection state and statistics
 * - /api/status* - Cached and on-demand status
 * - /api/device, /api/reservations - Correlated device queries
 * - /api/dhw-mode, /api/temperature - Control commands
 * - /api/reconnect - Leave Failed and connect again
 * - /api/events - SSE stream for real-time updates
 */
import { Hono, type Context } from "hono";
import { z } from "zod";
import {
  type ConnectionError,
  type ConnectionManager,
  formatConnectionError,
} from "../connection/index.js";
import { createLogger } from "../logger.js";
import type { SseBroadcaster } from "../sse/index.js";
import { httpStatusFor } from "./errorHandler.js";

const log = createLogger("api");

const APP_VERSION = "0.1.0";

// =============================================================================
// Request Bodies
// =============================================================================

export const DhwModeBodySchema = z.object({
  mode: z.number().int(),
});

export const TemperatureBodySchema = z.object({
  temperature: z.number().finite(),
});

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse a JSON body against a schema. Returns the error message on failure.
 */
async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T>,
): Promise<{ ok: true; value: T } | { ok: false; message: string }> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch {
    return { ok: false, message: "Body must be valid JSON" };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      message: issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid body",
    };
  }
  return { ok: true, value: parsed.data };
}

function errorBody(error: ConnectionError, requestId: string) {
  return {
    success: false,
    error: error.type,
    message: formatConnectionError(error),
    requestId,
  };
}

// =============================================================================
// Routes
// =============================================================================

/**
 * Build the API for one connection manager and one SSE broadcaster.
 */
export function createRoutes(manager: ConnectionManager, sse: SseBroadcaster): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint. Used by container orchestration and monitoring.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
      connection: manager.getState(),
      polling: manager.isPolling(),
      sseClients: sse.getClientCount(),
    });
  });

  // ===========================================================================
  // Connection
  // ===========================================================================

  routes.get("/api/connection", (c) => {
    const requestId = c.get("requestId");
    const { lastError, ...statistics } = manager.getStatistics();

    return c.json({
      state: manager.getState(),
      polling: manager.isPolling(),
      statistics,
      lastError: lastError ? formatConnectionError(lastError) : null,
      requestId,
    });
  });

  /**
   * Reset a failed manager and connect. Connected managers are left alone.
   */
  routes.post("/api/reconnect", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId, state: manager.getState() }, "POST /api/reconnect");

    manager.reset();
    const result = await manager.connect();

    if (result.isErr()) {
      log.error({ requestId, error: formatConnectionError(result.error) }, "Reconnect failed");
      return c.json(errorBody(result.error, requestId), httpStatusFor(result.error));
    }

    return c.json({ success: true, state: manager.getState(), requestId });
  });

  // ===========================================================================
  // Status
  // ===========================================================================

  /**
   * Latest status. `?refresh=true` asks the device and waits for the reply.
   */
  routes.get("/api/status", async (c) => {
    const requestId = c.get("requestId");

    if (c.req.query("refresh") === "true") {
      const result = await manager.requestStatus();
      if (result.isErr()) {
        log.warn({ requestId, error: formatConnectionError(result.error) }, "Status refresh failed");
        return c.json(errorBody(result.error, requestId), httpStatusFor(result.error));
      }
      return c.json({ status: result.value, source: "device", requestId });
    }

    const status = manager.getLastStatus();
    if (!status) {
      return c.json({ status: null, message: "No status received yet", requestId }, 404);
    }
    return c.json({ status, source: "cache", requestId });
  });

  /**
   * Fields of the last decoded frame under their wire names.
   */
  routes.get("/api/status/raw", (c) => {
    const requestId = c.get("requestId");
    const frame = manager.getLastFrame();

    if (!frame) {
      return c.json({ frame: null, message: "No frame received yet", requestId }, 404);
    }

    return c.json({
      frame: {
        opcode: frame.opcode,
        deviceId: frame.deviceId,
        body: frame.body,
        trailingBytes: frame.trailingBytes,
      },
      requestId,
    });
  });

  routes.get("/api/device", async (c) => {
    const requestId = c.get("requestId");
    const result = await manager.getDeviceInfo();

    if (result.isErr()) {
      return c.json(errorBody(result.error, requestId), httpStatusFor(result.error));
    }
    return c.json({ ...result.value, requestId });
  });

  routes.get("/api/reservations", async (c) => {
    const requestId = c.get("requestId");
    const result = await manager.getReservations();

    if (result.isErr()) {
      return c.json(errorBody(result.error, requestId), httpStatusFor(result.error));
    }
    return c.json({ ...result.value, requestId });
  });

  // ===========================================================================
  // Control
  // ===========================================================================

  routes.post("/api/dhw-mode", async (c) => {
    const requestId = c.get("requestId");
    const body = await parseBody(c, DhwModeBodySchema);
    if (!body.ok) {
      return c.json({ success: false, error: "INVALID_ARGUMENT", message: body.message, requestId }, 400);
    }

    log.info({ requestId, mode: body.value.mode }, "POST /api/dhw-mode");
    const result = await manager.setDhwMode(body.value.mode);

    if (result.isErr()) {
      log.error({ requestId, error: formatConnectionError(result.error) }, "Failed to set DHW mode");
      return c.json(errorBody(result.error, requestId), httpStatusFor(result.error));
    }

    return c.json({ success: true, mode: body.value.mode, ack: result.value, requestId });
  });

  routes.post("/api/temperature", async (c) => {
    const requestId = c.get("requestId");
    const body = await parseBody(c, TemperatureBodySchema);
    if (!body.ok) {
      return c.json({ success: false, error: "INVALID_ARGUMENT", message: body.message, requestId }, 400);
    }

    log.info({ requestId, temperature: body.value.temperature }, "POST /api/temperature");
    const result = await manager.setTemperature(body.value.temperature);

    if (result.isErr()) {
      log.error({ requestId, error: formatConnectionError(result.error) }, "Failed to set temperature");
      return c.json(errorBody(result.error, requestId), httpStatusFor(result.error));
    }

    return c.json({
      success: true,
      temperature: body.value.temperature,
      ack: result.value,
      requestId,
    });
  });

  // ===========================================================================
  // Server-Sent Events Stream
  // ===========================================================================

  /**
   * SSE endpoint. New clients get a snapshot, then live status and
   * connection-state events.
   */
  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    const { stream, clientId } = sse.createSseStream();

    log.info({ requestId, clientId }, "SSE client connected");
    sse.sendToClient(clientId, {
      type: "snapshot",
      state: manager.getState(),
      status: manager.getLastStatus(),
    });

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}
