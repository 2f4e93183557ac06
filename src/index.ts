/**
 * hpwh-link - Application Entry Point
 *
 * Sets up the Hono server with:
 * - Health, connection and status endpoints
 * - Control routes (DHW mode, temperature)
 * - SSE for real-time updates
 * - Request ID tracing
 * - Global error handling
 * - One broker session with periodic status polling
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import {
  config,
  getDeviceIdentityFromEnv,
  getNormalizerOptions,
  getReconnectPolicy,
  getStaticCredentialsFromEnv,
} from "./config.js";
import {
  createConnectionManager,
  createStaticCredentialProvider,
  formatConnectionError,
} from "./connection/index.js";
import { createLogger } from "./logger.js";
import { createSseBroadcaster } from "./sse/index.js";

const log = createLogger("api");

// =============================================================================
// CONFIGURATION
// =============================================================================

const device = getDeviceIdentityFromEnv();
const credentials = getStaticCredentialsFromEnv();

if (!device || !credentials) {
  log.fatal(
    { deviceConfigured: device !== null, credentialsConfigured: credentials !== null },
    "DEVICE_MAC_ADDRESS, DEVICE_GROUP_ID, DEVICE_USER_ID, AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are required",
  );
  process.exit(1);
}

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    endpoint: config.MQTT_ENDPOINT,
    region: config.MQTT_REGION,
    protocolVersion: config.MQTT_PROTOCOL_VERSION,
    deviceType: device.deviceType,
    mac: device.macAddress,
    pollingIntervalSeconds: config.POLLING_INTERVAL_SECONDS,
    credentialsExpireAt: credentials.expiresAt?.toISOString() ?? null,
  },
  "Configuration loaded",
);

// =============================================================================
// CONNECTION MANAGER
// =============================================================================

const sse = createSseBroadcaster();

const managerResult = createConnectionManager({
  credentials: createStaticCredentialProvider(credentials, config.MQTT_ENDPOINT, config.MQTT_REGION),
  device,
  policy: getReconnectPolicy(),
  connectTimeoutMs: config.CONNECT_TIMEOUT_MS,
  commandTimeoutMs: config.COMMAND_TIMEOUT_MS,
  normalizer: getNormalizerOptions(),
  signingService: config.MQTT_SIGNING_SERVICE,
  protocolVersion: config.MQTT_PROTOCOL_VERSION,
  keepaliveSeconds: config.MQTT_KEEPALIVE_SECONDS,
  topicPrefix: config.DEVICE_TOPIC_PREFIX,
  clientIdPrefix: config.APP_NAME,
  statusQueueCapacity: config.STATUS_QUEUE_CAPACITY,
  setTemperatureOpcode: config.SET_TEMPERATURE_OPCODE,
  temperatureRange: { min: config.TEMPERATURE_MIN_F, max: config.TEMPERATURE_MAX_F },
  onStatus: (status) => sse.broadcastStatus(status),
  onStateChange: (state, previous) => sse.broadcastConnectionState(state, previous),
});

if (managerResult.isErr()) {
  log.fatal({ error: formatConnectionError(managerResult.error) }, "Invalid connection settings");
  process.exit(1);
}

const manager = managerResult.value;

const polling = manager.startPolling(config.POLLING_INTERVAL_SECONDS);
if (polling.isErr()) {
  log.error({ error: formatConnectionError(polling.error) }, "Polling not started");
}

manager
  .connect()
  .then((result) => {
    if (result.isErr()) {
      log.error({ error: formatConnectionError(result.error) }, "Initial connection failed; POST /api/reconnect to retry");
    }
  })
  .catch((error: unknown) => {
    log.error({ error: error instanceof Error ? error.message : String(error) }, "Connect crashed");
  });

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

app.use("*", requestIdMiddleware);
app.onError(errorHandler);
app.route("/", createRoutes(manager, sse));

const server = serve({ fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" }, (info) => {
  log.info({ port: info.port, appName: config.APP_NAME }, `🚀 ${config.APP_NAME} listening on port ${info.port}`);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Close SSE connections first so the server can drain
  sse.disconnectAllClients();

  await manager.close();

  server.close((error) => {
    if (error) {
      log.error({ error: error.message }, "HTTP server did not close cleanly");
      process.exit(1);
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error: unknown) => {
    log.error({ error: error instanceof Error ? error.message : String(error) }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
