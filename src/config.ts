/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * hpwh-link configuration covering:
 * - Server settings
 * - Broker endpoint and signing
 * - Reconnect policy and timeouts
 * - Status normalization (calibration, power thresholds)
 * - Device identity and static broker credentials
 */
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8083).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("hpwh-link").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Broker Configuration
  // ==========================================================================
  MQTT_ENDPOINT: z
    .string()
    .default("a1t30mldyslmuq-ats.iot.us-east-1.amazonaws.com")
    .describe("Broker host (WebSocket over TLS)"),
  MQTT_REGION: z.string().min(1).default("us-east-1").describe("Signing region"),
  MQTT_SIGNING_SERVICE: z
    .string()
    .min(1)
    .default("iotdevicegateway")
    .describe("Signing service name"),
  MQTT_PROTOCOL_VERSION: z.coerce
    .number()
    .pipe(z.union([z.literal(4), z.literal(5)]))
    .default(5)
    .describe("MQTT protocol version (4 = 3.1.1, 5 = 5.0)"),
  MQTT_KEEPALIVE_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(60)
    .describe("MQTT keepalive interval in seconds"),
  DEVICE_TOPIC_PREFIX: z
    .string()
    .min(1)
    .default("navilink")
    .describe("Prefix of the per-device topic segment"),

  // ==========================================================================
  // Timeouts
  // ==========================================================================
  CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(20000)
    .describe("Timeout for a single connection attempt (ms)"),
  COMMAND_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10000)
    .describe("Timeout waiting for a correlated response (ms)"),
  POLLING_INTERVAL_SECONDS: z.coerce
    .number()
    .positive()
    .default(300)
    .describe("Status polling interval in seconds"),
  STATUS_QUEUE_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(100)
    .describe("Capacity of the bounded status channel"),

  // ==========================================================================
  // Reconnect Policy
  // ==========================================================================
  RECONNECT_MAX_RETRIES: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(20)
    .describe("Reconnect attempts before giving up"),
  RECONNECT_INITIAL_DELAY_MS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("First backoff delay (ms)"),
  RECONNECT_MAX_DELAY_MS: z.coerce
    .number()
    .positive()
    .default(120000)
    .describe("Backoff ceiling (ms)"),
  RECONNECT_BACKOFF_MULTIPLIER: z.coerce
    .number()
    .gt(1)
    .default(2)
    .describe("Backoff growth factor"),

  // ==========================================================================
  // Status Normalization
  // ==========================================================================
  CALIBRATION_OFFSET_F: z.coerce
    .number()
    .int()
    .default(20)
    .describe("Offset added to raw water temperatures (°F)"),
  ACTIVE_POWER_THRESHOLD_W: z.coerce
    .number()
    .nonnegative()
    .default(400)
    .describe("Power above which the unit is actively heating (W)"),
  ELEMENT_POWER_THRESHOLD_W: z.coerce
    .number()
    .nonnegative()
    .default(4000)
    .describe("Power above which the resistive element is on (W)"),
  TEMPERATURE_MIN_F: z.coerce
    .number()
    .default(90)
    .describe("Lowest settable water temperature (°F, displayed)"),
  TEMPERATURE_MAX_F: z.coerce
    .number()
    .default(151)
    .describe("Highest settable water temperature (°F, displayed)"),
  SET_TEMPERATURE_OPCODE: z.coerce
    .number()
    .int()
    .nonnegative()
    .max(0xffffffff)
    .default(33554438)
    .describe("Command code used for temperature changes"),

  // ==========================================================================
  // Device Identity
  // ==========================================================================
  DEVICE_TYPE: z.coerce.number().int().nonnegative().default(52).describe("Device type code"),
  DEVICE_MAC_ADDRESS: optionalString.describe("Device MAC address (topic key)"),
  DEVICE_ADDITIONAL_VALUE: z.string().default("").describe("Device additional value"),
  DEVICE_GROUP_ID: optionalString.describe("Home/group id used in response topics"),
  DEVICE_USER_ID: optionalString.describe("Account user id used in response topics"),

  // ==========================================================================
  // Static Broker Credentials (server entry point)
  // ==========================================================================
  AWS_ACCESS_KEY_ID: optionalString.describe("Broker access key id"),
  AWS_SECRET_ACCESS_KEY: optionalString.describe("Broker secret key"),
  AWS_SESSION_TOKEN: optionalString.describe("Broker session token"),
  AWS_CREDENTIALS_EXPIRE_AT: optionalString
    .pipe(z.string().datetime({ offset: true }).optional())
    .describe("ISO timestamp at which the credentials expire"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Reconnect policy for the connection manager.
 */
export function getReconnectPolicy(): Readonly<{
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}> {
  return Object.freeze({
    maxRetries: config.RECONNECT_MAX_RETRIES,
    initialDelayMs: config.RECONNECT_INITIAL_DELAY_MS,
    maxDelayMs: config.RECONNECT_MAX_DELAY_MS,
    backoffMultiplier: config.RECONNECT_BACKOFF_MULTIPLIER,
    jitter: true,
  });
}

/**
 * Normalizer options (calibration and activity thresholds).
 */
export function getNormalizerOptions(): Readonly<{
  calibrationOffset: number;
  activePowerThreshold: number;
  elementPowerThreshold: number;
}> {
  return Object.freeze({
    calibrationOffset: config.CALIBRATION_OFFSET_F,
    activePowerThreshold: config.ACTIVE_POWER_THRESHOLD_W,
    elementPowerThreshold: config.ELEMENT_POWER_THRESHOLD_W,
  });
}

/**
 * Device identity from the environment.
 * Returns null if the device address, group or user is not configured.
 */
export function getDeviceIdentityFromEnv(): Readonly<{
  deviceType: number;
  macAddress: string;
  additionalValue: string;
  groupId: string;
  userId: string;
}> | null {
  if (!config.DEVICE_MAC_ADDRESS || !config.DEVICE_GROUP_ID || !config.DEVICE_USER_ID) {
    return null;
  }

  return Object.freeze({
    deviceType: config.DEVICE_TYPE,
    macAddress: config.DEVICE_MAC_ADDRESS,
    additionalValue: config.DEVICE_ADDITIONAL_VALUE,
    groupId: config.DEVICE_GROUP_ID,
    userId: config.DEVICE_USER_ID,
  });
}

/**
 * Static broker credentials from the environment.
 * Returns null if the key pair is not configured.
 */
export function getStaticCredentialsFromEnv(): Readonly<{
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string | undefined;
  expiresAt: Date | undefined;
}> | null {
  if (!config.AWS_ACCESS_KEY_ID || !config.AWS_SECRET_ACCESS_KEY) {
    return null;
  }

  return Object.freeze({
    accessKeyId: config.AWS_ACCESS_KEY_ID,
    secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
    sessionToken: config.AWS_SESSION_TOKEN,
    expiresAt: config.AWS_CREDENTIALS_EXPIRE_AT
      ? new Date(config.AWS_CREDENTIALS_EXPIRE_AT)
      : undefined,
  });
}
