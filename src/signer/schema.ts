/**
 * Signer Module - Schemas and Types
 *
 * Broker credentials and the constants of the pre-signed WebSocket URL.
 */
import { z } from "zod";

// =============================================================================
// Credentials
// =============================================================================

/**
 * Temporary broker credentials issued by the account login flow.
 * The expiry is optional: long-lived keys never expire locally.
 */
export const CredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().min(1).optional(),
  expiresAt: z.date().optional(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

// =============================================================================
// Signing Constants
// =============================================================================

export const SIGNING_ALGORITHM = "AWS4-HMAC-SHA256";
export const DEFAULT_SIGNING_SERVICE = "iotdevicegateway";
export const CANONICAL_URI = "/mqtt";
export const SIGNED_HEADERS = "host";

/**
 * Scope parts derived from the signing timestamp.
 */
export type SigningDate = Readonly<{
  /** yyyymmdd */
  dateStamp: string;
  /** yyyymmddThhmmssZ */
  amzDate: string;
}>;
