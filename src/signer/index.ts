/**
 * Signer Module - Public API
 *
 * Pre-signed WebSocket URLs for the broker.
 */

// Types
export type { Credentials, SigningDate } from "./schema.js";
export type { SignerError } from "./errors.js";

export {
  CredentialsSchema,
  DEFAULT_SIGNING_SERVICE,
  SIGNING_ALGORITHM,
} from "./schema.js";

// Errors
export { formatSignerError } from "./errors.js";

// Transformations
export {
  buildCanonicalQuery,
  buildCanonicalRequest,
  buildStringToSign,
  deriveSigningKey,
  encodeRfc3986,
  formatSigningDate,
  normalizeHost,
  sha256Hex,
  sign,
} from "./transform.js";
