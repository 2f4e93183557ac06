/**
 * Signer Module - Pure Transformations
 *
 * Signature V4 pre-signing of the broker's WebSocket URL.
 * No side effects, no I/O - the same inputs and timestamp give the same URL.
 */
import { createHash, createHmac } from "node:crypto";
import { type Result, err, ok } from "neverthrow";
import {
  credentialExpired,
  invalidSignerArgument,
  type SignerError,
} from "./errors.js";
import {
  CANONICAL_URI,
  type Credentials,
  DEFAULT_SIGNING_SERVICE,
  SIGNED_HEADERS,
  SIGNING_ALGORITHM,
  type SigningDate,
} from "./schema.js";

// =============================================================================
// Hashing Primitives
// =============================================================================

/**
 * Hex-encoded SHA-256 of a UTF-8 string.
 */
export function sha256Hex(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

function hmac(key: string | Buffer, message: string): Buffer {
  return createHmac("sha256", key).update(message, "utf8").digest();
}

/**
 * Derive the signing key for a date/region/service scope.
 *
 * kDate = HMAC("AWS4" + secret, date), then region, service, "aws4_request".
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string,
): Buffer {
  const kDate = hmac(`AWS4${secretAccessKey}`, dateStamp);
  const kRegion = hmac(kDate, region);
  const kService = hmac(kRegion, service);
  return hmac(kService, "aws4_request");
}

// =============================================================================
// Encoding Helpers
// =============================================================================

/**
 * Percent-encode per RFC 3986 (unreserved characters kept as-is).
 *
 * @example
 * encodeRfc3986("a/b*c") // "a%2Fb%2Ac"
 */
export function encodeRfc3986(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Format the timestamp into the date stamp and the basic ISO8601 datetime.
 *
 * @example
 * formatSigningDate(new Date("2024-03-05T07:08:09.123Z"))
 * // { dateStamp: "20240305", amzDate: "20240305T070809Z" }
 */
export function formatSigningDate(timestamp: Date): SigningDate {
  const amzDate = timestamp.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return { dateStamp: amzDate.slice(0, 8), amzDate };
}

/**
 * Reduce an endpoint to its lowercase host.
 * Accepts a bare host or a URL with any scheme and path.
 */
export function normalizeHost(endpoint: string): string {
  return endpoint
    .trim()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//i, "")
    .split("/")[0]
    .toLowerCase();
}

// =============================================================================
// Canonical Request
// =============================================================================

/**
 * Build the canonical query string: parameters sorted by name, RFC 3986 encoded.
 */
export function buildCanonicalQuery(params: Readonly<Record<string, string>>): string {
  return Object.keys(params)
    .sort()
    .map((name) => `${encodeRfc3986(name)}=${encodeRfc3986(params[name] ?? "")}`)
    .join("&");
}

/**
 * Build the canonical request for the GET upgrade on /mqtt.
 */
export function buildCanonicalRequest(host: string, canonicalQuery: string): string {
  return [
    "GET",
    CANONICAL_URI,
    canonicalQuery,
    `host:${host}\n`,
    SIGNED_HEADERS,
    sha256Hex(""),
  ].join("\n");
}

/**
 * Build the string to sign.
 *
 * Format:
 * ```
 * AWS4-HMAC-SHA256\n
 * {amzDate}\n
 * {scope}\n
 * {hex(sha256(canonicalRequest))}
 * ```
 */
export function buildStringToSign(
  amzDate: string,
  scope: string,
  canonicalRequest: string,
): string {
  return [SIGNING_ALGORITHM, amzDate, scope, sha256Hex(canonicalRequest)].join("\n");
}

// =============================================================================
// URL Signing
// =============================================================================

/**
 * Produce a pre-signed `wss://` URL for the broker.
 *
 * The session token is appended after signing and is not part of the
 * canonical query.
 *
 * @param endpoint - Broker host (with or without scheme/path)
 * @param region - Signing region, e.g. "us-east-1"
 * @param credentials - Access key pair and optional session token
 * @param timestamp - Signing time, defaults to now
 * @param service - Signing service name
 *
 * @example
 * const url = sign("broker.example.com", "us-east-1", creds);
 * // wss://broker.example.com/mqtt?X-Amz-Algorithm=...&X-Amz-Signature=...
 */
export function sign(
  endpoint: string,
  region: string,
  credentials: Credentials,
  timestamp: Date = new Date(),
  service: string = DEFAULT_SIGNING_SERVICE,
): Result<string, SignerError> {
  const host = normalizeHost(endpoint);
  if (host === "" || /\s/.test(host)) {
    return err(invalidSignerArgument("endpoint", "Endpoint has no usable host"));
  }
  if (region.trim() === "") {
    return err(invalidSignerArgument("region", "Region must not be empty"));
  }
  if (service.trim() === "") {
    return err(invalidSignerArgument("service", "Service must not be empty"));
  }
  if (credentials.accessKeyId.trim() === "" || credentials.secretAccessKey === "") {
    return err(invalidSignerArgument("credentials", "Access key pair must not be empty"));
  }
  if (Number.isNaN(timestamp.getTime())) {
    return err(invalidSignerArgument("timestamp", "Timestamp is not a valid date"));
  }
  if (credentials.expiresAt && credentials.expiresAt.getTime() <= timestamp.getTime()) {
    return err(credentialExpired(credentials.expiresAt, timestamp));
  }

  const { dateStamp, amzDate } = formatSigningDate(timestamp);
  const scope = `${dateStamp}/${region}/${service}/aws4_request`;

  const canonicalQuery = buildCanonicalQuery({
    "X-Amz-Algorithm": SIGNING_ALGORITHM,
    "X-Amz-Credential": `${credentials.accessKeyId}/${scope}`,
    "X-Amz-Date": amzDate,
    "X-Amz-SignedHeaders": SIGNED_HEADERS,
  });

  const stringToSign = buildStringToSign(
    amzDate,
    scope,
    buildCanonicalRequest(host, canonicalQuery),
  );
  const signingKey = deriveSigningKey(
    credentials.secretAccessKey,
    dateStamp,
    region,
    service,
  );
  const signature = createHmac("sha256", signingKey)
    .update(stringToSign, "utf8")
    .digest("hex");

  let url = `wss://${host}${CANONICAL_URI}?${canonicalQuery}&X-Amz-Signature=${signature}`;
  if (credentials.sessionToken) {
    url += `&X-Amz-Security-Token=${encodeRfc3986(credentials.sessionToken)}`;
  }

  return ok(url);
}
