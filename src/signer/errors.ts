/**
 * Signer Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type SignerError =
  | {
      readonly type: "CREDENTIAL_EXPIRED";
      readonly message: string;
      readonly expiresAt: Date;
    }
  | {
      readonly type: "INVALID_ARGUMENT";
      readonly message: string;
      readonly field: string;
    };

/**
 * Create a CREDENTIAL_EXPIRED error.
 */
export function credentialExpired(expiresAt: Date, now: Date): SignerError {
  return {
    type: "CREDENTIAL_EXPIRED",
    message: `Credentials expired at ${expiresAt.toISOString()} (now ${now.toISOString()})`,
    expiresAt,
  };
}

/**
 * Create an INVALID_ARGUMENT error.
 */
export function invalidSignerArgument(field: string, message: string): SignerError {
  return { type: "INVALID_ARGUMENT", message, field };
}

/**
 * Format a SignerError for logging.
 */
export function formatSignerError(error: SignerError): string {
  switch (error.type) {
    case "CREDENTIAL_EXPIRED":
      return `Credentials expired: ${error.message}`;
    case "INVALID_ARGUMENT":
      return `Invalid ${error.field}: ${error.message}`;
  }
}
