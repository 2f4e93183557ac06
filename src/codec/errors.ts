/**
 * Codec Module - Error Types
 *
 * Typed error unions for frame encoding and decoding.
 * Errors are values, not exceptions.
 */

export type CodecError =
  | {
      readonly type: "PROTOCOL_DECODE";
      readonly message: string;
      readonly opcode: number | null;
      readonly expected: number;
      readonly actual: number;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_ARGUMENT";
      readonly message: string;
      readonly field: string;
    };

/**
 * Create a PROTOCOL_DECODE error for a payload that is too short.
 */
export function frameTooShort(
  opcode: number | null,
  expected: number,
  actual: number,
): CodecError {
  const label = opcode === null ? "frame header" : `opcode ${opcode}`;
  return {
    type: "PROTOCOL_DECODE",
    message: `Payload too short for ${label}: expected ${expected} bytes, got ${actual}`,
    opcode,
    expected,
    actual,
  };
}

/**
 * Create a PROTOCOL_DECODE error for a payload that is malformed.
 */
export function malformedPayload(
  opcode: number | null,
  message: string,
  actual: number,
  cause?: Error,
): CodecError {
  if (cause) {
    return { type: "PROTOCOL_DECODE", message, opcode, expected: 0, actual, cause };
  }
  return { type: "PROTOCOL_DECODE", message, opcode, expected: 0, actual };
}

/**
 * Create an INVALID_ARGUMENT error.
 */
export function invalidCodecArgument(field: string, message: string): CodecError {
  return { type: "INVALID_ARGUMENT", message, field };
}

/**
 * Format a CodecError for logging.
 */
export function formatCodecError(error: CodecError): string {
  switch (error.type) {
    case "PROTOCOL_DECODE":
      return `Protocol decode failed: ${error.message}`;
    case "INVALID_ARGUMENT":
      return `Invalid ${error.field}: ${error.message}`;
  }
}
