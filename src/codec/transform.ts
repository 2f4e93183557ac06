/**
 * Codec Module - Pure Transformations
 *
 * Binary frame encode/decode and the structured control request body.
 * No side effects beyond the one-time layout read.
 *
 * Frame format:
 * ```
 * opcode:uint32-BE | deviceId:4 bytes | params/body
 * ```
 */
import { type Result, err, ok } from "neverthrow";
import {
  type CodecError,
  frameTooShort,
  invalidCodecArgument,
  malformedPayload,
} from "./errors.js";
import { getLayout } from "./layouts.js";
import {
  type CompiledLayout,
  type ControlRequest,
  ControlRequestSchema,
  type ControlResponse,
  ControlResponseSchema,
  CONTROL_PROTOCOL_VERSION,
  type DecodedFrame,
  DEVICE_ID_LENGTH,
  DeviceFeatureFieldsSchema,
  type FieldType,
  type FrameBody,
  FRAME_HEADER_LENGTH,
  MAX_OPCODE,
  OPCODES,
  RawStatusFieldsSchema,
  RESERVATION_ENTRY_LENGTH,
  RESERVATION_HEADER_LENGTH,
  type ReservationEntry,
} from "./schema.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// =============================================================================
// Device Id
// =============================================================================

/**
 * Encode a device id into exactly 4 bytes.
 * UTF-8, truncated when longer, zero-padded when shorter.
 *
 * @example
 * encodeDeviceId("ab") // Uint8Array [0x61, 0x62, 0x00, 0x00]
 */
export function encodeDeviceId(deviceId: string): Uint8Array {
  const out = new Uint8Array(DEVICE_ID_LENGTH);
  out.set(encoder.encode(deviceId).subarray(0, DEVICE_ID_LENGTH));
  return out;
}

/**
 * Text form of device id bytes, zero padding removed.
 */
export function deviceIdToString(bytes: Uint8Array): string {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  return decoder.decode(bytes.subarray(0, end));
}

// =============================================================================
// Encode
// =============================================================================

/**
 * Build a command frame.
 *
 * @param opcode - Command code (uint32)
 * @param deviceId - Device id, reduced to 4 bytes
 * @param params - Optional parameter bytes appended after the header
 */
export function encode(
  opcode: number,
  deviceId: string,
  params?: Uint8Array,
): Result<Uint8Array, CodecError> {
  if (!Number.isInteger(opcode) || opcode < 0 || opcode > MAX_OPCODE) {
    return err(invalidCodecArgument("opcode", `Opcode ${opcode} is not a uint32`));
  }

  const paramLength = params?.length ?? 0;
  const frame = new Uint8Array(FRAME_HEADER_LENGTH + paramLength);
  new DataView(frame.buffer).setUint32(0, opcode, false);
  frame.set(encodeDeviceId(deviceId), 4);
  if (params) {
    frame.set(params, FRAME_HEADER_LENGTH);
  }

  return ok(frame);
}

function writeField(view: DataView, offset: number, type: FieldType, value: number): void {
  switch (type) {
    case "u8":
      view.setUint8(offset, value);
      return;
    case "i8":
      view.setInt8(offset, value);
      return;
    case "u16":
      view.setUint16(offset, value, false);
      return;
    case "i16":
      view.setInt16(offset, value, false);
      return;
    case "u32":
      view.setUint32(offset, value, false);
      return;
    case "i32":
      view.setInt32(offset, value, false);
      return;
  }
}

/**
 * Serialize named values into a layout body. Missing names are written as 0.
 * Used to build response bodies for fake devices and fixtures.
 */
export function encodeLayoutBody(
  opcode: number,
  values: Readonly<Record<string, number>>,
): Result<Uint8Array, CodecError> {
  const layout = getLayout(opcode);
  if (!layout) {
    return err(invalidCodecArgument("opcode", `No field layout for opcode ${opcode}`));
  }

  const body = new Uint8Array(layout.length);
  const view = new DataView(body.buffer);
  for (const field of layout.fields) {
    writeField(view, field.offset, field.type, values[field.name] ?? 0);
  }

  return ok(body);
}

// =============================================================================
// Decode
// =============================================================================

function readField(view: DataView, offset: number, type: FieldType): number {
  switch (type) {
    case "u8":
      return view.getUint8(offset);
    case "i8":
      return view.getInt8(offset);
    case "u16":
      return view.getUint16(offset, false);
    case "i16":
      return view.getInt16(offset, false);
    case "u32":
      return view.getUint32(offset, false);
    case "i32":
      return view.getInt32(offset, false);
  }
}

/**
 * Read every layout field from a body that is at least `layout.length` long.
 */
export function readLayoutFields(
  layout: CompiledLayout,
  body: Uint8Array,
): Record<string, number> {
  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const values: Record<string, number> = {};
  for (const field of layout.fields) {
    values[field.name] = readField(view, field.offset, field.type);
  }
  return values;
}

function splitExtra(
  values: Readonly<Record<string, number>>,
  declared: ReadonlySet<string>,
): Record<string, number> {
  const extra: Record<string, number> = {};
  for (const [name, value] of Object.entries(values)) {
    if (!declared.has(name)) extra[name] = value;
  }
  return extra;
}

const STATUS_FIELD_NAMES: ReadonlySet<string> = new Set(
  RawStatusFieldsSchema.keyof().options,
);
const FEATURE_FIELD_NAMES: ReadonlySet<string> = new Set(
  DeviceFeatureFieldsSchema.keyof().options,
);

function decodeLayoutBody(
  layout: CompiledLayout,
  body: Uint8Array,
): Result<FrameBody, CodecError> {
  const values = readLayoutFields(layout, body);

  if (layout.opcode === OPCODES.GetStatus) {
    const parsed = RawStatusFieldsSchema.safeParse(values);
    if (!parsed.success) {
      return err(malformedPayload(layout.opcode, parsed.error.message, body.length));
    }
    return ok({
      kind: "status",
      fields: parsed.data,
      extra: splitExtra(values, STATUS_FIELD_NAMES),
    });
  }

  if (layout.opcode === OPCODES.GetDeviceInfo) {
    const parsed = DeviceFeatureFieldsSchema.safeParse(values);
    if (!parsed.success) {
      return err(malformedPayload(layout.opcode, parsed.error.message, body.length));
    }
    return ok({
      kind: "deviceInfo",
      fields: parsed.data,
      extra: splitExtra(values, FEATURE_FIELD_NAMES),
    });
  }

  // A layout registered for an opcode without a typed record
  return ok({ kind: "unknown", bodyLength: body.length });
}

function decodeReservations(
  body: Uint8Array,
  frameLength: number,
): Result<{ body: FrameBody; consumed: number }, CodecError> {
  if (body.length < RESERVATION_HEADER_LENGTH) {
    return err(
      frameTooShort(
        OPCODES.GetReservations,
        FRAME_HEADER_LENGTH + RESERVATION_HEADER_LENGTH,
        frameLength,
      ),
    );
  }

  const reservationUse = body[0] ?? 0;
  const count = body[1] ?? 0;
  const consumed = RESERVATION_HEADER_LENGTH + count * RESERVATION_ENTRY_LENGTH;
  if (body.length < consumed) {
    return err(
      frameTooShort(OPCODES.GetReservations, FRAME_HEADER_LENGTH + consumed, frameLength),
    );
  }

  const entries: ReservationEntry[] = [];
  for (let i = 0; i < count; i++) {
    const at = RESERVATION_HEADER_LENGTH + i * RESERVATION_ENTRY_LENGTH;
    const [enabled = 0, weekdays = 0, hour = 0, minute = 0, mode = 0, param = 0] =
      body.subarray(at, at + RESERVATION_ENTRY_LENGTH);
    entries.push({ enabled: enabled === 1, weekdays, hour, minute, mode, param });
  }

  return ok({ body: { kind: "reservations", schedule: { reservationUse, entries } }, consumed });
}

/**
 * Decode an inbound frame.
 *
 * Unknown opcodes decode to the header with the body length recorded.
 * Bytes past a known layout are counted, never rejected.
 *
 * @returns DecodedFrame, or PROTOCOL_DECODE when the payload is shorter than
 * the header or the opcode's minimum length
 */
export function decode(bytes: Uint8Array): Result<DecodedFrame, CodecError> {
  if (bytes.length < FRAME_HEADER_LENGTH) {
    return err(frameTooShort(null, FRAME_HEADER_LENGTH, bytes.length));
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const opcode = view.getUint32(0, false);
  const deviceIdBytes = bytes.slice(4, FRAME_HEADER_LENGTH);
  const body = bytes.subarray(FRAME_HEADER_LENGTH);
  const header = { opcode, deviceIdBytes, deviceId: deviceIdToString(deviceIdBytes) };

  if (opcode === OPCODES.GetReservations) {
    return decodeReservations(body, bytes.length).map(({ body: decoded, consumed }) => ({
      ...header,
      body: decoded,
      trailingBytes: body.length - consumed,
    }));
  }

  const layout = getLayout(opcode);
  if (!layout) {
    return ok({
      ...header,
      body: { kind: "unknown", bodyLength: body.length },
      trailingBytes: 0,
    });
  }

  if (body.length < layout.length) {
    return err(frameTooShort(opcode, FRAME_HEADER_LENGTH + layout.length, bytes.length));
  }

  return decodeLayoutBody(layout, body).map((decoded) => ({
    ...header,
    body: decoded,
    trailingBytes: body.length - layout.length,
  }));
}

/**
 * Minimum frame length (header included) for an opcode with a fixed layout.
 */
export function minimumFrameLength(opcode: number): number {
  if (opcode === OPCODES.GetReservations) {
    return FRAME_HEADER_LENGTH + RESERVATION_HEADER_LENGTH;
  }
  const layout = getLayout(opcode);
  return FRAME_HEADER_LENGTH + (layout?.length ?? 0);
}

// =============================================================================
// Control Requests
// =============================================================================

export type ControlRequestInput = Readonly<{
  clientId: string;
  sessionId: string;
  command: number;
  mode: string;
  param: readonly number[];
  paramStr?: string;
  deviceType: number;
  macAddress: string;
  additionalValue: string;
  requestTopic: string;
  responseTopic: string;
}>;

/**
 * Build the structured control request body.
 */
export function buildControlRequest(
  input: ControlRequestInput,
): Result<ControlRequest, CodecError> {
  const parsed = ControlRequestSchema.safeParse({
    clientID: input.clientId,
    protocolVersion: CONTROL_PROTOCOL_VERSION,
    request: {
      additionalValue: input.additionalValue,
      command: input.command,
      deviceType: input.deviceType,
      macAddress: input.macAddress,
      mode: input.mode,
      param: [...input.param],
      paramStr: input.paramStr ?? "",
    },
    requestTopic: input.requestTopic,
    responseTopic: input.responseTopic,
    sessionID: input.sessionId,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(
      invalidCodecArgument(issue?.path.join(".") || "request", issue?.message ?? "Invalid request"),
    );
  }

  return ok(parsed.data);
}

/**
 * Serialize a control request for publishing.
 */
export function encodeControlRequest(request: ControlRequest): Uint8Array {
  return encoder.encode(JSON.stringify(request));
}

/**
 * Parse a control acknowledgement payload.
 */
export function parseControlResponse(
  payload: Uint8Array,
): Result<ControlResponse, CodecError> {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(payload));
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    return err(malformedPayload(null, "Control response is not valid JSON", payload.length, cause));
  }

  const parsed = ControlResponseSchema.safeParse(json);
  if (!parsed.success) {
    return err(
      malformedPayload(null, `Unexpected control response: ${parsed.error.message}`, payload.length),
    );
  }

  return ok(parsed.data);
}
