/**
 * Codec Module - Public API
 *
 * Binary command frames, per-opcode field layouts and control request bodies.
 */

// Types
export type {
  CompiledLayout,
  ControlRequest,
  ControlResponse,
  DecodedFrame,
  DeviceFeatureFields,
  FieldSpec,
  FieldType,
  FrameBody,
  FrameLayout,
  OpcodeName,
  RawStatusFields,
  ReservationEntry,
  ReservationSchedule,
} from "./schema.js";
export type { CodecError } from "./errors.js";
export type { ControlRequestInput } from "./transform.js";
export type { LayoutRegistry } from "./layouts.js";

export {
  ControlRequestSchema,
  ControlResponseSchema,
  DEVICE_ID_LENGTH,
  DeviceFeatureFieldsSchema,
  FRAME_HEADER_LENGTH,
  OPCODES,
  RawStatusFieldsSchema,
} from "./schema.js";

// Errors
export { formatCodecError } from "./errors.js";

// Layouts
export { buildLayoutRegistry, compileLayout, getLayout, getLayoutRegistry } from "./layouts.js";

// Transformations
export {
  buildControlRequest,
  decode,
  deviceIdToString,
  encode,
  encodeControlRequest,
  encodeDeviceId,
  encodeLayoutBody,
  minimumFrameLength,
  parseControlResponse,
  readLayoutFields,
} from "./transform.js";
