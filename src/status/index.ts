/**
 * Status Module - Public API
 *
 * Calibration, unit conversion and interpretation of status frames.
 */

// Types
export type {
  Activity,
  ComponentState,
  ComponentStates,
  DeviceFeatures,
  DeviceStatus,
  DhwModeCode,
  DhwModeSetting,
  HeatingSource,
  NormalizerOptions,
  OperationMode,
  OperationModeKind,
  StatusAnomaly,
} from "./schema.js";

export {
  DEFAULT_NORMALIZER_OPTIONS,
  DHW_MODES,
  DHW_MODE_SETTINGS,
  NormalizerOptionsSchema,
  OPERATION_MODE_CODES,
} from "./schema.js";

// Transformations
export {
  calibrateFromRaw,
  calibrateToRaw,
  componentState,
  describeFeatures,
  dhwModeSetting,
  fromTenths,
  heatingElementState,
  inferActivity,
  inferHeatingSource,
  normalize,
  operationMode,
  tenthsCelsiusToFahrenheit,
} from "./transform.js";
