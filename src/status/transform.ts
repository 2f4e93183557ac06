/**
 * Status Module - Pure Transformations
 *
 * Raw status fields → calibrated, interpreted DeviceStatus.
 * No side effects, no I/O, never throws: out-of-range values are clamped
 * and recorded as anomalies so one bad field never discards a frame.
 */
import type { DeviceFeatureFields, RawStatusFields } from "../codec/index.js";
import {
  type Activity,
  type ComponentState,
  DEFAULT_NORMALIZER_OPTIONS,
  type DeviceFeatures,
  type DeviceStatus,
  DHW_MODE_SETTINGS,
  type DhwModeSetting,
  type HeatingSource,
  type NormalizerOptions,
  OPERATION_MODE_CODES,
  type OperationMode,
  type StatusAnomaly,
} from "./schema.js";

// =============================================================================
// Unit Conversion
// =============================================================================

/**
 * Raw water temperature → displayed °F.
 *
 * @example
 * calibrateFromRaw(101) // 121
 */
export function calibrateFromRaw(
  raw: number,
  offset: number = DEFAULT_NORMALIZER_OPTIONS.calibrationOffset,
): number {
  return raw + offset;
}

/**
 * Displayed °F → raw water temperature. Rounds to the nearest integer first,
 * so calibrateToRaw(calibrateFromRaw(t)) === t for every integer t.
 *
 * @example
 * calibrateToRaw(121) // 101
 */
export function calibrateToRaw(
  display: number,
  offset: number = DEFAULT_NORMALIZER_OPTIONS.calibrationOffset,
): number {
  return Math.round(display) - offset;
}

/**
 * Tenths-unit value → unit value.
 *
 * @example
 * fromTenths(605) // 60.5
 */
export function fromTenths(raw: number): number {
  return raw / 10;
}

/**
 * Tenths of °C → °F rounded to one decimal.
 *
 * @example
 * tenthsCelsiusToFahrenheit(214) // 70.5
 */
export function tenthsCelsiusToFahrenheit(raw: number): number {
  const fahrenheit = (raw / 10) * 9 / 5 + 32;
  return Math.round(fahrenheit * 10) / 10;
}

// =============================================================================
// Code Interpretation
// =============================================================================

/**
 * Map a component status code. 1 means ready, not running.
 */
export function componentState(code: number): ComponentState {
  switch (code) {
    case 0:
      return "off";
    case 1:
      return "ready";
    case 2:
      return "active";
    default:
      return "unknown";
  }
}

/**
 * Combine the two heating element codes.
 */
export function heatingElementState(upper: number, lower: number): ComponentState {
  const states = [componentState(upper), componentState(lower)];
  if (states.includes("active")) return "active";
  if (states.includes("ready")) return "ready";
  if (states.includes("unknown")) return "unknown";
  return "off";
}

/**
 * Map an operation mode code; unmapped codes become `unknown`.
 */
export function operationMode(code: number): OperationMode {
  const kind = OPERATION_MODE_CODES.get(code);
  return kind ? { kind, code } : { kind: "unknown", code };
}

/**
 * Map a DHW mode setting code.
 */
export function dhwModeSetting(code: number): DhwModeSetting {
  return DHW_MODE_SETTINGS.get(code) ?? "unknown";
}

/**
 * Activity from power draw. Component codes never decide this: a
 * compressor reporting "ready" (1) at 1 W is not heating.
 */
export function inferActivity(
  power: number,
  modeCode: number,
  activeThreshold: number = DEFAULT_NORMALIZER_OPTIONS.activePowerThreshold,
): Activity {
  if (power > activeThreshold) return "active";
  if (modeCode === 0) return "standby";
  return "idle";
}

/**
 * Which heat source the power draw implies.
 */
export function inferHeatingSource(
  power: number,
  options: Pick<NormalizerOptions, "activePowerThreshold" | "elementPowerThreshold"> =
    DEFAULT_NORMALIZER_OPTIONS,
): HeatingSource {
  if (power > options.elementPowerThreshold) return "resistive_element";
  if (power > options.activePowerThreshold) return "heat_pump";
  return "none";
}

// =============================================================================
// Helpers
// =============================================================================

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize a decoded status record.
 *
 * @param frame - Raw status fields under their wire names
 * @param options - Calibration and thresholds, merged over the defaults
 * @returns A deeply frozen DeviceStatus
 *
 * @example
 * normalize({ ...raw, dhwTemperature: 101, tankUpperTemperature: 605 })
 * // { dhwTemperature: 121, coldInletTemperature: 60.5, ... }
 */
export function normalize(
  frame: RawStatusFields,
  options: Partial<NormalizerOptions> = {},
): DeviceStatus {
  const opts: NormalizerOptions = { ...DEFAULT_NORMALIZER_OPTIONS, ...options };
  const anomalies: StatusAnomaly[] = [];

  const component = (field: keyof RawStatusFields): ComponentState => {
    const state = componentState(frame[field]);
    if (state === "unknown") {
      anomalies.push({ field, raw: frame[field], reason: "unrecognized component status code" });
    }
    return state;
  };

  let instantPower = frame.currentInstPower;
  if (instantPower < 0) {
    anomalies.push({ field: "currentInstPower", raw: instantPower, reason: "negative power clamped to 0" });
    instantPower = 0;
  }

  const chargePercent = clamp(frame.dhwChargePer, 0, 100);
  if (chargePercent !== frame.dhwChargePer) {
    anomalies.push({ field: "dhwChargePer", raw: frame.dhwChargePer, reason: "charge outside 0-100 clamped" });
  }

  const mode = operationMode(frame.operationMode);
  if (mode.kind === "unknown") {
    anomalies.push({ field: "operationMode", raw: frame.operationMode, reason: "unrecognized operation mode" });
  }

  const upperElement = component("heatUpperUse");
  const lowerElement = component("heatLowerUse");

  const status: DeviceStatus = {
    dhwTemperature: calibrateFromRaw(frame.dhwTemperature, opts.calibrationOffset),
    dhwTemperatureSetting: calibrateFromRaw(frame.dhwTemperatureSetting, opts.calibrationOffset),
    dhwTargetTemperature: calibrateFromRaw(frame.dhwTargetTemperatureSetting, opts.calibrationOffset),
    dhwTemperature2: calibrateFromRaw(frame.dhwTemperature2, opts.calibrationOffset),

    coldInletTemperature: fromTenths(frame.tankUpperTemperature),
    heatPumpAmbientTemperature: fromTenths(frame.tankLowerTemperature),
    dischargeTemperature: fromTenths(frame.dischargeTemperature),
    suctionTemperature: fromTenths(frame.suctionTemperature),
    evaporatorTemperature: fromTenths(frame.evaporatorTemperature),
    currentInletTemperature: fromTenths(frame.currentInletTemperature),
    targetSuperHeat: fromTenths(frame.targetSuperHeat),
    currentSuperHeat: fromTenths(frame.currentSuperHeat),

    ambientTemperature: tenthsCelsiusToFahrenheit(frame.ambientTemperature),
    freezeProtectionTemperature: frame.freezeProtectionTemperature,

    dhwFlowRate: fromTenths(frame.currentDhwFlowRate),

    instantPower,
    activity: inferActivity(instantPower, frame.operationMode, opts.activePowerThreshold),
    heatingSource: inferHeatingSource(instantPower, opts),
    operationMode: mode,
    dhwMode: dhwModeSetting(frame.dhwOperationSetting),
    components: {
      compressor: component("compUse"),
      evaporatorFan: component("evaFanUse"),
      expansionValve: component("eevUse"),
      upperElement,
      lowerElement,
      heatingElement: heatingElementState(frame.heatUpperUse, frame.heatLowerUse),
    },

    chargePercent,
    totalEnergyCapacity: frame.totalEnergyCapacity,
    availableEnergyCapacity: frame.availableEnergyCapacity,

    errorCode: frame.errorCode,
    subErrorCode: frame.subErrorCode,
    hasError: frame.errorCode !== 0,
    deviceConnected: frame.deviceConnected !== 0,
    wifiRssi: frame.wifiRssi,

    dhwInUse: frame.dhwUse !== 0,
    ecoEnabled: frame.ecoUse !== 0,
    freezeProtectionEnabled: frame.freezeProtectionUse !== 0,
    antiLegionellaEnabled: frame.antiLegionellaUse !== 0,
    antiLegionellaPeriodDays: frame.antiLegionellaPeriod,
    vacation: {
      daysSet: frame.vacationDaySetting,
      daysElapsed: frame.vacationDayElapsed,
    },

    anomalies,
    raw: { ...frame },
  };

  return deepFreeze(status);
}

/**
 * Summarize a device-info record.
 */
export function describeFeatures(
  fields: DeviceFeatureFields,
  calibrationOffset: number = DEFAULT_NORMALIZER_OPTIONS.calibrationOffset,
): DeviceFeatures {
  const supportedModes: Array<Exclude<DhwModeSetting, "unknown">> = [];
  if (fields.heatpumpUse !== 0) supportedModes.push("heat_pump");
  if (fields.hpwhUse !== 0 && fields.electricUse !== 0) supportedModes.push("hybrid");
  if (fields.electricUse !== 0) supportedModes.push("electric");
  if (fields.energySaverUse !== 0) supportedModes.push("energy_saver");
  if (fields.highDemandUse !== 0) supportedModes.push("high_demand");

  return deepFreeze({
    firmware: {
      controller: fields.controllerSwVersion,
      panel: fields.panelSwVersion,
      wifi: fields.wifiSwVersion,
    },
    temperatureRange: {
      min: calibrateFromRaw(fields.dhwTemperatureMin, calibrationOffset),
      max: calibrateFromRaw(fields.dhwTemperatureMax, calibrationOffset),
    },
    supportedModes,
    freezeProtection: fields.freezeProtectionUse !== 0,
    antiLegionella: fields.antiLegionellaSettingUse !== 0,
    energyUsage: fields.energyUsageUse !== 0,
  });
}
