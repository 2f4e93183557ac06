/**
 * Status Module - Schemas and Types
 *
 * The normalized, calibrated view of a decoded status frame.
 */
import { z } from "zod";
import type { RawStatusFields } from "../codec/index.js";

// =============================================================================
// Normalizer Options
// =============================================================================

export const NormalizerOptionsSchema = z.object({
  /** Added to raw water temperatures on read, subtracted on write (°F). */
  calibrationOffset: z.number().int(),
  /** Power draw above which the unit counts as actively heating (W). */
  activePowerThreshold: z.number().nonnegative(),
  /** Power draw above which the resistive element must be on (W). */
  elementPowerThreshold: z.number().nonnegative(),
});

export type NormalizerOptions = Readonly<z.infer<typeof NormalizerOptionsSchema>>;

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = Object.freeze({
  calibrationOffset: 20,
  activePowerThreshold: 400,
  elementPowerThreshold: 4000,
});

// =============================================================================
// Codes and Labels
// =============================================================================

/**
 * Component status scale: 0 off, 1 ready (powered, not running), 2 active.
 */
export const ComponentStateSchema = z.enum(["off", "ready", "active", "unknown"]);

export type ComponentState = z.infer<typeof ComponentStateSchema>;

export type OperationModeKind =
  | "standby"
  | "heat_pump"
  | "electric"
  | "hybrid"
  | "energy_saver"
  | "high_demand"
  | "vacation";

export const OPERATION_MODE_CODES: ReadonlyMap<number, OperationModeKind> = new Map<
  number,
  OperationModeKind
>([
  [0, "standby"],
  [32, "heat_pump"],
  [33, "electric"],
  [34, "hybrid"],
  [35, "energy_saver"],
  [36, "high_demand"],
  [37, "vacation"],
]);

export type OperationMode =
  | Readonly<{ kind: OperationModeKind; code: number }>
  | Readonly<{ kind: "unknown"; code: number }>;

/**
 * DHW mode codes accepted by the mode-set control command.
 */
export const DHW_MODES = {
  HEAT_PUMP: 2,
  HYBRID: 3,
  ELECTRIC: 4,
  ENERGY_SAVER: 5,
  HIGH_DEMAND: 6,
} as const;

export type DhwModeCode = (typeof DHW_MODES)[keyof typeof DHW_MODES];

export type DhwModeSetting =
  | "heat_pump"
  | "hybrid"
  | "electric"
  | "energy_saver"
  | "high_demand"
  | "unknown";

export const DHW_MODE_SETTINGS: ReadonlyMap<number, Exclude<DhwModeSetting, "unknown">> =
  new Map<number, Exclude<DhwModeSetting, "unknown">>([
    [DHW_MODES.HEAT_PUMP, "heat_pump"],
    [DHW_MODES.HYBRID, "hybrid"],
    [DHW_MODES.ELECTRIC, "electric"],
    [DHW_MODES.ENERGY_SAVER, "energy_saver"],
    [DHW_MODES.HIGH_DEMAND, "high_demand"],
  ]);

export type Activity = "active" | "standby" | "idle";

export type HeatingSource = "resistive_element" | "heat_pump" | "none";

// =============================================================================
// Device Status
// =============================================================================

/**
 * A raw value the normalizer clamped or could not interpret.
 */
export type StatusAnomaly = Readonly<{
  field: keyof RawStatusFields;
  raw: number;
  reason: string;
}>;

export type ComponentStates = Readonly<{
  compressor: ComponentState;
  evaporatorFan: ComponentState;
  expansionValve: ComponentState;
  upperElement: ComponentState;
  lowerElement: ComponentState;
  /** Combined: active if either element is active, ready if either is ready. */
  heatingElement: ComponentState;
}>;

export type DeviceStatus = Readonly<{
  // Calibrated water temperatures (°F)
  dhwTemperature: number;
  dhwTemperatureSetting: number;
  dhwTargetTemperature: number;
  dhwTemperature2: number;

  // Tenths-unit sensors (°F)
  /** Wire name tankUpperTemperature. */
  coldInletTemperature: number;
  /** Wire name tankLowerTemperature. */
  heatPumpAmbientTemperature: number;
  dischargeTemperature: number;
  suctionTemperature: number;
  evaporatorTemperature: number;
  currentInletTemperature: number;
  targetSuperHeat: number;
  currentSuperHeat: number;

  /** Converted from tenths of °C (°F, one decimal). */
  ambientTemperature: number;
  freezeProtectionTemperature: number;

  /** Flow, tenths of GPM on the wire. */
  dhwFlowRate: number;

  // Power and interpretation
  instantPower: number;
  activity: Activity;
  heatingSource: HeatingSource;
  operationMode: OperationMode;
  dhwMode: DhwModeSetting;
  components: ComponentStates;

  // Energy
  chargePercent: number;
  totalEnergyCapacity: number;
  availableEnergyCapacity: number;

  // Health
  errorCode: number;
  subErrorCode: number;
  hasError: boolean;
  deviceConnected: boolean;
  wifiRssi: number;

  // Feature flags
  dhwInUse: boolean;
  ecoEnabled: boolean;
  freezeProtectionEnabled: boolean;
  antiLegionellaEnabled: boolean;
  antiLegionellaPeriodDays: number;
  vacation: Readonly<{ daysSet: number; daysElapsed: number }>;

  anomalies: ReadonlyArray<StatusAnomaly>;
  raw: RawStatusFields;
}>;

// =============================================================================
// Device Features
// =============================================================================

export type DeviceFeatures = Readonly<{
  firmware: Readonly<{ controller: number; panel: number; wifi: number }>;
  /** Settable water temperature range, calibrated (°F). */
  temperatureRange: Readonly<{ min: number; max: number }>;
  supportedModes: ReadonlyArray<Exclude<DhwModeSetting, "unknown">>;
  freezeProtection: boolean;
  antiLegionella: boolean;
  energyUsage: boolean;
}>;
