/**
 * Codec Module - Schemas and Types
 *
 * Frame header constants, opcode table, field layouts and the typed
 * records decoded from them. Schemas are the source of truth - types
 * derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Frame Header
// =============================================================================

export const OPCODE_LENGTH = 4;
export const DEVICE_ID_LENGTH = 4;
export const FRAME_HEADER_LENGTH = OPCODE_LENGTH + DEVICE_ID_LENGTH;
export const MAX_OPCODE = 0xffffffff;

/**
 * Known command codes.
 *
 * SetTemperature is extrapolated from SetDhwMode and has not been confirmed
 * against captured traffic; the connection manager takes it as an override.
 */
export const OPCODES = {
  GetDeviceInfo: 16777217,
  GetStatus: 16777219,
  GetReservations: 16777222,
  SetDhwMode: 33554437,
  SetTemperature: 33554438,
} as const;

export type OpcodeName = keyof typeof OPCODES;

// =============================================================================
// Field Layouts
// =============================================================================

export const FieldTypeSchema = z.enum(["u8", "i8", "u16", "i16", "u32", "i32"]);

export type FieldType = z.infer<typeof FieldTypeSchema>;

export const FIELD_SIZES: Readonly<Record<FieldType, number>> = {
  u8: 1,
  i8: 1,
  u16: 2,
  i16: 2,
  u32: 4,
  i32: 4,
};

export const FieldSpecSchema = z.object({
  name: z.string().min(1),
  type: FieldTypeSchema,
});

export type FieldSpec = z.infer<typeof FieldSpecSchema>;

export const FrameLayoutSchema = z.object({
  opcode: z.number().int().nonnegative().max(MAX_OPCODE),
  name: z.string().min(1),
  fields: z.array(FieldSpecSchema).min(1),
});

export type FrameLayout = z.infer<typeof FrameLayoutSchema>;

export const FrameLayoutFileSchema = z.object({
  layouts: z.array(FrameLayoutSchema),
});

/**
 * A layout with byte offsets resolved.
 */
export type CompiledLayout = Readonly<{
  opcode: number;
  name: string;
  fields: ReadonlyArray<Readonly<FieldSpec & { offset: number }>>;
  /** Body length in bytes (header excluded). */
  length: number;
}>;

// =============================================================================
// Status Fields (GetStatus)
// =============================================================================

const int = z.number().int();

/**
 * Every status field the normalizer knows about, under its wire name.
 */
export const RawStatusFieldsSchema = z.object({
  command: int,
  outsideTemperature: int,
  specialFunctionStatus: int,
  didReload: int,
  errorCode: int,
  subErrorCode: int,
  operationMode: int,
  operationBusy: int,
  freezeProtectionUse: int,
  dhwUse: int,
  dhwUseSustained: int,
  /** Outlet water temperature, raw (°F minus calibration offset). */
  dhwTemperature: int,
  dhwTemperatureSetting: int,
  programReservationUse: int,
  smartDiagnostic: int,
  faultStatus1: int,
  faultStatus2: int,
  wifiRssi: int,
  ecoUse: int,
  dhwTargetTemperatureSetting: int,
  /** Wire name kept. Measures cold inlet water, tenths of °F. */
  tankUpperTemperature: int,
  /** Wire name kept. Measures heat pump ambient air, tenths of °F. */
  tankLowerTemperature: int,
  dischargeTemperature: int,
  suctionTemperature: int,
  evaporatorTemperature: int,
  /** Tenths of °C. */
  ambientTemperature: int,
  targetSuperHeat: int,
  compUse: int,
  eevUse: int,
  evaFanUse: int,
  /** Instantaneous power draw, W. */
  currentInstPower: int,
  shutOffValveUse: int,
  conOvrSensorUse: int,
  wtrOvrSensorUse: int,
  /** Stored energy relative to capacity at setpoint, 0-100. */
  dhwChargePer: int,
  drEventStatus: int,
  vacationDaySetting: int,
  vacationDayElapsed: int,
  freezeProtectionTemperature: int,
  antiLegionellaUse: int,
  antiLegionellaPeriod: int,
  antiLegionellaOperationBusy: int,
  programReservationType: int,
  dhwOperationSetting: int,
  temperatureType: int,
  tempFormulaType: int,
  errorBuzzerUse: int,
  currentHeatUse: int,
  currentInletTemperature: int,
  currentStatenum: int,
  targetFanRpm: int,
  currentFanRpm: int,
  fanPwm: int,
  dhwTemperature2: int,
  currentDhwFlowRate: int,
  mixingRate: int,
  eevStep: int,
  currentSuperHeat: int,
  heatUpperUse: int,
  heatLowerUse: int,
  scaldUse: int,
  airFilterAlarmUse: int,
  airFilterAlarmPeriod: int,
  airFilterAlarmElapsed: int,
  cumulatedOpTimeEvaFan: int,
  cumulatedDhwFlowRate: int,
  touStatus: int,
  hpUpperOnTempSetting: int,
  hpUpperOffTempSetting: int,
  hpLowerOnTempSetting: int,
  hpLowerOffTempSetting: int,
  heUpperOnTempSetting: int,
  heUpperOffTempSetting: int,
  heLowerOnTempSetting: int,
  heLowerOffTempSetting: int,
  hpUpperOnDiffTempSetting: int,
  hpUpperOffDiffTempSetting: int,
  hpLowerOnDiffTempSetting: int,
  hpLowerOffDiffTempSetting: int,
  heUpperOnDiffTempSetting: int,
  heUpperOffDiffTempSetting: int,
  /** Vendor spelling kept. */
  heLowerOnTDiffempSetting: int,
  heLowerOffDiffTempSetting: int,
  drOverrideStatus: int,
  touOverrideStatus: int,
  totalEnergyCapacity: int,
  availableEnergyCapacity: int,
  deviceConnected: int,
});

export type RawStatusFields = Readonly<z.infer<typeof RawStatusFieldsSchema>>;

// =============================================================================
// Device Features (GetDeviceInfo)
// =============================================================================

export const DeviceFeatureFieldsSchema = z.object({
  countryCode: int,
  modelTypeCode: int,
  controlTypeCode: int,
  volumeCode: int,
  controllerSwVersion: int,
  panelSwVersion: int,
  wifiSwVersion: int,
  controllerSwCode: int,
  panelSwCode: int,
  wifiSwCode: int,
  powerUse: int,
  holidayUse: int,
  programReservationUse: int,
  dhwUse: int,
  dhwTemperatureSettingUse: int,
  dhwTemperatureMin: int,
  dhwTemperatureMax: int,
  smartDiagnosticUse: int,
  wifiRssiUse: int,
  temperatureType: int,
  tempFormulaType: int,
  energyUsageUse: int,
  freezeProtectionUse: int,
  freezeProtectionTempMin: int,
  freezeProtectionTempMax: int,
  mixingValueUse: int,
  drSettingUse: int,
  antiLegionellaSettingUse: int,
  hpwhUse: int,
  dhwRefillUse: int,
  ecoUse: int,
  electricUse: int,
  heatpumpUse: int,
  energySaverUse: int,
  highDemandUse: int,
});

export type DeviceFeatureFields = Readonly<z.infer<typeof DeviceFeatureFieldsSchema>>;

// =============================================================================
// Reservations (GetReservations)
// =============================================================================

/** use flag (u8) + entry count (u8) */
export const RESERVATION_HEADER_LENGTH = 2;
export const RESERVATION_ENTRY_LENGTH = 6;

/**
 * One weekly schedule entry.
 */
export type ReservationEntry = Readonly<{
  enabled: boolean;
  /** Bit 0 = Sunday ... bit 6 = Saturday. */
  weekdays: number;
  hour: number;
  minute: number;
  mode: number;
  /** Raw (uncalibrated) temperature parameter. */
  param: number;
}>;

export type ReservationSchedule = Readonly<{
  reservationUse: number;
  entries: ReadonlyArray<ReservationEntry>;
}>;

// =============================================================================
// Decoded Frames
// =============================================================================

export type FrameBody =
  | Readonly<{
      kind: "status";
      fields: RawStatusFields;
      /** Layout fields without a declared counterpart. */
      extra: Readonly<Record<string, number>>;
    }>
  | Readonly<{
      kind: "deviceInfo";
      fields: DeviceFeatureFields;
      extra: Readonly<Record<string, number>>;
    }>
  | Readonly<{
      kind: "reservations";
      schedule: ReservationSchedule;
    }>
  | Readonly<{
      kind: "unknown";
      bodyLength: number;
    }>;

export type DecodedFrame = Readonly<{
  opcode: number;
  deviceIdBytes: Uint8Array;
  /** Device id bytes as text, zero padding removed. */
  deviceId: string;
  body: FrameBody;
  /** Bytes past the end of the known layout. */
  trailingBytes: number;
}>;

// =============================================================================
// Control Requests (structured, non-binary)
// =============================================================================

export const CONTROL_PROTOCOL_VERSION = 2;

export const ControlRequestSchema = z.object({
  clientID: z.string().min(1),
  protocolVersion: z.literal(CONTROL_PROTOCOL_VERSION),
  request: z.object({
    additionalValue: z.string(),
    command: z.number().int().nonnegative().max(MAX_OPCODE),
    deviceType: z.number().int().nonnegative(),
    macAddress: z.string().min(1),
    mode: z.string().min(1),
    param: z.array(z.number().int()),
    paramStr: z.string(),
  }),
  requestTopic: z.string().min(1),
  responseTopic: z.string().min(1),
  sessionID: z.string().min(1),
});

export type ControlRequest = z.infer<typeof ControlRequestSchema>;

/**
 * Acknowledgement published on the control response topic.
 * Only the correlation fields are required; the rest passes through.
 */
export const ControlResponseSchema = z
  .object({
    sessionID: z.string().optional(),
    clientID: z.string().optional(),
    protocolVersion: z.number().optional(),
    response: z
      .object({
        command: z.number().int().optional(),
        result: z.unknown().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ControlResponse = z.infer<typeof ControlResponseSchema>;
