/**
 * Frame fixtures shared by codec, status and connection tests.
 */
import { OPCODES, type RawStatusFields } from "../schema.js";
import { decode, encode, encodeLayoutBody } from "../transform.js";

/**
 * A plausible status reading: heat pump mode, 450 W draw, 121 °F displayed.
 */
export const SAMPLE_STATUS_VALUES: Readonly<Record<string, number>> = {
  command: OPCODES.GetStatus,
  operationMode: 32,
  dhwOperationSetting: 3,
  dhwUse: 1,
  dhwTemperature: 101,
  dhwTemperatureSetting: 100,
  dhwTargetTemperatureSetting: 100,
  dhwTemperature2: 99,
  tankUpperTemperature: 605,
  tankLowerTemperature: 712,
  dischargeTemperature: 1501,
  suctionTemperature: 448,
  evaporatorTemperature: 402,
  ambientTemperature: 214,
  targetSuperHeat: 50,
  currentSuperHeat: 47,
  currentInletTemperature: 603,
  currentDhwFlowRate: 15,
  currentInstPower: 450,
  dhwChargePer: 80,
  compUse: 2,
  evaFanUse: 2,
  eevUse: 1,
  heatUpperUse: 0,
  heatLowerUse: 0,
  wifiRssi: -58,
  ecoUse: 0,
  freezeProtectionUse: 1,
  freezeProtectionTemperature: 43,
  antiLegionellaUse: 1,
  antiLegionellaPeriod: 7,
  vacationDaySetting: 0,
  vacationDayElapsed: 0,
  totalEnergyCapacity: 5000,
  availableEnergyCapacity: 4000,
  deviceConnected: 1,
  temperatureType: 2,
};

/**
 * Complete GetStatus frame for the given values (missing fields are 0).
 */
export function statusFrame(
  values: Readonly<Record<string, number>> = SAMPLE_STATUS_VALUES,
  deviceId = "04786332fca0",
): Uint8Array {
  const body = encodeLayoutBody(OPCODES.GetStatus, values)._unsafeUnwrap();
  return encode(OPCODES.GetStatus, deviceId, body)._unsafeUnwrap();
}

/**
 * Decoded raw status fields for the given values.
 */
export function statusFields(
  values: Readonly<Record<string, number>> = SAMPLE_STATUS_VALUES,
): RawStatusFields {
  const frame = decode(statusFrame(values))._unsafeUnwrap();
  if (frame.body.kind !== "status") {
    throw new Error(`Expected a status body, got ${frame.body.kind}`);
  }
  return frame.body.fields;
}

/**
 * Append bytes to a frame.
 */
export function withTrailing(frame: Uint8Array, extra: number[]): Uint8Array {
  const out = new Uint8Array(frame.length + extra.length);
  out.set(frame);
  out.set(extra, frame.length);
  return out;
}
