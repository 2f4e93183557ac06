/**
 * Status Transform Tests
 */
import { describe, expect, it } from "vitest";
import type { DeviceFeatureFields } from "../../codec/index.js";
import { SAMPLE_STATUS_VALUES, statusFields } from "../../codec/__tests__/fixtures.js";
import {
  calibrateFromRaw,
  calibrateToRaw,
  componentState,
  describeFeatures,
  heatingElementState,
  inferActivity,
  inferHeatingSource,
  normalize,
  operationMode,
  tenthsCelsiusToFahrenheit,
} from "../transform.js";

describe("Status Transform", () => {
  // ===========================================================================
  // Calibration
  // ===========================================================================

  describe("calibration", () => {
    it("adds the offset on read", () => {
      expect(calibrateFromRaw(101)).toBe(121);
    });

    it("subtracts the offset on write", () => {
      expect(calibrateToRaw(121)).toBe(101);
    });

    it("rounds to the nearest integer before subtracting", () => {
      expect(calibrateToRaw(120.6)).toBe(101);
      expect(calibrateToRaw(120.4)).toBe(100);
    });

    it("round-trips every integer in the device range", () => {
      for (let t = -40; t <= 200; t++) {
        expect(calibrateToRaw(calibrateFromRaw(t))).toBe(t);
      }
    });

    it("honours a custom offset", () => {
      expect(calibrateFromRaw(101, 0)).toBe(101);
      expect(calibrateToRaw(115, 15)).toBe(100);
    });
  });

  describe("tenthsCelsiusToFahrenheit", () => {
    it("converts 21.4 °C to 70.5 °F", () => {
      expect(tenthsCelsiusToFahrenheit(214)).toBe(70.5);
    });

    it("converts freezing point", () => {
      expect(tenthsCelsiusToFahrenheit(0)).toBe(32);
    });

    it("handles negative values", () => {
      expect(tenthsCelsiusToFahrenheit(-100)).toBe(14);
    });
  });

  // ===========================================================================
  // Codes
  // ===========================================================================

  describe("componentState", () => {
    it("maps the three-value scale", () => {
      expect([0, 1, 2, 3].map(componentState)).toEqual(["off", "ready", "active", "unknown"]);
    });
  });

  describe("heatingElementState", () => {
    it("is active when either element is active", () => {
      expect(heatingElementState(0, 2)).toBe("active");
    });

    it("is ready when either element is ready", () => {
      expect(heatingElementState(1, 0)).toBe("ready");
    });

    it("is off when both are off", () => {
      expect(heatingElementState(0, 0)).toBe("off");
    });
  });

  describe("operationMode", () => {
    it("maps known codes", () => {
      expect(operationMode(0)).toEqual({ kind: "standby", code: 0 });
      expect(operationMode(32)).toEqual({ kind: "heat_pump", code: 32 });
      expect(operationMode(33)).toEqual({ kind: "electric", code: 33 });
      expect(operationMode(34)).toEqual({ kind: "hybrid", code: 34 });
    });

    it("maps anything else to unknown with the code", () => {
      expect(operationMode(99)).toEqual({ kind: "unknown", code: 99 });
    });
  });

  describe("inferActivity", () => {
    it("is active above the power threshold", () => {
      expect(inferActivity(450, 32)).toBe("active");
    });

    it("is standby in mode 0 at low power", () => {
      expect(inferActivity(1, 0)).toBe("standby");
    });

    it("is idle in an operating mode at low power", () => {
      expect(inferActivity(400, 32)).toBe("idle");
    });
  });

  describe("inferHeatingSource", () => {
    it("distinguishes element, heat pump and none", () => {
      expect(inferHeatingSource(4500)).toBe("resistive_element");
      expect(inferHeatingSource(4000)).toBe("heat_pump");
      expect(inferHeatingSource(401)).toBe("heat_pump");
      expect(inferHeatingSource(400)).toBe("none");
    });
  });

  // ===========================================================================
  // normalize
  // ===========================================================================

  describe("normalize", () => {
    it("calibrates water temperatures and converts tenths", () => {
      const status = normalize(statusFields());

      expect(status.dhwTemperature).toBe(121);
      expect(status.dhwTemperatureSetting).toBe(120);
      expect(status.dhwTargetTemperature).toBe(120);
      expect(status.dhwTemperature2).toBe(119);
      expect(status.coldInletTemperature).toBe(60.5);
      expect(status.heatPumpAmbientTemperature).toBe(71.2);
      expect(status.dischargeTemperature).toBe(150.1);
      expect(status.ambientTemperature).toBe(70.5);
      expect(status.dhwFlowRate).toBe(1.5);
    });

    it("keeps wire names on the raw record", () => {
      const status = normalize(statusFields());

      expect(status.raw.tankUpperTemperature).toBe(605);
      expect(status.raw.tankLowerTemperature).toBe(712);
    });

    it("derives activity from power, not component codes", () => {
      const status = normalize(statusFields({ ...SAMPLE_STATUS_VALUES, operationMode: 32, currentInstPower: 450 }));

      expect(status.activity).toBe("active");
      expect(status.heatingSource).toBe("heat_pump");
    });

    it("reports standby even when a component says ready", () => {
      const status = normalize(
        statusFields({ ...SAMPLE_STATUS_VALUES, operationMode: 0, currentInstPower: 1, compUse: 1 }),
      );

      expect(status.activity).toBe("standby");
      expect(status.components.compressor).toBe("ready");
    });

    it("labels modes and components", () => {
      const status = normalize(statusFields());

      expect(status.operationMode).toEqual({ kind: "heat_pump", code: 32 });
      expect(status.dhwMode).toBe("hybrid");
      expect(status.components).toEqual({
        compressor: "active",
        evaporatorFan: "active",
        expansionValve: "ready",
        upperElement: "off",
        lowerElement: "off",
        heatingElement: "off",
      });
    });

    it("clamps charge above 100 and records an anomaly", () => {
      const status = normalize(statusFields({ ...SAMPLE_STATUS_VALUES, dhwChargePer: 140 }));

      expect(status.chargePercent).toBe(100);
      expect(status.anomalies).toEqual([
        { field: "dhwChargePer", raw: 140, reason: "charge outside 0-100 clamped" },
      ]);
    });

    it("keeps an unknown mode and component code without throwing", () => {
      const status = normalize(statusFields({ ...SAMPLE_STATUS_VALUES, operationMode: 77, compUse: 9 }));

      expect(status.operationMode).toEqual({ kind: "unknown", code: 77 });
      expect(status.components.compressor).toBe("unknown");
      expect(status.anomalies.map((a) => a.field)).toEqual(["operationMode", "compUse"]);
      expect(status.dhwTemperature).toBe(121);
    });

    it("clamps negative power to zero", () => {
      const status = normalize({ ...statusFields(), currentInstPower: -5 });

      expect(status.instantPower).toBe(0);
      expect(status.activity).toBe("idle");
      expect(status.anomalies[0]).toMatchObject({ field: "currentInstPower", raw: -5 });
    });

    it("reports error and connectivity flags", () => {
      const status = normalize(
        statusFields({ ...SAMPLE_STATUS_VALUES, errorCode: 517, subErrorCode: 3, deviceConnected: 0 }),
      );

      expect(status.hasError).toBe(true);
      expect(status.errorCode).toBe(517);
      expect(status.subErrorCode).toBe(3);
      expect(status.deviceConnected).toBe(false);
    });

    it("applies custom calibration and thresholds", () => {
      const status = normalize(statusFields(), {
        calibrationOffset: 0,
        activePowerThreshold: 500,
      });

      expect(status.dhwTemperature).toBe(101);
      expect(status.activity).toBe("idle");
    });

    it("returns a deeply frozen value", () => {
      const status = normalize(statusFields());

      expect(Object.isFrozen(status)).toBe(true);
      expect(Object.isFrozen(status.components)).toBe(true);
      expect(Object.isFrozen(status.raw)).toBe(true);
      expect(Object.isFrozen(status.anomalies)).toBe(true);
    });

    it("is deterministic", () => {
      expect(normalize(statusFields())).toEqual(normalize(statusFields()));
    });
  });

  // ===========================================================================
  // describeFeatures
  // ===========================================================================

  describe("describeFeatures", () => {
    const fields: DeviceFeatureFields = {
      countryCode: 1,
      modelTypeCode: 2,
      controlTypeCode: 1,
      volumeCode: 65,
      controllerSwVersion: 184,
      panelSwVersion: 181,
      wifiSwVersion: 34,
      controllerSwCode: 0,
      panelSwCode: 0,
      wifiSwCode: 0,
      powerUse: 1,
      holidayUse: 1,
      programReservationUse: 1,
      dhwUse: 1,
      dhwTemperatureSettingUse: 1,
      dhwTemperatureMin: 70,
      dhwTemperatureMax: 131,
      smartDiagnosticUse: 0,
      wifiRssiUse: 1,
      temperatureType: 2,
      tempFormulaType: 1,
      energyUsageUse: 1,
      freezeProtectionUse: 1,
      freezeProtectionTempMin: 43,
      freezeProtectionTempMax: 65,
      mixingValueUse: 0,
      drSettingUse: 0,
      antiLegionellaSettingUse: 1,
      hpwhUse: 1,
      dhwRefillUse: 0,
      ecoUse: 0,
      electricUse: 1,
      heatpumpUse: 1,
      energySaverUse: 1,
      highDemandUse: 0,
    };

    it("summarizes firmware, range and supported modes", () => {
      expect(describeFeatures(fields)).toEqual({
        firmware: { controller: 184, panel: 181, wifi: 34 },
        temperatureRange: { min: 90, max: 151 },
        supportedModes: ["heat_pump", "hybrid", "electric", "energy_saver"],
        freezeProtection: true,
        antiLegionella: true,
        energyUsage: true,
      });
    });
  });
});
