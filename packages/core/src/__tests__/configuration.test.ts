import { describe, it, expect } from "vitest";
import {
  STANDARD_CONFIGURATION,
  SESSION_PRESETS,
  presetById,
  validateConfiguration,
  assertValidConfiguration,
  createConfiguration,
  phaseDuration,
  totalPlannedDuration,
  PhaseKind,
} from "../session/index.js";
import { InvalidConfigurationError } from "../errors.js";

describe("configuration", () => {
  describe("STANDARD_CONFIGURATION", () => {
    it("is 3 min brisk / 3 min easy x 5 without warmup or cooldown", () => {
      expect(STANDARD_CONFIGURATION).toEqual({
        briskDuration: 180_000,
        easyDuration: 180_000,
        warmupDuration: 0,
        cooldownDuration: 0,
        totalIntervals: 5,
        enableWarmup: false,
        enableCooldown: false,
      });
    });

    it("is valid and frozen", () => {
      expect(validateConfiguration(STANDARD_CONFIGURATION)).toEqual([]);
      expect(Object.isFrozen(STANDARD_CONFIGURATION)).toBe(true);
    });
  });

  describe("presets", () => {
    it("are all valid", () => {
      for (const preset of SESSION_PRESETS) {
        expect(validateConfiguration(preset.configuration)).toEqual([]);
      }
    });

    it("looks up by id", () => {
      expect(presetById("beginner")?.configuration.briskDuration).toBe(60_000);
      expect(presetById("beginner")?.configuration.easyDuration).toBe(120_000);
      expect(presetById("advanced")?.configuration.totalIntervals).toBe(6);
      expect(presetById("standard_with_warmup")?.configuration.enableWarmup).toBe(true);
    });

    it("returns undefined for unknown ids", () => {
      expect(presetById("marathon")).toBeUndefined();
    });
  });

  describe("validateConfiguration", () => {
    it("reports non-positive durations", () => {
      const issues = validateConfiguration({
        ...STANDARD_CONFIGURATION,
        briskDuration: 0,
        easyDuration: -1,
      });
      expect(issues).toEqual([
        { field: "briskDuration", message: "Value must be greater than 0" },
        { field: "easyDuration", message: "Value must be greater than 0" },
      ]);
    });

    it("rejects non-finite durations", () => {
      const issues = validateConfiguration({ ...STANDARD_CONFIGURATION, briskDuration: NaN });
      expect(issues.map((i) => i.field)).toEqual(["briskDuration"]);
    });

    it("only checks warmup and cooldown durations when enabled", () => {
      expect(validateConfiguration({ ...STANDARD_CONFIGURATION, warmupDuration: 0 })).toEqual([]);

      const issues = validateConfiguration({
        ...STANDARD_CONFIGURATION,
        enableWarmup: true,
        enableCooldown: true,
      });
      expect(issues).toEqual([
        {
          field: "warmupDuration",
          message: "Value must be greater than 0 when warmup is enabled",
        },
        {
          field: "cooldownDuration",
          message: "Value must be greater than 0 when cooldown is enabled",
        },
      ]);
    });

    it("requires a whole number of intervals of at least 1", () => {
      for (const totalIntervals of [0, -2, 1.5]) {
        expect(validateConfiguration({ ...STANDARD_CONFIGURATION, totalIntervals })).toEqual([
          { field: "totalIntervals", message: "Value must be an integer >= 1" },
        ]);
      }
    });
  });

  describe("assertValidConfiguration", () => {
    it("throws with every issue attached", () => {
      try {
        assertValidConfiguration({ ...STANDARD_CONFIGURATION, briskDuration: 0, totalIntervals: 0 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidConfigurationError);
        if (!(err instanceof InvalidConfigurationError)) return;
        expect(err.name).toBe("InvalidConfigurationError");
        expect(err.issues.map((i) => i.field)).toEqual(["briskDuration", "totalIntervals"]);
        expect(err.message).toBe(
          "Invalid session configuration (briskDuration: Value must be greater than 0; totalIntervals: Value must be an integer >= 1)",
        );
      }
    });
  });

  describe("createConfiguration", () => {
    it("merges overrides over the standard configuration", () => {
      const config = createConfiguration({ totalIntervals: 3 });
      expect(config.totalIntervals).toBe(3);
      expect(config.briskDuration).toBe(180_000);
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("throws on invalid overrides", () => {
      expect(() => createConfiguration({ easyDuration: 0 })).toThrow(InvalidConfigurationError);
    });
  });

  describe("durations", () => {
    const config = createConfiguration({
      briskDuration: 60_000,
      easyDuration: 90_000,
      warmupDuration: 30_000,
      cooldownDuration: 45_000,
      totalIntervals: 2,
      enableWarmup: true,
      enableCooldown: true,
    });

    it("maps each timed phase to its duration", () => {
      expect(phaseDuration(config, PhaseKind.WARMUP)).toBe(30_000);
      expect(phaseDuration(config, PhaseKind.BRISK)).toBe(60_000);
      expect(phaseDuration(config, PhaseKind.EASY)).toBe(90_000);
      expect(phaseDuration(config, PhaseKind.COOLDOWN)).toBe(45_000);
    });

    it("sums the planned session", () => {
      expect(totalPlannedDuration(config)).toBe(30_000 + 2 * 150_000 + 45_000);
      expect(totalPlannedDuration({ ...config, enableWarmup: false, enableCooldown: false })).toBe(
        300_000,
      );
    });
  });
});
