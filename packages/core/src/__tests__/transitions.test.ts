import { describe, it, expect } from "vitest";
import {
  PhaseKind,
  createConfiguration,
  initialPosition,
  nextStep,
  projectTimeline,
  buildTimeline,
} from "../session/index.js";

const base = createConfiguration({ briskDuration: 60_000, easyDuration: 30_000, totalIntervals: 2 });
const full = createConfiguration({
  briskDuration: 60_000,
  easyDuration: 30_000,
  totalIntervals: 2,
  warmupDuration: 20_000,
  cooldownDuration: 10_000,
  enableWarmup: true,
  enableCooldown: true,
});

describe("transitions", () => {
  describe("initialPosition", () => {
    it("starts with brisk interval 1", () => {
      expect(initialPosition(base)).toEqual({ phase: PhaseKind.BRISK, interval: 1 });
    });

    it("starts with warmup when enabled", () => {
      expect(initialPosition(full)).toEqual({ phase: PhaseKind.WARMUP, interval: 0 });
    });
  });

  describe("nextStep", () => {
    it("goes from warmup to brisk 1 without completing anything", () => {
      expect(nextStep({ phase: PhaseKind.WARMUP, interval: 0 }, full)).toEqual({
        from: { phase: PhaseKind.WARMUP, interval: 0 },
        to: { phase: PhaseKind.BRISK, interval: 1 },
        completesBrisk: false,
        completesEasy: false,
      });
    });

    it("goes from brisk to easy of the same interval", () => {
      const step = nextStep({ phase: PhaseKind.BRISK, interval: 2 }, base);
      expect(step.to).toEqual({ phase: PhaseKind.EASY, interval: 2 });
      expect(step.completesBrisk).toBe(true);
      expect(step.completesEasy).toBe(false);
    });

    it("goes from easy to the next brisk interval", () => {
      const step = nextStep({ phase: PhaseKind.EASY, interval: 1 }, base);
      expect(step.to).toEqual({ phase: PhaseKind.BRISK, interval: 2 });
      expect(step.completesEasy).toBe(true);
    });

    it("completes after the last easy phase without cooldown", () => {
      const step = nextStep({ phase: PhaseKind.EASY, interval: 2 }, base);
      expect(step.to).toBeNull();
      expect(step.completesEasy).toBe(true);
    });

    it("enters cooldown after the last easy phase when enabled", () => {
      const step = nextStep({ phase: PhaseKind.EASY, interval: 2 }, full);
      expect(step.to).toEqual({ phase: PhaseKind.COOLDOWN, interval: 2 });
    });

    it("completes after cooldown", () => {
      const step = nextStep({ phase: PhaseKind.COOLDOWN, interval: 2 }, full);
      expect(step.to).toBeNull();
      expect(step.completesBrisk).toBe(false);
      expect(step.completesEasy).toBe(false);
    });
  });

  describe("buildTimeline", () => {
    it("lays out every phase back to back", () => {
      expect(buildTimeline(base, 1_000)).toEqual([
        { phase: PhaseKind.BRISK, interval: 1, startsAt: 1_000, endsAt: 61_000 },
        { phase: PhaseKind.EASY, interval: 1, startsAt: 61_000, endsAt: 91_000 },
        { phase: PhaseKind.BRISK, interval: 2, startsAt: 91_000, endsAt: 151_000 },
        { phase: PhaseKind.EASY, interval: 2, startsAt: 151_000, endsAt: 181_000 },
      ]);
    });

    it("includes warmup and cooldown", () => {
      const timeline = buildTimeline(full, 0);
      expect(timeline.map((e) => e.phase)).toEqual([
        PhaseKind.WARMUP,
        PhaseKind.BRISK,
        PhaseKind.EASY,
        PhaseKind.BRISK,
        PhaseKind.EASY,
        PhaseKind.COOLDOWN,
      ]);
      expect(timeline.at(-1)).toEqual({
        phase: PhaseKind.COOLDOWN,
        interval: 2,
        startsAt: 200_000,
        endsAt: 210_000,
      });
    });
  });

  describe("projectTimeline", () => {
    it("starts from the given position and end instant", () => {
      const timeline = projectTimeline({ phase: PhaseKind.EASY, interval: 2 }, 500, 20_000, full);
      expect(timeline).toEqual([
        { phase: PhaseKind.EASY, interval: 2, startsAt: 500, endsAt: 20_000 },
        { phase: PhaseKind.COOLDOWN, interval: 2, startsAt: 20_000, endsAt: 30_000 },
      ]);
    });
  });
});
