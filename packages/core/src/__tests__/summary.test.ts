import { describe, it, expect } from "vitest";
import {
  EMPTY_METRICS,
  buildSessionSummary,
  completionRatio,
  formatDuration,
  createConfiguration,
} from "../session/index.js";
import type { SummaryInput } from "../session/index.js";

const input: SummaryInput = {
  sessionId: "session-1",
  configuration: createConfiguration({ totalIntervals: 4 }),
  completedBriskIntervals: 3,
  completedSlowIntervals: 2,
  totalElapsedTime: 900_000,
  startTime: 1_000,
  endTime: 1_201_000,
  completedSuccessfully: false,
};

describe("session summary", () => {
  it("copies counters and timing from the input", () => {
    const summary = buildSessionSummary(input);
    expect(summary).toMatchObject({
      sessionId: "session-1",
      briskIntervals: 3,
      slowIntervals: 2,
      totalIntervals: 4,
      totalDuration: 900_000,
      startTime: 1_000,
      endTime: 1_201_000,
      completedSuccessfully: false,
    });
  });

  it("uses zero metrics by default", () => {
    const summary = buildSessionSummary(input);
    expect(summary.steps).toBe(0);
    expect(summary.distance).toBe(0);
    expect(summary.averageHeartRate).toBeNull();
    expect(summary.activeCalories).toBe(0);
    expect(EMPTY_METRICS.averageHeartRate).toBeNull();
  });

  it("attaches the given metrics", () => {
    const summary = buildSessionSummary(input, {
      steps: 4000,
      distance: 3100,
      averageHeartRate: 120,
      activeCalories: 210,
    });
    expect(summary.steps).toBe(4000);
    expect(summary.averageHeartRate).toBe(120);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(buildSessionSummary(input))).toBe(true);
  });

  it("computes the completion ratio", () => {
    expect(completionRatio(buildSessionSummary(input))).toBe(0.75);
  });
});

describe("formatDuration", () => {
  it("formats minutes and seconds", () => {
    expect(formatDuration(240_000)).toBe("4:00");
    expect(formatDuration(65_900)).toBe("1:05");
    expect(formatDuration(0)).toBe("0:00");
  });

  it("adds hours from one hour up", () => {
    expect(formatDuration(3_723_000)).toBe("1:02:03");
  });

  it("clamps negative values", () => {
    expect(formatDuration(-5_000)).toBe("0:00");
  });
});
