import type { SessionConfiguration } from "./configuration.js";

/** Activity metrics supplied by the host's step / health collaborator. */
export interface ActivityMetrics {
  readonly steps: number;
  readonly distance: number;
  readonly averageHeartRate: number | null;
  readonly activeCalories: number;
}

/** Read-only source the scheduler queries when a session completes on its own. */
export type ActivityMetricsSource = () => ActivityMetrics;

export const EMPTY_METRICS: ActivityMetrics = Object.freeze({
  steps: 0,
  distance: 0,
  averageHeartRate: null,
  activeCalories: 0,
});

/**
 * Immutable completion record handed to the persistence collaborator.
 */
export interface SessionSummary {
  readonly sessionId: string;
  readonly briskIntervals: number;
  readonly slowIntervals: number;
  readonly totalIntervals: number;
  /** Active (unpaused) time in ms. */
  readonly totalDuration: number;
  readonly startTime: number;
  readonly endTime: number;
  /** True only when the session reached COMPLETED on its own. */
  readonly completedSuccessfully: boolean;
  readonly configuration: SessionConfiguration;
  readonly steps: number;
  readonly distance: number;
  readonly averageHeartRate: number | null;
  readonly activeCalories: number;
}

/** Final counters read from the scheduler when a session closes. */
export interface SummaryInput {
  readonly sessionId: string;
  readonly configuration: SessionConfiguration;
  readonly completedBriskIntervals: number;
  readonly completedSlowIntervals: number;
  readonly totalElapsedTime: number;
  readonly startTime: number;
  readonly endTime: number;
  readonly completedSuccessfully: boolean;
}

/**
 * Assemble a frozen summary. Pure: reads nothing but its arguments.
 */
export function buildSessionSummary(
  input: SummaryInput,
  metrics: ActivityMetrics = EMPTY_METRICS,
): SessionSummary {
  return Object.freeze({
    sessionId: input.sessionId,
    briskIntervals: input.completedBriskIntervals,
    slowIntervals: input.completedSlowIntervals,
    totalIntervals: input.configuration.totalIntervals,
    totalDuration: input.totalElapsedTime,
    startTime: input.startTime,
    endTime: input.endTime,
    completedSuccessfully: input.completedSuccessfully,
    configuration: input.configuration,
    steps: metrics.steps,
    distance: metrics.distance,
    averageHeartRate: metrics.averageHeartRate,
    activeCalories: metrics.activeCalories,
  });
}

/** Share of planned brisk intervals that were finished, 0..1. */
export function completionRatio(summary: SessionSummary): number {
  if (summary.totalIntervals <= 0) return 0;
  return Math.min(1, summary.briskIntervals / summary.totalIntervals);
}

/**
 * Format a duration as `m:ss`, or `h:mm:ss` from one hour up.
 * Fractional seconds are truncated.
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const ss = String(seconds).padStart(2, "0");

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${ss}`;
  }
  return `${minutes}:${ss}`;
}
