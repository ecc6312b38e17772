import { phaseDuration } from "./configuration.js";
import type { SessionConfiguration } from "./configuration.js";
import { PhaseKind } from "./phase.js";
import type { TimedPhaseKind } from "./phase.js";

/**
 * Where a running session is: a timed phase plus the interval it belongs to.
 * `interval` is 0 during warmup, 1..totalIntervals for brisk/easy, and
 * totalIntervals during cooldown.
 */
export interface PhasePosition {
  readonly phase: TimedPhaseKind;
  readonly interval: number;
}

/**
 * Result of applying one row of the transition table.
 * `to` is null when the session reaches COMPLETED.
 */
export interface TransitionStep {
  readonly from: PhasePosition;
  readonly to: PhasePosition | null;
  readonly completesBrisk: boolean;
  readonly completesEasy: boolean;
}

/** One scheduled phase with absolute start and end instants. */
export interface TimelineEntry {
  readonly phase: TimedPhaseKind;
  readonly interval: number;
  readonly startsAt: number;
  readonly endsAt: number;
}

/** First phase of a session: warmup if enabled, otherwise brisk interval 1. */
export function initialPosition(config: SessionConfiguration): PhasePosition {
  return config.enableWarmup
    ? { phase: PhaseKind.WARMUP, interval: 0 }
    : { phase: PhaseKind.BRISK, interval: 1 };
}

/**
 * Deterministic transition table:
 *
 * - WARMUP → BRISK(1)
 * - BRISK(i) → EASY(i), brisk completed
 * - EASY(i < N) → BRISK(i+1), easy completed
 * - EASY(N) → COOLDOWN if enabled, otherwise COMPLETED; easy completed
 * - COOLDOWN → COMPLETED
 */
export function nextStep(from: PhasePosition, config: SessionConfiguration): TransitionStep {
  switch (from.phase) {
    case PhaseKind.WARMUP:
      return {
        from,
        to: { phase: PhaseKind.BRISK, interval: 1 },
        completesBrisk: false,
        completesEasy: false,
      };
    case PhaseKind.BRISK:
      return {
        from,
        to: { phase: PhaseKind.EASY, interval: from.interval },
        completesBrisk: true,
        completesEasy: false,
      };
    case PhaseKind.EASY:
      if (from.interval < config.totalIntervals) {
        return {
          from,
          to: { phase: PhaseKind.BRISK, interval: from.interval + 1 },
          completesBrisk: false,
          completesEasy: true,
        };
      }
      return {
        from,
        to: config.enableCooldown
          ? { phase: PhaseKind.COOLDOWN, interval: from.interval }
          : null,
        completesBrisk: false,
        completesEasy: true,
      };
    case PhaseKind.COOLDOWN:
      return { from, to: null, completesBrisk: false, completesEasy: false };
  }
}

/**
 * Lay out phases back to back starting with `position`, which ends at
 * `currentEndsAt` and began `currentStartsAt`.
 */
export function projectTimeline(
  position: PhasePosition,
  currentStartsAt: number,
  currentEndsAt: number,
  config: SessionConfiguration,
): TimelineEntry[] {
  const entries: TimelineEntry[] = [
    { ...position, startsAt: currentStartsAt, endsAt: currentEndsAt },
  ];

  let cursor = currentEndsAt;
  let step = nextStep(position, config);
  while (step.to) {
    const endsAt = cursor + phaseDuration(config, step.to.phase);
    entries.push({ ...step.to, startsAt: cursor, endsAt });
    cursor = endsAt;
    step = nextStep(step.to, config);
  }

  return entries;
}

/** Full phase schedule of a session started at `startTime`. */
export function buildTimeline(config: SessionConfiguration, startTime: number): TimelineEntry[] {
  const first = initialPosition(config);
  return projectTimeline(first, startTime, startTime + phaseDuration(config, first.phase), config);
}
