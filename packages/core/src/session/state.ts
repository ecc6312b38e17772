import { SessionClock } from "./clock.js";
import { phaseDuration, totalPlannedDuration } from "./configuration.js";
import type { SessionConfiguration } from "./configuration.js";
import { PhaseKind } from "./phase.js";
import type { TimedPhaseKind } from "./phase.js";

/**
 * Timing of the current phase. The end instant only exists on the
 * `running` variant, so callers never null-check a separate field.
 */
export type PhaseTiming =
  | { readonly kind: "running"; readonly phaseEndTime: number }
  | { readonly kind: "paused"; readonly remainingAtPause: number }
  | { readonly kind: "untimed" };

/**
 * Immutable view of the scheduler's state at one instant.
 * Readers (UI, mirrors) only ever see these, never the live state.
 */
export interface SessionStateSnapshot {
  /** Empty string when no session was ever started. */
  readonly sessionId: string;
  /** Bumped on every state change; lets mirrors drop duplicates. */
  readonly revision: number;
  /** Externally observed phase. PAUSED while paused. */
  readonly phase: PhaseKind;
  /** Timed phase in progress (or suspended by a pause); null otherwise. */
  readonly activePhase: TimedPhaseKind | null;
  /** 1-based brisk/easy cycle in progress; 0 before the first brisk phase. */
  readonly currentIntervalIndex: number;
  readonly totalIntervals: number;
  readonly completedBriskIntervals: number;
  readonly completedSlowIntervals: number;
  readonly timing: PhaseTiming;
  /** Active, unpaused time accumulated up to `capturedAt`. */
  readonly totalElapsedTime: number;
  readonly isActive: boolean;
  readonly isPaused: boolean;
  readonly startTime: number | null;
  readonly capturedAt: number;
}

/** Snapshot of a scheduler that has never run a session. */
export function idleSnapshot(capturedAt: number): SessionStateSnapshot {
  return Object.freeze({
    sessionId: "",
    revision: 0,
    phase: PhaseKind.IDLE,
    activePhase: null,
    currentIntervalIndex: 0,
    totalIntervals: 0,
    completedBriskIntervals: 0,
    completedSlowIntervals: 0,
    timing: Object.freeze({ kind: "untimed" as const }),
    totalElapsedTime: 0,
    isActive: false,
    isPaused: false,
    startTime: null,
    capturedAt,
  });
}

/** Absolute end of the running phase, or null when nothing is counting down. */
export function phaseEndTimeOf(snapshot: SessionStateSnapshot): number | null {
  return snapshot.timing.kind === "running" ? snapshot.timing.phaseEndTime : null;
}

/** Remaining time of the current phase as seen at `now`. */
export function remainingOf(snapshot: SessionStateSnapshot, now: number): number {
  switch (snapshot.timing.kind) {
    case "running":
      return SessionClock.remaining(snapshot.timing.phaseEndTime, now);
    case "paused":
      return snapshot.timing.remainingAtPause;
    case "untimed":
      return 0;
  }
}

/** Fraction of the current phase already walked, 0..1. */
export function phaseProgress(
  snapshot: SessionStateSnapshot,
  config: SessionConfiguration,
  now: number,
): number {
  if (!snapshot.activePhase) return 0;
  const duration = phaseDuration(config, snapshot.activePhase);
  if (duration <= 0) return 0;
  return Math.min(1, Math.max(0, 1 - remainingOf(snapshot, now) / duration));
}

/** Fraction of the whole planned session already walked, 0..1. */
export function sessionProgress(
  snapshot: SessionStateSnapshot,
  config: SessionConfiguration,
  now: number,
): number {
  if (snapshot.phase === PhaseKind.COMPLETED) return 1;
  const total = totalPlannedDuration(config);
  if (total <= 0) return 0;
  const elapsed =
    snapshot.isActive && !snapshot.isPaused
      ? snapshot.totalElapsedTime + SessionClock.elapsedBetween(snapshot.capturedAt, now)
      : snapshot.totalElapsedTime;
  return Math.min(1, elapsed / total);
}
