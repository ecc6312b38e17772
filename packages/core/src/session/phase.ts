/**
 * Phases of an interval walk.
 *
 * WARMUP, BRISK, EASY and COOLDOWN are timed: each has a duration taken from
 * the session configuration and an absolute end instant while running.
 * PAUSED, COMPLETED and IDLE are control states with no end instant.
 */
export enum PhaseKind {
  WARMUP = "WARMUP",
  BRISK = "BRISK",
  EASY = "EASY",
  COOLDOWN = "COOLDOWN",
  PAUSED = "PAUSED",
  COMPLETED = "COMPLETED",
  IDLE = "IDLE",
}

/** The phases that carry a duration. */
export type TimedPhaseKind =
  | PhaseKind.WARMUP
  | PhaseKind.BRISK
  | PhaseKind.EASY
  | PhaseKind.COOLDOWN;

export const TIMED_PHASES: readonly TimedPhaseKind[] = [
  PhaseKind.WARMUP,
  PhaseKind.BRISK,
  PhaseKind.EASY,
  PhaseKind.COOLDOWN,
];

export function isTimedPhase(kind: PhaseKind): kind is TimedPhaseKind {
  switch (kind) {
    case PhaseKind.WARMUP:
    case PhaseKind.BRISK:
    case PhaseKind.EASY:
    case PhaseKind.COOLDOWN:
      return true;
    default:
      return false;
  }
}

/** Display metadata for a phase. */
export interface PhaseInfo {
  /** Short label for space-constrained surfaces (widgets, watch faces). */
  readonly displayName: string;
  /** One-line instruction shown while the phase runs. */
  readonly instruction: string;
}

export const PHASE_INFO: Record<PhaseKind, PhaseInfo> = {
  [PhaseKind.WARMUP]: {
    displayName: "Warmup",
    instruction: "Start with an easy pace to warm up",
  },
  [PhaseKind.BRISK]: {
    displayName: "Brisk",
    instruction: "Pick up the pace",
  },
  [PhaseKind.EASY]: {
    displayName: "Easy",
    instruction: "Walk at a comfortable pace",
  },
  [PhaseKind.COOLDOWN]: {
    displayName: "Cooldown",
    instruction: "Gradually slow down to cool off",
  },
  [PhaseKind.PAUSED]: {
    displayName: "Paused",
    instruction: "Session paused. Resume to continue",
  },
  [PhaseKind.COMPLETED]: {
    displayName: "Complete",
    instruction: "Great job! You've completed your walk",
  },
  [PhaseKind.IDLE]: {
    displayName: "Ready",
    instruction: "Start a session when you're ready",
  },
};

/**
 * Text announcing the phase about to begin. `interval` is the 1-based
 * interval index the next phase belongs to (ignored for warmup, cooldown
 * and completion).
 *
 * Used by hosts to fill local notifications scheduled ahead of a boundary.
 */
export function transitionCue(next: PhaseKind, interval: number, totalIntervals: number): string {
  switch (next) {
    case PhaseKind.BRISK:
      return interval <= 1
        ? "Time for a brisk walk! Pick up the pace."
        : `Brisk interval ${interval} of ${totalIntervals}. Let's go!`;
    case PhaseKind.EASY:
      return "Recovery time. Slow down and catch your breath.";
    case PhaseKind.COOLDOWN:
      return "Final stretch. Cool down time!";
    case PhaseKind.COMPLETED:
      return "Session complete! Great work!";
    default:
      return PHASE_INFO[next].instruction;
  }
}
