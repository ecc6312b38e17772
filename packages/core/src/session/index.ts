export { PhaseKind, TIMED_PHASES, PHASE_INFO, isTimedPhase, transitionCue } from "./phase.js";
export type { TimedPhaseKind, PhaseInfo } from "./phase.js";

export { SessionClock, systemClock } from "./clock.js";
export type { ClockFn } from "./clock.js";

export {
  STANDARD_CONFIGURATION,
  SESSION_PRESETS,
  presetById,
  validateConfiguration,
  assertValidConfiguration,
  createConfiguration,
  phaseDuration,
  totalPlannedDuration,
} from "./configuration.js";
export type { SessionConfiguration, SessionPreset } from "./configuration.js";

export {
  initialPosition,
  nextStep,
  projectTimeline,
  buildTimeline,
} from "./transitions.js";
export type { PhasePosition, TransitionStep, TimelineEntry } from "./transitions.js";

export {
  idleSnapshot,
  phaseEndTimeOf,
  remainingOf,
  phaseProgress,
  sessionProgress,
} from "./state.js";
export type { PhaseTiming, SessionStateSnapshot } from "./state.js";

export {
  EMPTY_METRICS,
  buildSessionSummary,
  completionRatio,
  formatDuration,
} from "./summary.js";
export type {
  ActivityMetrics,
  ActivityMetricsSource,
  SessionSummary,
  SummaryInput,
} from "./summary.js";

export { PhaseScheduler } from "./scheduler.js";
export type {
  PhaseChangeEvent,
  SessionEvents,
  SessionObserver,
  SessionHandle,
  PhaseSchedulerConfig,
} from "./scheduler.js";
