import { randomUUID } from "node:crypto";

import { AlreadyActiveError } from "../errors.js";
import { EventNotifier } from "../events/notifier.js";
import type { CompanionMirror, RemoteCommand } from "../mirror/types.js";
import { SessionClock, systemClock } from "./clock.js";
import type { ClockFn } from "./clock.js";
import { assertValidConfiguration, phaseDuration } from "./configuration.js";
import type { SessionConfiguration } from "./configuration.js";
import { PhaseKind } from "./phase.js";
import { idleSnapshot } from "./state.js";
import type { SessionStateSnapshot } from "./state.js";
import { EMPTY_METRICS, buildSessionSummary } from "./summary.js";
import type { ActivityMetrics, ActivityMetricsSource, SessionSummary } from "./summary.js";
import { initialPosition, nextStep, projectTimeline } from "./transitions.js";
import type { PhasePosition, TimelineEntry } from "./transitions.js";

/**
 * Emitted once for every phase entered, including the first phase of a
 * session and the final COMPLETED state.
 */
export interface PhaseChangeEvent {
  readonly phase: PhaseKind;
  /** Phase that just ended; null for the first phase of a session. */
  readonly previous: PhaseKind | null;
  readonly interval: number;
  /** Instant of the boundary (the scheduled end of the previous phase, or `now` for a skip). */
  readonly at: number;
  readonly snapshot: SessionStateSnapshot;
}

export type SessionEvents = {
  phaseChange: (event: PhaseChangeEvent) => void;
  /** A brisk phase finished; carries its 1-based interval index. */
  intervalComplete: (interval: number) => void;
  /** The session reached COMPLETED on its own. */
  completed: (summary: SessionSummary) => void;
  paused: (snapshot: SessionStateSnapshot) => void;
  resumed: (snapshot: SessionStateSnapshot) => void;
  /** The session was closed early by `end()`. */
  ended: (summary: SessionSummary) => void;
  error: (err: Error) => void;
};

/** Callback-object form of the phase/completion events. */
export interface SessionObserver {
  onPhaseChange?(phase: PhaseKind, event: PhaseChangeEvent): void;
  onCompleted?(summary: SessionSummary): void;
}

/** Returned by `start()`; identifies the session that was created. */
export interface SessionHandle {
  readonly sessionId: string;
  readonly startTime: number;
  readonly configuration: SessionConfiguration;
}

export interface PhaseSchedulerConfig {
  /** Override the clock for deterministic testing. Defaults to Date.now. */
  readonly clock?: ClockFn;
  /** Mirrors pushed after every state change. More can be added later. */
  readonly mirrors?: readonly CompanionMirror[];
  /** Queried when a session completes on its own. Defaults to zero metrics. */
  readonly metrics?: ActivityMetricsSource;
  /** Session id generator. Defaults to a random UUID. */
  readonly idFactory?: () => string;
}

/** Mutable state of the session in progress. Never leaves this module. */
interface ActiveSession {
  readonly id: string;
  readonly configuration: SessionConfiguration;
  readonly startTime: number;
  /** Current timed phase; kept while paused so resume can restore it. */
  position: PhasePosition;
  phaseEndTime: number | null;
  remainingAtPause: number | null;
  isPaused: boolean;
  completedBriskIntervals: number;
  completedSlowIntervals: number;
  /** Active time accumulated before `runningSince`. */
  elapsedBeforeRun: number;
  /** Start of the current unpaused stretch; null while paused. */
  runningSince: number | null;
}

/**
 * Phase engine for an interval walk.
 *
 * The scheduler owns no timer. The host calls `tick()` periodically (see
 * `IntervalTicker`) and the scheduler advances whenever the wall clock has
 * passed the current phase's absolute end instant. A host that was
 * suspended simply ticks late: every missed boundary is replayed in order,
 * one `phaseChange` per phase, and phase end times stay anchored to the
 * initial schedule.
 *
 * All methods are synchronous and must be called from a single execution
 * context. Commands that make no sense in the current state (pausing twice,
 * resuming a running session, ending an idle scheduler) are no-ops.
 *
 * Usage:
 * ```ts
 * const scheduler = new PhaseScheduler({ metrics: () => health.currentMetrics() });
 * scheduler.on("phaseChange", (e) => haptics.play(e.phase));
 * scheduler.on("completed", (summary) => history.save(summary));
 *
 * scheduler.start(createConfiguration({ totalIntervals: 3 }));
 * setInterval(() => scheduler.tick(), 1000);
 * ```
 */
export class PhaseScheduler extends EventNotifier<SessionEvents> {
  private _session: ActiveSession | null = null;
  private _final: SessionStateSnapshot | null = null;
  private _lastSummary: SessionSummary | null = null;
  private _revision = 0;

  private readonly _clock: ClockFn;
  private readonly _mirrors: CompanionMirror[];
  private readonly _metrics: ActivityMetricsSource;
  private readonly _idFactory: () => string;

  constructor(config: PhaseSchedulerConfig = {}) {
    super();
    this._clock = config.clock ?? systemClock;
    this._mirrors = [...(config.mirrors ?? [])];
    this._metrics = config.metrics ?? (() => EMPTY_METRICS);
    this._idFactory = config.idFactory ?? randomUUID;
  }

  /** Whether a session is running or paused. */
  get isActive(): boolean {
    return this._session !== null;
  }

  /** Configuration of the active session, or null. */
  get configuration(): SessionConfiguration | null {
    return this._session?.configuration ?? null;
  }

  /** Summary of the most recently closed session, or null. */
  get lastSummary(): SessionSummary | null {
    return this._lastSummary;
  }

  // ── Commands ──────────────────────────────────────────────────────────────

  /**
   * Start a session. The first phase is WARMUP when enabled, otherwise
   * BRISK of interval 1.
   *
   * @throws AlreadyActiveError if a session is running or paused (state is left untouched).
   * @throws InvalidConfigurationError if the configuration breaks an invariant.
   */
  start(config: SessionConfiguration, now: number = this._clock()): SessionHandle {
    if (this._session) {
      throw new AlreadyActiveError(this._session.id);
    }
    assertValidConfiguration(config);

    const configuration = Object.freeze({ ...config });
    const position = initialPosition(configuration);
    const session: ActiveSession = {
      id: this._idFactory(),
      configuration,
      startTime: now,
      position,
      phaseEndTime: SessionClock.endTime(now, phaseDuration(configuration, position.phase)),
      remainingAtPause: null,
      isPaused: false,
      completedBriskIntervals: 0,
      completedSlowIntervals: 0,
      elapsedBeforeRun: 0,
      runningSince: now,
    };

    this._session = session;
    this._final = null;
    this._lastSummary = null;

    const snapshot = this._commit(session, now);
    this.emit("phaseChange", {
      phase: position.phase,
      previous: null,
      interval: position.interval,
      at: now,
      snapshot,
    });

    return { sessionId: session.id, startTime: now, configuration };
  }

  /**
   * Advance through every phase whose end instant is at or before `now`.
   * Returns the resulting snapshot. Calling it early is harmless.
   */
  tick(now: number = this._clock()): SessionStateSnapshot {
    const session = this._session;
    if (session) {
      // Re-check the live session each round: a listener may pause or end it.
      while (
        this._session === session &&
        !session.isPaused &&
        session.phaseEndTime !== null &&
        session.phaseEndTime <= now
      ) {
        this._advance(session, session.phaseEndTime);
      }
    }
    return this.currentState(now);
  }

  /**
   * Freeze the current phase. Overdue boundaries are applied first so the
   * captured remaining time belongs to the phase that is actually running.
   */
  pause(now: number = this._clock()): void {
    this.tick(now);
    const session = this._session;
    if (!session || session.isPaused || session.phaseEndTime === null) return;

    session.remainingAtPause = SessionClock.remaining(session.phaseEndTime, now);
    session.elapsedBeforeRun = this._elapsed(session, now);
    session.runningSince = null;
    session.phaseEndTime = null;
    session.isPaused = true;

    this.emit("paused", this._commit(session, now));
  }

  /** Restart the frozen phase with exactly the time it had left. */
  resume(now: number = this._clock()): void {
    const session = this._session;
    if (!session || !session.isPaused) return;

    session.phaseEndTime = SessionClock.endTime(now, session.remainingAtPause ?? 0);
    session.remainingAtPause = null;
    session.runningSince = now;
    session.isPaused = false;

    this.emit("resumed", this._commit(session, now));
  }

  /**
   * Apply exactly one row of the transition table, as if the current phase
   * expired at `now`. The next phase gets its full duration from `now`.
   * No-op while idle or paused.
   */
  skipToNextPhase(now: number = this._clock()): void {
    const session = this._session;
    if (!session || session.isPaused) return;
    this._advance(session, now);
  }

  /**
   * Close the session early. Overdue boundaries are applied first, so a
   * session whose plan ran out while the host was suspended completes
   * naturally instead. Returns null when nothing is active afterwards
   * (including after natural completion, whose summary is in `lastSummary`).
   *
   * @param metrics - Activity metrics; read from the configured source when omitted.
   */
  end(metrics?: ActivityMetrics, now: number = this._clock()): SessionSummary | null {
    this.tick(now);
    const session = this._session;
    if (!session) return null;

    const totalElapsedTime = this._elapsed(session, now);
    const summary = buildSessionSummary(
      {
        sessionId: session.id,
        configuration: session.configuration,
        completedBriskIntervals: session.completedBriskIntervals,
        completedSlowIntervals: session.completedSlowIntervals,
        totalElapsedTime,
        startTime: session.startTime,
        endTime: now,
        completedSuccessfully: false,
      },
      metrics ?? this._readMetrics(),
    );

    this._close(session, PhaseKind.IDLE, totalElapsedTime, now, summary);
    this.emit("ended", summary);
    return summary;
  }

  // ── Remote commands ───────────────────────────────────────────────────────

  /** Pause requested by the paired device. Same path as a local pause. */
  applyRemotePause(): void {
    this.pause();
  }

  applyRemoteResume(): void {
    this.resume();
  }

  applyRemoteSkip(): void {
    this.skipToNextPhase();
  }

  applyRemoteEnd(metrics?: ActivityMetrics): SessionSummary | null {
    return this.end(metrics);
  }

  applyRemoteCommand(command: RemoteCommand): void {
    switch (command) {
      case "pause":
        this.applyRemotePause();
        break;
      case "resume":
        this.applyRemoteResume();
        break;
      case "skip":
        this.applyRemoteSkip();
        break;
      case "end":
        this.applyRemoteEnd();
        break;
    }
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  /** Immutable snapshot for rendering. Does not advance phases. */
  currentState(now: number = this._clock()): SessionStateSnapshot {
    if (this._session) return this._snapshot(this._session, now);
    return this._final ?? idleSnapshot(now);
  }

  /**
   * Phases still to come, starting with the current one, laid out from the
   * current end instant. Empty when idle.
   *
   * While paused the plan is projected as if resumed at `now`: the current
   * entry starts at `now` and spans only the time it had left.
   */
  remainingTimeline(now: number = this._clock()): TimelineEntry[] {
    const session = this._session;
    if (!session) return [];

    if (session.phaseEndTime === null) {
      const endsAt = SessionClock.endTime(now, session.remainingAtPause ?? 0);
      return projectTimeline(session.position, now, endsAt, session.configuration);
    }

    const duration = phaseDuration(session.configuration, session.position.phase);
    const endsAt = session.phaseEndTime;
    return projectTimeline(session.position, endsAt - duration, endsAt, session.configuration);
  }

  // ── Observers & mirrors ───────────────────────────────────────────────────

  /** Subscribe a callback object. Returns an unsubscribe function. */
  attachObserver(observer: SessionObserver): () => void {
    const offPhase = this.on("phaseChange", (event) => observer.onPhaseChange?.(event.phase, event));
    const offCompleted = this.on("completed", (summary) => observer.onCompleted?.(summary));
    return () => {
      offPhase();
      offCompleted();
    };
  }

  /** Add a mirror and bring it up to date immediately. Returns a remover. */
  addMirror(mirror: CompanionMirror): () => void {
    this._mirrors.push(mirror);
    this._callMirror(mirror, "resync", this.currentState());
    return () => {
      const idx = this._mirrors.indexOf(mirror);
      if (idx >= 0) this._mirrors.splice(idx, 1);
    };
  }

  /** Force a full state push to every mirror (e.g. after a reconnect). */
  resyncMirrors(now: number = this._clock()): void {
    const snapshot = this.currentState(now);
    for (const mirror of [...this._mirrors]) {
      this._callMirror(mirror, "resync", snapshot);
    }
  }

  // ── Internal ──────────────────────────────────────────────────────────────

  /**
   * Apply one transition at instant `at`: counters, next phase and its end
   * instant are all updated before any event goes out.
   */
  private _advance(session: ActiveSession, at: number): void {
    const step = nextStep(session.position, session.configuration);
    if (step.completesBrisk) session.completedBriskIntervals++;
    if (step.completesEasy) session.completedSlowIntervals++;

    if (!step.to) {
      this._completeNaturally(session, at);
      return;
    }

    session.position = step.to;
    session.phaseEndTime = SessionClock.endTime(
      at,
      phaseDuration(session.configuration, step.to.phase),
    );

    const snapshot = this._commit(session, at);
    if (step.completesBrisk) {
      this.emit("intervalComplete", step.from.interval);
    }
    this.emit("phaseChange", {
      phase: step.to.phase,
      previous: step.from.phase,
      interval: step.to.interval,
      at,
      snapshot,
    });
  }

  private _completeNaturally(session: ActiveSession, at: number): void {
    const previous = session.position.phase;
    const totalElapsedTime = this._elapsed(session, at);
    const summary = buildSessionSummary(
      {
        sessionId: session.id,
        configuration: session.configuration,
        completedBriskIntervals: session.completedBriskIntervals,
        completedSlowIntervals: session.completedSlowIntervals,
        totalElapsedTime,
        startTime: session.startTime,
        endTime: at,
        completedSuccessfully: true,
      },
      this._readMetrics(),
    );

    const snapshot = this._close(session, PhaseKind.COMPLETED, totalElapsedTime, at, summary);
    this.emit("phaseChange", {
      phase: PhaseKind.COMPLETED,
      previous,
      interval: session.position.interval,
      at,
      snapshot,
    });
    this.emit("completed", summary);
  }

  /** Mark the session inactive and keep its final snapshot for queries. */
  private _close(
    session: ActiveSession,
    phase: PhaseKind.COMPLETED | PhaseKind.IDLE,
    totalElapsedTime: number,
    at: number,
    summary: SessionSummary,
  ): SessionStateSnapshot {
    this._session = null;
    this._lastSummary = summary;
    this._revision++;

    const snapshot: SessionStateSnapshot = Object.freeze({
      sessionId: session.id,
      revision: this._revision,
      phase,
      activePhase: null,
      currentIntervalIndex: session.position.interval,
      totalIntervals: session.configuration.totalIntervals,
      completedBriskIntervals: session.completedBriskIntervals,
      completedSlowIntervals: session.completedSlowIntervals,
      timing: Object.freeze({ kind: "untimed" as const }),
      totalElapsedTime,
      isActive: false,
      isPaused: false,
      startTime: session.startTime,
      capturedAt: at,
    });

    this._final = snapshot;
    this._pushMirrors(snapshot);
    return snapshot;
  }

  /** Record a state change: bump the revision and push to mirrors. */
  private _commit(session: ActiveSession, at: number): SessionStateSnapshot {
    this._revision++;
    const snapshot = this._snapshot(session, at);
    this._pushMirrors(snapshot);
    return snapshot;
  }

  private _snapshot(session: ActiveSession, now: number): SessionStateSnapshot {
    const timing =
      session.isPaused
        ? { kind: "paused" as const, remainingAtPause: session.remainingAtPause ?? 0 }
        : session.phaseEndTime !== null
          ? { kind: "running" as const, phaseEndTime: session.phaseEndTime }
          : { kind: "untimed" as const };

    return Object.freeze({
      sessionId: session.id,
      revision: this._revision,
      phase: session.isPaused ? PhaseKind.PAUSED : session.position.phase,
      activePhase: session.position.phase,
      currentIntervalIndex: session.position.interval,
      totalIntervals: session.configuration.totalIntervals,
      completedBriskIntervals: session.completedBriskIntervals,
      completedSlowIntervals: session.completedSlowIntervals,
      timing: Object.freeze(timing),
      totalElapsedTime: this._elapsed(session, now),
      isActive: true,
      isPaused: session.isPaused,
      startTime: session.startTime,
      capturedAt: now,
    });
  }

  private _elapsed(session: ActiveSession, now: number): number {
    if (session.runningSince === null) return session.elapsedBeforeRun;
    return session.elapsedBeforeRun + SessionClock.elapsedBetween(session.runningSince, now);
  }

  private _readMetrics(): ActivityMetrics {
    try {
      return this._metrics();
    } catch (err) {
      console.error("PhaseScheduler: metrics source threw, summarizing without metrics", err);
      return EMPTY_METRICS;
    }
  }

  private _pushMirrors(snapshot: SessionStateSnapshot): void {
    for (const mirror of [...this._mirrors]) {
      this._callMirror(mirror, "push", snapshot);
    }
  }

  private _callMirror(
    mirror: CompanionMirror,
    method: "push" | "resync",
    snapshot: SessionStateSnapshot,
  ): void {
    try {
      mirror[method](snapshot);
    } catch (err) {
      console.error(`PhaseScheduler: mirror ${method} failed`, err);
    }
  }
}
