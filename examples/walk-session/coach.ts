/**
 * WalkCoach: a console host for a PhaseScheduler.
 *
 * Shows the pieces a real app wires up around the engine:
 * - announcing each boundary with its cue text
 * - planning reminder times from the remaining timeline
 * - printing the summary when the walk is over
 */

import {
  PHASE_INFO,
  PhaseKind,
  formatDuration,
  completionRatio,
  remainingOf,
  transitionCue,
} from "@interval-walk/core";
import type {
  PhaseChangeEvent,
  PhaseScheduler,
  SessionSummary,
  TimelineEntry,
} from "@interval-walk/core";

/** A reminder a mobile host would hand to its local notification center. */
export interface PlannedReminder {
  readonly at: number;
  readonly body: string;
}

export class WalkCoach {
  private readonly _detach: Array<() => void> = [];

  constructor(
    private readonly scheduler: PhaseScheduler,
    private readonly startedAt: number,
  ) {}

  attach(): void {
    this._detach.push(
      this.scheduler.attachObserver({
        onPhaseChange: (_phase, event) => this.announce(event),
        onCompleted: (summary) => this.report(summary),
      }),
      this.scheduler.on("intervalComplete", (interval) => {
        console.log(`    interval ${interval} brisk segment done`);
      }),
      this.scheduler.on("paused", (snapshot) => {
        console.log(
          `[${this.clock(snapshot.capturedAt)}] paused with ${formatDuration(remainingOf(snapshot, snapshot.capturedAt))} left`,
        );
      }),
      this.scheduler.on("resumed", (snapshot) => {
        console.log(`[${this.clock(snapshot.capturedAt)}] resumed`);
      }),
      this.scheduler.on("ended", (summary) => this.report(summary)),
    );
  }

  detach(): void {
    for (const off of this._detach.splice(0)) off();
  }

  /** One reminder per boundary still ahead, announcing the phase that follows it. */
  planReminders(timeline: readonly TimelineEntry[], totalIntervals: number): PlannedReminder[] {
    const reminders: PlannedReminder[] = [];
    timeline.forEach((entry, i) => {
      const next = timeline[i + 1];
      reminders.push({
        at: entry.endsAt,
        body: next
          ? transitionCue(next.phase, next.interval, totalIntervals)
          : transitionCue(PhaseKind.COMPLETED, entry.interval, totalIntervals),
      });
    });
    return reminders;
  }

  private announce(event: PhaseChangeEvent): void {
    const info = PHASE_INFO[event.phase];
    const total = event.snapshot.totalIntervals;
    const interval = event.phase === PhaseKind.BRISK || event.phase === PhaseKind.EASY
      ? ` ${event.interval}/${total}`
      : "";
    console.log(`[${this.clock(event.at)}] ${info.displayName}${interval}: ${info.instruction}`);
  }

  private report(summary: SessionSummary): void {
    console.log();
    console.log(summary.completedSuccessfully ? "Walk complete." : "Walk ended early.");
    console.log(`  Active time:     ${formatDuration(summary.totalDuration)}`);
    console.log(`  Brisk intervals: ${summary.briskIntervals}/${summary.totalIntervals}`);
    console.log(`  Easy intervals:  ${summary.slowIntervals}`);
    console.log(`  Completion:      ${Math.round(completionRatio(summary) * 100)}%`);
    console.log(`  Steps:           ${summary.steps}`);
  }

  /** Session-relative time for log lines. */
  private clock(at: number): string {
    return formatDuration(at - this.startedAt);
  }
}
