import type {
  PhaseChangeEvent,
  PhaseScheduler,
  SessionStateSnapshot,
  SessionSummary,
} from "@interval-walk/core";

/** Everything a scheduler emitted, grouped by event and as one ordered log. */
export interface SessionRecording {
  readonly phaseChanges: PhaseChangeEvent[];
  readonly intervalsCompleted: number[];
  readonly completed: SessionSummary[];
  readonly ended: SessionSummary[];
  readonly paused: SessionStateSnapshot[];
  readonly resumed: SessionStateSnapshot[];
  readonly errors: Error[];
  /** e.g. `["phaseChange:BRISK", "intervalComplete:1", "phaseChange:EASY"]` */
  readonly log: string[];
  /** Unsubscribe from every event. */
  stop(): void;
}

/** Subscribe to every scheduler event and record it. */
export function recordSession(scheduler: PhaseScheduler): SessionRecording {
  const recording: SessionRecording = {
    phaseChanges: [],
    intervalsCompleted: [],
    completed: [],
    ended: [],
    paused: [],
    resumed: [],
    errors: [],
    log: [],
    stop: () => {
      for (const off of offs) off();
    },
  };

  const offs = [
    scheduler.on("phaseChange", (event) => {
      recording.phaseChanges.push(event);
      recording.log.push(`phaseChange:${event.phase}`);
    }),
    scheduler.on("intervalComplete", (interval) => {
      recording.intervalsCompleted.push(interval);
      recording.log.push(`intervalComplete:${interval}`);
    }),
    scheduler.on("completed", (summary) => {
      recording.completed.push(summary);
      recording.log.push("completed");
    }),
    scheduler.on("ended", (summary) => {
      recording.ended.push(summary);
      recording.log.push("ended");
    }),
    scheduler.on("paused", (snapshot) => {
      recording.paused.push(snapshot);
      recording.log.push("paused");
    }),
    scheduler.on("resumed", (snapshot) => {
      recording.resumed.push(snapshot);
      recording.log.push("resumed");
    }),
    scheduler.on("error", (err) => {
      recording.errors.push(err);
      recording.log.push("error");
    }),
  ];

  return recording;
}
