import type { PhaseScheduler } from "../session/scheduler.js";

type TimerHandle = ReturnType<typeof setInterval>;

export interface IntervalTickerConfig {
  /** Tick period in ms. Defaults to 1000. */
  readonly intervalMs?: number;
  /** Override for testing or for hosts with their own timer APIs. */
  readonly setInterval?: (callback: () => void, ms: number) => TimerHandle;
  readonly clearInterval?: (handle: TimerHandle) => void;
}

const DEFAULT_INTERVAL_MS = 1_000;

/**
 * Host-side periodic driver for a PhaseScheduler.
 *
 * The scheduler itself never schedules anything; this class is the
 * "once per second" tick source a host would otherwise write by hand.
 * A missed tick is replayed by the next one, so after the host returns
 * from the background it only needs `catchUp()`.
 *
 * The ticker stops on its own when the session completes or is ended.
 */
export class IntervalTicker {
  private _handle: TimerHandle | null = null;
  private readonly _unsubscribe: Array<() => void> = [];

  private readonly _intervalMs: number;
  private readonly _setInterval: (callback: () => void, ms: number) => TimerHandle;
  private readonly _clearInterval: (handle: TimerHandle) => void;

  constructor(
    private readonly scheduler: PhaseScheduler,
    config: IntervalTickerConfig = {},
  ) {
    this._intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
    this._setInterval = config.setInterval ?? ((cb, ms) => setInterval(cb, ms));
    this._clearInterval = config.clearInterval ?? ((h) => clearInterval(h));
  }

  get running(): boolean {
    return this._handle !== null;
  }

  /** Begin ticking. No-op if already running. */
  start(): void {
    if (this._handle !== null) return;

    this._unsubscribe.push(
      this.scheduler.on("completed", () => this.stop()),
      this.scheduler.on("ended", () => this.stop()),
    );
    this._handle = this._setInterval(() => {
      this.scheduler.tick();
    }, this._intervalMs);
  }

  /** Tick once right away, e.g. when the app returns to the foreground. */
  catchUp(): void {
    this.scheduler.tick();
  }

  stop(): void {
    if (this._handle !== null) {
      this._clearInterval(this._handle);
      this._handle = null;
    }
    for (const off of this._unsubscribe.splice(0)) {
      off();
    }
  }
}
