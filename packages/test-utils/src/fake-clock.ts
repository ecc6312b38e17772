import type { ClockFn } from "@interval-walk/core";

/**
 * Manually driven clock. Pass `clock.read` wherever a `ClockFn` is taken.
 *
 * @example
 * ```ts
 * const clock = new FakeClock(1_000_000);
 * const scheduler = new PhaseScheduler({ clock: clock.read });
 * clock.advance(60_000);
 * scheduler.tick();
 * ```
 */
export class FakeClock {
  constructor(private _now = 0) {}

  get now(): number {
    return this._now;
  }

  readonly read: ClockFn = () => this._now;

  /** Move forward by `ms` and return the new time. */
  advance(ms: number): number {
    this._now += ms;
    return this._now;
  }

  set(now: number): void {
    this._now = now;
  }
}
