/**
 * Wall-clock anchoring.
 *
 * Remaining time is stored as an absolute end instant instead of a counter,
 * so a suspended host that stops ticking still reads the correct remaining
 * time when it wakes up. All values are milliseconds.
 */

/** Returns the current epoch time in ms. */
export type ClockFn = () => number;

export const systemClock: ClockFn = () => Date.now();

export const SessionClock = {
  /** Absolute instant at which `remaining` ms will have passed. */
  endTime(now: number, remaining: number): number {
    return now + remaining;
  },

  /** Time left until `end`. Never negative. */
  remaining(end: number, now: number): number {
    return Math.max(0, end - now);
  },

  /** Time between two instants. Never negative. */
  elapsedBetween(start: number, end: number): number {
    return Math.max(0, end - start);
  },
} as const;
