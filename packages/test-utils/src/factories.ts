/**
 * Factory functions for creating test fixtures.
 *
 * Every factory produces a valid value with small, round defaults. Override
 * any field by passing a partial object.
 */
import { createConfiguration } from "@interval-walk/core";
import type { ActivityMetrics, SessionConfiguration } from "@interval-walk/core";

let _idCounter = 0;

/** Reset the auto-incrementing ID counter. Call in beforeEach if needed. */
export function resetIdCounter(): void {
  _idCounter = 0;
}

/**
 * Session id generator for `PhaseSchedulerConfig.idFactory`.
 * Produces `session-1`, `session-2`, ... (shared counter across factories).
 */
export function sequentialIds(prefix = "session"): () => string {
  return () => `${prefix}-${++_idCounter}`;
}

/**
 * Create a test configuration: 1 min brisk / 1 min easy × 2, no warmup or
 * cooldown. Validated like any other configuration.
 *
 * @example
 * ```ts
 * const config = createTestConfiguration(); // 4 phases, 240s total
 * const long = createTestConfiguration({ totalIntervals: 5, enableCooldown: true, cooldownDuration: 30_000 });
 * ```
 */
export function createTestConfiguration(
  overrides: Partial<SessionConfiguration> = {},
): SessionConfiguration {
  return createConfiguration({
    briskDuration: 60_000,
    easyDuration: 60_000,
    totalIntervals: 2,
    ...overrides,
  });
}

/** Create activity metrics with non-zero defaults. */
export function createMetrics(overrides: Partial<ActivityMetrics> = {}): ActivityMetrics {
  return {
    steps: 1200,
    distance: 950,
    averageHeartRate: 112,
    activeCalories: 48,
    ...overrides,
  };
}
