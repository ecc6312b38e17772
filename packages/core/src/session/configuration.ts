import { InvalidConfigurationError } from "../errors.js";
import type { ValidationIssue } from "../errors.js";
import { PhaseKind } from "./phase.js";
import type { TimedPhaseKind } from "./phase.js";

/**
 * Immutable description of one interval walk. Durations are milliseconds.
 *
 * Warmup and cooldown durations are only read when their enable flag is set.
 */
export interface SessionConfiguration {
  readonly briskDuration: number;
  readonly easyDuration: number;
  readonly warmupDuration: number;
  readonly cooldownDuration: number;
  /** Number of brisk + easy cycles. Integer ≥ 1. */
  readonly totalIntervals: number;
  readonly enableWarmup: boolean;
  readonly enableCooldown: boolean;
}

/** A named, built-in configuration. */
export interface SessionPreset {
  readonly id: string;
  readonly name: string;
  readonly configuration: SessionConfiguration;
}

const MINUTE = 60_000;

/** 3 min brisk / 3 min easy × 5, no warmup or cooldown. */
export const STANDARD_CONFIGURATION: SessionConfiguration = Object.freeze({
  briskDuration: 3 * MINUTE,
  easyDuration: 3 * MINUTE,
  warmupDuration: 0,
  cooldownDuration: 0,
  totalIntervals: 5,
  enableWarmup: false,
  enableCooldown: false,
});

export const SESSION_PRESETS: readonly SessionPreset[] = [
  {
    id: "standard",
    name: "Standard",
    configuration: STANDARD_CONFIGURATION,
  },
  {
    id: "standard_with_warmup",
    name: "Standard with warmup",
    configuration: Object.freeze({
      ...STANDARD_CONFIGURATION,
      warmupDuration: 2 * MINUTE,
      cooldownDuration: 2 * MINUTE,
      enableWarmup: true,
      enableCooldown: true,
    }),
  },
  {
    id: "beginner",
    name: "Beginner",
    configuration: Object.freeze({
      ...STANDARD_CONFIGURATION,
      briskDuration: 1 * MINUTE,
      easyDuration: 2 * MINUTE,
    }),
  },
  {
    id: "advanced",
    name: "Advanced",
    configuration: Object.freeze({
      ...STANDARD_CONFIGURATION,
      briskDuration: 4 * MINUTE,
      easyDuration: 2 * MINUTE,
      totalIntervals: 6,
    }),
  },
];

/** Look up a built-in preset. Returns undefined for unknown ids. */
export function presetById(id: string): SessionPreset | undefined {
  return SESSION_PRESETS.find((p) => p.id === id);
}

function isPositiveDuration(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Check every invariant of a configuration. Returns an empty array when
 * the configuration is valid.
 */
export function validateConfiguration(config: SessionConfiguration): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (!isPositiveDuration(config.briskDuration)) {
    issues.push({ field: "briskDuration", message: "Value must be greater than 0" });
  }
  if (!isPositiveDuration(config.easyDuration)) {
    issues.push({ field: "easyDuration", message: "Value must be greater than 0" });
  }
  if (config.enableWarmup && !isPositiveDuration(config.warmupDuration)) {
    issues.push({
      field: "warmupDuration",
      message: "Value must be greater than 0 when warmup is enabled",
    });
  }
  if (config.enableCooldown && !isPositiveDuration(config.cooldownDuration)) {
    issues.push({
      field: "cooldownDuration",
      message: "Value must be greater than 0 when cooldown is enabled",
    });
  }
  if (!Number.isInteger(config.totalIntervals) || config.totalIntervals < 1) {
    issues.push({ field: "totalIntervals", message: "Value must be an integer >= 1" });
  }

  return issues;
}

/** Throw InvalidConfigurationError if the configuration has any issue. */
export function assertValidConfiguration(config: SessionConfiguration): void {
  const issues = validateConfiguration(config);
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
}

/**
 * Build a frozen configuration by merging overrides over the standard one.
 *
 * @example
 * ```ts
 * const config = createConfiguration({ totalIntervals: 3, enableWarmup: true, warmupDuration: 120_000 });
 * ```
 *
 * @throws InvalidConfigurationError listing every violated invariant.
 */
export function createConfiguration(
  overrides: Partial<SessionConfiguration> = {},
): SessionConfiguration {
  const config: SessionConfiguration = { ...STANDARD_CONFIGURATION, ...overrides };
  assertValidConfiguration(config);
  return Object.freeze(config);
}

/** Duration of a timed phase under this configuration. */
export function phaseDuration(config: SessionConfiguration, phase: TimedPhaseKind): number {
  switch (phase) {
    case PhaseKind.WARMUP:
      return config.warmupDuration;
    case PhaseKind.BRISK:
      return config.briskDuration;
    case PhaseKind.EASY:
      return config.easyDuration;
    case PhaseKind.COOLDOWN:
      return config.cooldownDuration;
  }
}

/** Sum of every timed phase the session will run. */
export function totalPlannedDuration(config: SessionConfiguration): number {
  const warmup = config.enableWarmup ? config.warmupDuration : 0;
  const cooldown = config.enableCooldown ? config.cooldownDuration : 0;
  return warmup + config.totalIntervals * (config.briskDuration + config.easyDuration) + cooldown;
}
