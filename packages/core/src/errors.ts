/**
 * Base error for all interval-walk failures.
 */
export class IntervalWalkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IntervalWalkError";
  }
}

/** A single violated configuration invariant. */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Thrown by `PhaseScheduler.start()` and `createConfiguration()` when a
 * session configuration breaks one or more invariants. All issues are
 * reported at once.
 */
export class InvalidConfigurationError extends IntervalWalkError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const detail = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    super(`Invalid session configuration (${detail})`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

/**
 * Thrown by `PhaseScheduler.start()` while another session is active.
 * Call `end()` first.
 */
export class AlreadyActiveError extends IntervalWalkError {
  readonly activeSessionId: string;

  constructor(activeSessionId: string) {
    super(`Session "${activeSessionId}" is already active; end it before starting another`);
    this.name = "AlreadyActiveError";
    this.activeSessionId = activeSessionId;
  }
}
