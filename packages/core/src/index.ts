// @interval-walk/core
// Phase engine for interval walking sessions: configuration, wall-clock
// anchored scheduling, events, mirror contract and session summaries.

export * from "./session/index.js";

export { EventNotifier } from "./events/notifier.js";

export { REMOTE_COMMANDS } from "./mirror/types.js";
export type { CompanionMirror, RemoteCommand } from "./mirror/types.js";

export { IntervalTicker } from "./host/ticker.js";
export type { IntervalTickerConfig } from "./host/ticker.js";

export {
  IntervalWalkError,
  InvalidConfigurationError,
  AlreadyActiveError,
} from "./errors.js";
export type { ValidationIssue } from "./errors.js";
