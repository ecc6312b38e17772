import type { SessionStateSnapshot } from "../session/state.js";

/**
 * Outbound view of the session for a paired device or process.
 *
 * The scheduler calls `push` after every state change and `resync` when a
 * full state push is requested (typically after the companion reconnects).
 * Neither call is awaited; implementations must return quickly and must
 * tolerate receiving the same snapshot more than once.
 */
export interface CompanionMirror {
  push(snapshot: SessionStateSnapshot): void;
  resync(snapshot: SessionStateSnapshot): void;
}

/** Commands a companion may send back to the authoritative scheduler. */
export type RemoteCommand = "pause" | "resume" | "skip" | "end";

export const REMOTE_COMMANDS: readonly RemoteCommand[] = ["pause", "resume", "skip", "end"];
