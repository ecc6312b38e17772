/**
 * Wire protocol between the authoritative device (running the scheduler)
 * and a companion that mirrors it.
 */
import type { ClockFn, PhaseKind, RemoteCommand, TimedPhaseKind } from "@interval-walk/core";

export const PROTOCOL_VERSION = 1;

/**
 * Self-describing session state as sent over the wire.
 *
 * Carries the absolute phase end instant rather than "seconds remaining",
 * so a companion with a different clock offset still counts down to the
 * same moment.
 */
export interface MirrorSnapshot {
  readonly sessionId: string;
  readonly revision: number;
  readonly phase: PhaseKind;
  readonly activePhase: TimedPhaseKind | null;
  readonly currentIntervalIndex: number;
  readonly totalIntervals: number;
  readonly completedBriskIntervals: number;
  readonly completedSlowIntervals: number;
  /** Absolute epoch ms at which the running phase ends; null unless running. */
  readonly phaseEndTime: number | null;
  /** Frozen remaining time; null unless paused. */
  readonly remainingAtPause: number | null;
  readonly isPaused: boolean;
  readonly isActive: boolean;
}

interface MessageBase {
  readonly version: typeof PROTOCOL_VERSION;
  /** Identifies the sender so a transport that echoes can be filtered. */
  readonly sourceId: string;
  readonly sentAt: number;
}

/** Session state pushed from the authoritative side. */
export interface StateMessage extends MessageBase {
  readonly type: "state";
  /** True for a resync: apply even if the revision was already seen. */
  readonly full: boolean;
  readonly snapshot: MirrorSnapshot;
}

/** Companion asks for a full state push (e.g. after reconnecting). */
export interface RequestSyncMessage extends MessageBase {
  readonly type: "request-sync";
  readonly reason?: string;
}

/** Companion issues a session command. */
export interface CommandMessage extends MessageBase {
  readonly type: "command";
  readonly command: RemoteCommand;
}

export type MirrorMessage = StateMessage | RequestSyncMessage | CommandMessage;

export type MirrorMessageType = MirrorMessage["type"];

/**
 * Minimal duplex link to the other side. Delivery is best effort; `send`
 * may throw or reject and the caller only logs it.
 */
export interface MirrorTransport {
  send(payload: string): void | Promise<void>;
  /** Whether the other side is currently connected. */
  isReachable(): boolean;
  /** Register a handler for incoming payloads. Returns an unsubscribe function. */
  onReceive(handler: (payload: string) => void): () => void;
}

/** Options shared by everything that writes to a transport. */
export interface EndpointConfig {
  /** Sender id stamped on outgoing messages. Defaults to a random UUID. */
  readonly sourceId?: string;
  /** Override the clock for deterministic testing. Defaults to Date.now. */
  readonly clock?: ClockFn;
}
