import { randomUUID } from "node:crypto";

import { EventNotifier, SessionClock, systemClock } from "@interval-walk/core";
import type { ClockFn, RemoteCommand } from "@interval-walk/core";

import { decodeMessage } from "./codec.js";
import { sendBestEffort } from "./send.js";
import { PROTOCOL_VERSION } from "./types.js";
import type {
  EndpointConfig,
  MirrorMessage,
  MirrorSnapshot,
  MirrorTransport,
  RequestSyncMessage,
  StateMessage,
} from "./types.js";

export type FollowerEvents = {
  /** A newer state was applied. `full` is true when it came from a resync. */
  update: (snapshot: MirrorSnapshot, full: boolean) => void;
  error: (err: Error) => void;
};

/**
 * Companion-side replica of the authoritative session.
 *
 * Applies incoming state messages in revision order and drops stale or
 * duplicate ones. Revisions are compared across sessions, so a late push
 * from a previous session never replaces a newer one. A `full` resync is
 * always applied, which also covers a restarted scheduler whose revisions
 * start over. The countdown is derived from the absolute phase end instant,
 * so `remaining()` stays correct between messages.
 */
export class MirrorFollower extends EventNotifier<FollowerEvents> {
  readonly sourceId: string;

  private _state: MirrorSnapshot | null = null;
  private _detach: (() => void) | null = null;
  private readonly _clock: ClockFn;

  constructor(
    private readonly transport: MirrorTransport,
    config: EndpointConfig = {},
  ) {
    super();
    this.sourceId = config.sourceId ?? randomUUID();
    this._clock = config.clock ?? systemClock;
  }

  /** Latest applied state, or null before the first message. */
  get state(): MirrorSnapshot | null {
    return this._state;
  }

  get attached(): boolean {
    return this._detach !== null;
  }

  /** Start listening on the transport. No-op if already attached. */
  attach(): void {
    if (this._detach) return;
    this._detach = this.transport.onReceive((payload) => this.receive(payload));
  }

  detach(): void {
    this._detach?.();
    this._detach = null;
  }

  /** Time left in the mirrored phase as seen at `now`. */
  remaining(now: number = this._clock()): number {
    const state = this._state;
    if (!state) return 0;
    if (state.phaseEndTime !== null) return SessionClock.remaining(state.phaseEndTime, now);
    return state.remainingAtPause ?? 0;
  }

  /** Ask the authoritative side for a full state push. */
  requestResync(reason?: string): void {
    const base: RequestSyncMessage = {
      type: "request-sync",
      version: PROTOCOL_VERSION,
      sourceId: this.sourceId,
      sentAt: this._clock(),
    };
    sendBestEffort(
      this.transport,
      reason === undefined ? base : { ...base, reason },
      "MirrorFollower",
    );
  }

  /** Forward a session command to the authoritative side. */
  sendCommand(command: RemoteCommand): void {
    sendBestEffort(
      this.transport,
      {
        type: "command",
        version: PROTOCOL_VERSION,
        sourceId: this.sourceId,
        sentAt: this._clock(),
        command,
      },
      "MirrorFollower",
    );
  }

  /** Handle one raw payload. Exposed for hosts that do their own receiving. */
  receive(payload: string): void {
    let message: MirrorMessage;
    try {
      message = decodeMessage(payload);
    } catch (err) {
      console.error("MirrorFollower: ignoring malformed message", err);
      return;
    }

    if (message.sourceId === this.sourceId || message.type !== "state") return;
    this.apply(message);
  }

  private apply(message: StateMessage): void {
    const current = this._state;
    const incoming = message.snapshot;

    if (current && !message.full && incoming.revision <= current.revision) return;

    this._state = incoming;
    this.emit("update", incoming, message.full);
  }
}
