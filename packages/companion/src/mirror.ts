import { randomUUID } from "node:crypto";

import { systemClock } from "@interval-walk/core";
import type { ClockFn, CompanionMirror, SessionStateSnapshot } from "@interval-walk/core";

import { toMirrorSnapshot } from "./codec.js";
import { sendBestEffort } from "./send.js";
import { PROTOCOL_VERSION } from "./types.js";
import type { EndpointConfig, MirrorTransport } from "./types.js";

/**
 * CompanionMirror that forwards every state change over a transport.
 *
 * Pushes are deduplicated by `(sessionId, revision)`. While the companion is
 * unreachable nothing is sent; the mirror remembers that it fell behind and
 * marks the next message as `full`, so the follower applies it even if it
 * has already seen that revision from an earlier attempt.
 */
export class TransportMirror implements CompanionMirror {
  readonly sourceId: string;

  private _lastSessionId: string | null = null;
  private _lastRevision = -1;
  private _dirty = false;
  private readonly _clock: ClockFn;

  constructor(
    private readonly transport: MirrorTransport,
    config: EndpointConfig = {},
  ) {
    this.sourceId = config.sourceId ?? randomUUID();
    this._clock = config.clock ?? systemClock;
  }

  /** True when a push was dropped or failed and the next one goes out full. */
  get needsResync(): boolean {
    return this._dirty;
  }

  push(snapshot: SessionStateSnapshot): void {
    if (
      snapshot.sessionId === this._lastSessionId &&
      snapshot.revision <= this._lastRevision
    ) {
      return;
    }
    this._send(snapshot, this._dirty);
  }

  resync(snapshot: SessionStateSnapshot): void {
    this._send(snapshot, true);
  }

  private _send(snapshot: SessionStateSnapshot, full: boolean): void {
    if (!this.transport.isReachable()) {
      this._dirty = true;
      return;
    }

    this._lastSessionId = snapshot.sessionId;
    this._lastRevision = snapshot.revision;
    this._dirty = false;

    sendBestEffort(
      this.transport,
      {
        type: "state",
        version: PROTOCOL_VERSION,
        sourceId: this.sourceId,
        sentAt: this._clock(),
        full,
        snapshot: toMirrorSnapshot(snapshot),
      },
      "TransportMirror",
      () => {
        this._dirty = true;
      },
    );
  }
}
