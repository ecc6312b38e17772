import type { PhaseScheduler } from "@interval-walk/core";

import { decodeMessage } from "./codec.js";
import { TransportMirror } from "./mirror.js";
import type { EndpointConfig, MirrorMessage, MirrorTransport } from "./types.js";

/**
 * Authoritative-side receiver: turns companion messages into scheduler calls.
 *
 * `command` messages go through the scheduler's remote-command path,
 * `request-sync` triggers a full push to every mirror, and `state` messages
 * (echoes of our own pushes) are ignored.
 */
export class CompanionCommandRouter {
  private _detach: (() => void) | null = null;

  constructor(
    private readonly scheduler: PhaseScheduler,
    private readonly transport: MirrorTransport,
  ) {}

  get attached(): boolean {
    return this._detach !== null;
  }

  attach(): void {
    if (this._detach) return;
    this._detach = this.transport.onReceive((payload) => this.receive(payload));
  }

  detach(): void {
    this._detach?.();
    this._detach = null;
  }

  receive(payload: string): void {
    let message: MirrorMessage;
    try {
      message = decodeMessage(payload);
    } catch (err) {
      console.error("CompanionCommandRouter: ignoring malformed message", err);
      return;
    }

    switch (message.type) {
      case "command":
        this.scheduler.applyRemoteCommand(message.command);
        break;
      case "request-sync":
        this.scheduler.resyncMirrors();
        break;
      case "state":
        break;
    }
  }
}

/** Handle returned by {@link connectCompanion}. */
export interface CompanionConnection {
  readonly mirror: TransportMirror;
  readonly router: CompanionCommandRouter;
  /** Stop mirroring and stop listening for commands. */
  disconnect(): void;
}

/**
 * Wire a scheduler to a companion over one transport: a TransportMirror for
 * outgoing state (resynced immediately) and a router for incoming commands.
 */
export function connectCompanion(
  scheduler: PhaseScheduler,
  transport: MirrorTransport,
  config: EndpointConfig = {},
): CompanionConnection {
  const mirror = new TransportMirror(transport, config);
  const router = new CompanionCommandRouter(scheduler, transport);
  router.attach();
  const removeMirror = scheduler.addMirror(mirror);

  return {
    mirror,
    router,
    disconnect: () => {
      removeMirror();
      router.detach();
    },
  };
}
