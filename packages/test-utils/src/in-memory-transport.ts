/**
 * In-process duplex link for companion tests.
 *
 * Two linked endpoints deliver to each other synchronously. Either side can
 * be made unreachable, and a single send can be made to fail, to exercise
 * reconnect and resync paths without a real connection.
 *
 * @example
 * ```ts
 * const [phone, watch] = createLinkedTransports();
 * connectCompanion(scheduler, phone);
 * const follower = new MirrorFollower(watch);
 * follower.attach();
 * ```
 */
import { vi } from "vitest";
import type { Mock } from "vitest";

type FailureMode = "throw" | "reject";

export class InMemoryTransport {
  /** Every payload handed to `send`, including ones that failed. */
  readonly sent: string[] = [];

  private _peer: InMemoryTransport | null = null;
  private _reachable = true;
  private _nextFailure: FailureMode | null = null;
  private readonly _handlers = new Set<(payload: string) => void>();

  send: Mock<(payload: string) => void | Promise<void>> = vi.fn<
    (payload: string) => void | Promise<void>
  >((payload) => {
    this.sent.push(payload);

    const failure = this._nextFailure;
    this._nextFailure = null;
    if (failure === "throw") {
      throw new Error("InMemoryTransport: send failed");
    }
    if (failure === "reject") {
      return Promise.reject(new Error("InMemoryTransport: send failed"));
    }
    if (!this.isReachable()) {
      throw new Error("InMemoryTransport: peer unreachable");
    }
    this._peer?.deliver(payload);
  });

  /** Reachable only while both ends are reachable and linked. */
  isReachable(): boolean {
    return this._reachable && this._peer !== null && this._peer._reachable;
  }

  onReceive(handler: (payload: string) => void): () => void {
    this._handlers.add(handler);
    return () => {
      this._handlers.delete(handler);
    };
  }

  /** Simulate this endpoint going out of (or back into) range. */
  setReachable(reachable: boolean): void {
    this._reachable = reachable;
  }

  /** Make the next `send` fail, either by throwing or by rejecting. */
  failNext(mode: FailureMode = "throw"): void {
    this._nextFailure = mode;
  }

  /** Feed a payload to this endpoint's handlers as if the peer sent it. */
  deliver(payload: string): void {
    for (const handler of [...this._handlers]) {
      handler(payload);
    }
  }

  handlerCount(): number {
    return this._handlers.size;
  }

  /** Decoded JSON of every sent payload, for assertions. */
  sentMessages(): unknown[] {
    return this.sent.map((payload) => JSON.parse(payload));
  }

  link(peer: InMemoryTransport): void {
    this._peer = peer;
    peer._peer = this;
  }
}

/** Create two endpoints wired to each other. */
export function createLinkedTransports(): [InMemoryTransport, InMemoryTransport] {
  const a = new InMemoryTransport();
  const b = new InMemoryTransport();
  a.link(b);
  return [a, b];
}
