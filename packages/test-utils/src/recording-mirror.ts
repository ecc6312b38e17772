import { vi } from "vitest";
import type { Mock } from "vitest";

import type { CompanionMirror, SessionStateSnapshot } from "@interval-walk/core";

/**
 * CompanionMirror that records every snapshot it receives.
 *
 * `push` and `resync` are vitest spies, so call counts and arguments can be
 * asserted directly; `received` keeps both kinds in arrival order.
 */
export class RecordingMirror implements CompanionMirror {
  readonly received: Array<{ kind: "push" | "resync"; snapshot: SessionStateSnapshot }> = [];

  push: Mock<(snapshot: SessionStateSnapshot) => void> = vi.fn(
    (snapshot: SessionStateSnapshot) => {
      this.received.push({ kind: "push", snapshot });
    },
  );

  resync: Mock<(snapshot: SessionStateSnapshot) => void> = vi.fn(
    (snapshot: SessionStateSnapshot) => {
      this.received.push({ kind: "resync", snapshot });
    },
  );

  /** Most recent snapshot of either kind, or undefined. */
  get last(): SessionStateSnapshot | undefined {
    return this.received.at(-1)?.snapshot;
  }

  /** Revisions of every pushed snapshot, in order. */
  pushedRevisions(): number[] {
    return this.received.filter((r) => r.kind === "push").map((r) => r.snapshot.revision);
  }

  reset(): void {
    this.received.length = 0;
    this.push.mockClear();
    this.resync.mockClear();
  }
}
