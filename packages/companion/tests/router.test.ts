import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PhaseScheduler } from "@interval-walk/core";
import type { RemoteCommand } from "@interval-walk/core";
import {
  FakeClock,
  RecordingMirror,
  createLinkedTransports,
  createMetrics,
  createTestConfiguration,
  recordSession,
  resetIdCounter,
  sequentialIds,
} from "@interval-walk/test-utils";
import type { InMemoryTransport } from "@interval-walk/test-utils";

import {
  CompanionCommandRouter,
  PROTOCOL_VERSION,
  connectCompanion,
  encodeMessage,
  toMirrorSnapshot,
} from "../src/index.js";

function commandPayload(command: RemoteCommand): string {
  return encodeMessage({
    type: "command",
    version: PROTOCOL_VERSION,
    sourceId: "watch",
    sentAt: 0,
    command,
  });
}

describe("CompanionCommandRouter", () => {
  let clock: FakeClock;
  let phone: InMemoryTransport;
  let watch: InMemoryTransport;
  let scheduler: PhaseScheduler;
  let router: CompanionCommandRouter;

  beforeEach(() => {
    resetIdCounter();
    clock = new FakeClock(0);
    [phone, watch] = createLinkedTransports();
    scheduler = new PhaseScheduler({ clock: clock.read, idFactory: sequentialIds() });
    router = new CompanionCommandRouter(scheduler, phone);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies commands through the remote-command path", () => {
    const spy = vi.spyOn(scheduler, "applyRemoteCommand");
    router.attach();

    watch.send(commandPayload("pause"));
    watch.send(commandPayload("resume"));

    expect(spy.mock.calls).toEqual([["pause"], ["resume"]]);
  });

  it("pauses and skips a live session", () => {
    router.attach();
    scheduler.start(createTestConfiguration());

    clock.advance(10_000);
    router.receive(commandPayload("skip"));
    expect(scheduler.currentState().completedBriskIntervals).toBe(1);

    router.receive(commandPayload("end"));
    expect(scheduler.lastSummary?.totalDuration).toBe(10_000);
  });

  it("ends an early stop with the metrics source's values", () => {
    scheduler = new PhaseScheduler({
      clock: clock.read,
      idFactory: sequentialIds(),
      metrics: () => createMetrics({ steps: 640 }),
    });
    router = new CompanionCommandRouter(scheduler, phone);
    const recording = recordSession(scheduler);
    scheduler.start(createTestConfiguration());

    clock.advance(30_000);
    router.receive(commandPayload("pause"));
    router.receive(commandPayload("end"));

    expect(recording.log).toEqual(["phaseChange:BRISK", "paused", "ended"]);
    expect(recording.ended[0]).toMatchObject({
      sessionId: "session-1",
      briskIntervals: 0,
      totalDuration: 30_000,
      completedSuccessfully: false,
      steps: 640,
      distance: 950,
    });
  });

  it("completes a session whose plan ran out before an end from the watch", () => {
    scheduler = new PhaseScheduler({
      clock: clock.read,
      idFactory: sequentialIds(),
      metrics: () => createMetrics(),
    });
    router = new CompanionCommandRouter(scheduler, phone);
    const recording = recordSession(scheduler);
    scheduler.start(createTestConfiguration());

    clock.set(1_800_000);
    router.receive(commandPayload("end"));

    expect(recording.log).toEqual([
      "phaseChange:BRISK",
      "intervalComplete:1",
      "phaseChange:EASY",
      "phaseChange:BRISK",
      "intervalComplete:2",
      "phaseChange:EASY",
      "phaseChange:COMPLETED",
      "completed",
    ]);
    expect(recording.ended).toEqual([]);
    expect(recording.completed[0]).toMatchObject({
      briskIntervals: 2,
      slowIntervals: 2,
      totalDuration: 240_000,
      endTime: 240_000,
      completedSuccessfully: true,
      steps: 1200,
    });
    recording.stop();
  });

  it("resyncs mirrors on request-sync", () => {
    const mirror = new RecordingMirror();
    scheduler.addMirror(mirror);
    mirror.reset();

    router.receive(
      encodeMessage({ type: "request-sync", version: PROTOCOL_VERSION, sourceId: "watch", sentAt: 0 }),
    );

    expect(mirror.resync).toHaveBeenCalledTimes(1);
  });

  it("ignores state messages", () => {
    const command = vi.spyOn(scheduler, "applyRemoteCommand");
    const resync = vi.spyOn(scheduler, "resyncMirrors");

    router.receive(
      encodeMessage({
        type: "state",
        version: PROTOCOL_VERSION,
        sourceId: "phone",
        sentAt: 0,
        full: true,
        snapshot: toMirrorSnapshot(scheduler.currentState()),
      }),
    );

    expect(command).not.toHaveBeenCalled();
    expect(resync).not.toHaveBeenCalled();
  });

  it("logs and drops malformed payloads", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    router.receive("not json");
    expect(spy).toHaveBeenCalledWith(
      "CompanionCommandRouter: ignoring malformed message",
      expect.any(Error),
    );
  });

  it("attaches once and detaches", () => {
    router.attach();
    router.attach();
    expect(phone.handlerCount()).toBe(1);
    expect(router.attached).toBe(true);

    router.detach();
    expect(phone.handlerCount()).toBe(0);
    expect(router.attached).toBe(false);
  });
});

describe("connectCompanion", () => {
  beforeEach(() => {
    resetIdCounter();
  });

  it("mirrors state and routes commands until disconnected", () => {
    const clock = new FakeClock(0);
    const [phone, watch] = createLinkedTransports();
    const scheduler = new PhaseScheduler({ clock: clock.read, idFactory: sequentialIds() });

    const connection = connectCompanion(scheduler, phone, { sourceId: "phone", clock: clock.read });
    expect(connection.mirror.sourceId).toBe("phone");
    expect(phone.sent).toHaveLength(1);

    scheduler.start(createTestConfiguration());
    expect(phone.sent).toHaveLength(2);

    watch.send(commandPayload("pause"));
    expect(scheduler.currentState().isPaused).toBe(true);
    expect(phone.sent).toHaveLength(3);

    connection.disconnect();
    expect(phone.handlerCount()).toBe(0);

    watch.send(commandPayload("resume"));
    expect(scheduler.currentState().isPaused).toBe(true);

    scheduler.end();
    expect(phone.sent).toHaveLength(3);
  });
});
