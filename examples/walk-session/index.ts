/**
 * Walk session demo.
 *
 * Runs a seconds-long interval walk in real time. A paired "watch" follows
 * along over an in-memory link and sends a pause and a resume of its own.
 * Halfway through, the host is "suspended" for three seconds and catches
 * up on return.
 *
 * Run:
 *   npx tsx examples/walk-session/index.ts
 *
 * What it demonstrates:
 * 1. PhaseScheduler driven by IntervalTicker
 * 2. Catching up after the host was suspended
 * 3. Mirroring to a companion and taking commands back from it
 * 4. Reminder planning from the remaining timeline
 */

import { IntervalTicker, PhaseScheduler, createConfiguration } from "@interval-walk/core";
import type { ActivityMetrics } from "@interval-walk/core";
import { MirrorFollower, connectCompanion } from "@interval-walk/companion";
import type { MirrorTransport } from "@interval-walk/companion";

import { WalkCoach } from "./coach.js";

// --- Loopback link between phone and watch ---

function createLink(): [MirrorTransport, MirrorTransport] {
  const inboxes = [new Set<(payload: string) => void>(), new Set<(payload: string) => void>()];
  const endpoint = (own: number, peer: number): MirrorTransport => ({
    send: (payload) => {
      for (const handler of inboxes[peer] ?? []) handler(payload);
    },
    isReachable: () => true,
    onReceive: (handler) => {
      inboxes[own]?.add(handler);
      return () => {
        inboxes[own]?.delete(handler);
      };
    },
  });
  return [endpoint(0, 1), endpoint(1, 0)];
}

// --- Session ---

const startedAt = Date.now();

// Stand-in for the pedometer: two steps per second of walking.
const metrics = (): ActivityMetrics => {
  const steps = Math.round((Date.now() - startedAt) / 500);
  return {
    steps,
    distance: steps * 0.75,
    averageHeartRate: 115,
    activeCalories: Math.round(steps * 0.04),
  };
};

const scheduler = new PhaseScheduler({ metrics });
const ticker = new IntervalTicker(scheduler, { intervalMs: 250 });
const coach = new WalkCoach(scheduler, startedAt);
coach.attach();

const [phone, watch] = createLink();
const follower = new MirrorFollower(watch);
follower.attach();
follower.on("update", (state) => {
  if (state.isPaused) console.log("    watch shows: paused");
});
connectCompanion(scheduler, phone);

const config = createConfiguration({
  briskDuration: 3_000,
  easyDuration: 2_000,
  totalIntervals: 2,
  enableCooldown: true,
  cooldownDuration: 2_000,
});
scheduler.start(config, startedAt);
ticker.start();

console.log("Reminders planned at start:");
for (const reminder of coach.planReminders(scheduler.remainingTimeline(), config.totalIntervals)) {
  console.log(`  +${Math.round((reminder.at - startedAt) / 1000)}s  ${reminder.body}`);
}
console.log();

// The watch pauses for a water break, then resumes.
setTimeout(() => follower.sendCommand("pause"), 4_000);
setTimeout(() => follower.sendCommand("resume"), 6_000);

// The phone sleeps for three seconds; one tick replays every missed boundary.
setTimeout(() => {
  ticker.stop();
  console.log("    (host suspended)");
}, 8_000);
setTimeout(() => {
  console.log("    (host back in the foreground)");
  ticker.catchUp();
  ticker.start();
}, 11_000);

scheduler.once("completed", () => {
  coach.detach();
  console.log(`Watch final state: ${follower.state?.phase ?? "unknown"}`);
});
