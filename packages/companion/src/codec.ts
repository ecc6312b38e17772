import {
  PhaseKind,
  REMOTE_COMMANDS,
  TIMED_PHASES,
  phaseEndTimeOf,
} from "@interval-walk/core";
import type { RemoteCommand, SessionStateSnapshot, TimedPhaseKind } from "@interval-walk/core";

import { MirrorProtocolError } from "./errors.js";
import { PROTOCOL_VERSION } from "./types.js";
import type { MirrorMessage, MirrorSnapshot } from "./types.js";

/** Flatten a scheduler snapshot into its wire form. */
export function toMirrorSnapshot(snapshot: SessionStateSnapshot): MirrorSnapshot {
  return {
    sessionId: snapshot.sessionId,
    revision: snapshot.revision,
    phase: snapshot.phase,
    activePhase: snapshot.activePhase,
    currentIntervalIndex: snapshot.currentIntervalIndex,
    totalIntervals: snapshot.totalIntervals,
    completedBriskIntervals: snapshot.completedBriskIntervals,
    completedSlowIntervals: snapshot.completedSlowIntervals,
    phaseEndTime: phaseEndTimeOf(snapshot),
    remainingAtPause: snapshot.timing.kind === "paused" ? snapshot.timing.remainingAtPause : null,
    isPaused: snapshot.isPaused,
    isActive: snapshot.isActive,
  };
}

export function encodeMessage(message: MirrorMessage): string {
  return JSON.stringify(message);
}

/**
 * Parse and validate an incoming payload.
 *
 * @throws MirrorProtocolError on malformed JSON, an unknown message type,
 *   a protocol version other than {@link PROTOCOL_VERSION}, or a field of
 *   the wrong shape.
 */
export function decodeMessage(payload: string): MirrorMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (err) {
    throw new MirrorProtocolError("Payload is not valid JSON", { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new MirrorProtocolError("Payload must be a JSON object");
  }
  if (parsed.version !== PROTOCOL_VERSION) {
    throw new MirrorProtocolError(`Unsupported protocol version: ${String(parsed.version)}`);
  }

  const sourceId = requireString(parsed, "sourceId");
  const sentAt = requireNumber(parsed, "sentAt");

  switch (parsed.type) {
    case "state": {
      const full = parsed.full;
      if (typeof full !== "boolean") {
        throw new MirrorProtocolError('Field "full" must be a boolean');
      }
      return {
        type: "state",
        version: PROTOCOL_VERSION,
        sourceId,
        sentAt,
        full,
        snapshot: decodeSnapshot(parsed.snapshot),
      };
    }
    case "request-sync": {
      const reason = parsed.reason;
      if (reason !== undefined && typeof reason !== "string") {
        throw new MirrorProtocolError('Field "reason" must be a string');
      }
      return reason === undefined
        ? { type: "request-sync", version: PROTOCOL_VERSION, sourceId, sentAt }
        : { type: "request-sync", version: PROTOCOL_VERSION, sourceId, sentAt, reason };
    }
    case "command":
      return {
        type: "command",
        version: PROTOCOL_VERSION,
        sourceId,
        sentAt,
        command: parseCommand(parsed.command),
      };
    default:
      throw new MirrorProtocolError(`Unknown message type: ${String(parsed.type)}`);
  }
}

// ── Field validation ──────────────────────────────────────────────────────────

function decodeSnapshot(value: unknown): MirrorSnapshot {
  if (!isRecord(value)) {
    throw new MirrorProtocolError('Field "snapshot" must be an object');
  }
  return {
    sessionId: requireString(value, "sessionId"),
    revision: requireNumber(value, "revision"),
    phase: parsePhase(value.phase),
    activePhase: value.activePhase === null ? null : parseTimedPhase(value.activePhase),
    currentIntervalIndex: requireNumber(value, "currentIntervalIndex"),
    totalIntervals: requireNumber(value, "totalIntervals"),
    completedBriskIntervals: requireNumber(value, "completedBriskIntervals"),
    completedSlowIntervals: requireNumber(value, "completedSlowIntervals"),
    phaseEndTime: optionalNumber(value, "phaseEndTime"),
    remainingAtPause: optionalNumber(value, "remainingAtPause"),
    isPaused: requireBoolean(value, "isPaused"),
    isActive: requireBoolean(value, "isActive"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field];
  if (typeof value !== "string") {
    throw new MirrorProtocolError(`Field "${field}" must be a string`);
  }
  return value;
}

function requireNumber(obj: Record<string, unknown>, field: string): number {
  const value = obj[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MirrorProtocolError(`Field "${field}" must be a finite number`);
  }
  return value;
}

function optionalNumber(obj: Record<string, unknown>, field: string): number | null {
  return obj[field] === null || obj[field] === undefined ? null : requireNumber(obj, field);
}

function requireBoolean(obj: Record<string, unknown>, field: string): boolean {
  const value = obj[field];
  if (typeof value !== "boolean") {
    throw new MirrorProtocolError(`Field "${field}" must be a boolean`);
  }
  return value;
}

function parsePhase(value: unknown): PhaseKind {
  const phase = Object.values(PhaseKind).find((kind) => kind === value);
  if (phase === undefined) {
    throw new MirrorProtocolError(`Unknown phase: ${String(value)}`);
  }
  return phase;
}

function parseTimedPhase(value: unknown): TimedPhaseKind {
  const phase = TIMED_PHASES.find((kind) => kind === value);
  if (phase === undefined) {
    throw new MirrorProtocolError(`Not a timed phase: ${String(value)}`);
  }
  return phase;
}

function parseCommand(value: unknown): RemoteCommand {
  const command = REMOTE_COMMANDS.find((c) => c === value);
  if (command === undefined) {
    throw new MirrorProtocolError(`Unknown command: ${String(value)}`);
  }
  return command;
}
