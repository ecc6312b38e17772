export {
  createTestConfiguration,
  createMetrics,
  sequentialIds,
  resetIdCounter,
} from "./factories.js";
export { FakeClock } from "./fake-clock.js";
export { RecordingMirror } from "./recording-mirror.js";
export { InMemoryTransport, createLinkedTransports } from "./in-memory-transport.js";
export { recordSession } from "./session-recorder.js";
export type { SessionRecording } from "./session-recorder.js";
