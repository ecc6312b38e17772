// @interval-walk/companion
// Mirrors a running session to a paired device and routes its commands back.

export { PROTOCOL_VERSION } from "./types.js";
export type {
  MirrorSnapshot,
  MirrorMessage,
  MirrorMessageType,
  StateMessage,
  RequestSyncMessage,
  CommandMessage,
  MirrorTransport,
  EndpointConfig,
} from "./types.js";

export { MirrorProtocolError } from "./errors.js";
export { toMirrorSnapshot, encodeMessage, decodeMessage } from "./codec.js";
export { sendBestEffort } from "./send.js";
export { TransportMirror } from "./mirror.js";
export { MirrorFollower } from "./follower.js";
export type { FollowerEvents } from "./follower.js";
export { CompanionCommandRouter, connectCompanion } from "./router.js";
export type { CompanionConnection } from "./router.js";
