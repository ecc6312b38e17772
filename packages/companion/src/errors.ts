import { IntervalWalkError } from "@interval-walk/core";

/**
 * Thrown by `decodeMessage` when a payload is not a valid protocol message.
 */
export class MirrorProtocolError extends IntervalWalkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MirrorProtocolError";
  }
}
