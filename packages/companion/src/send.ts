import { encodeMessage } from "./codec.js";
import type { MirrorMessage, MirrorTransport } from "./types.js";

/**
 * Encode and send a message without letting a transport failure escape.
 *
 * Synchronous throws and rejected promises are both logged under `owner`.
 * `onFailure` runs for either, so the caller can schedule a full resync.
 */
export function sendBestEffort(
  transport: MirrorTransport,
  message: MirrorMessage,
  owner: string,
  onFailure?: () => void,
): void {
  const report = (err: unknown): void => {
    console.error(`${owner}: failed to send "${message.type}" message`, err);
    onFailure?.();
  };

  try {
    const result = transport.send(encodeMessage(message));
    if (result instanceof Promise) {
      result.catch(report);
    }
  } catch (err) {
    report(err);
  }
}
