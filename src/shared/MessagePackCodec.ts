/**
 * MessagePack codec for WebSocket communication.
 *
 * Game frames go out as MessagePack. Incoming frames may be MessagePack
 * (binary) or JSON (text) so a plain terminal client can still talk to the
 * server.
 */

import { encode, decode } from "@msgpack/msgpack";
import { logger, LogCategory } from "../infrastructure/utils/logger";

export function isBinaryMessage(data: unknown): data is Buffer | ArrayBuffer {
  return Buffer.isBuffer(data) || data instanceof ArrayBuffer;
}

export function encodeMsgPack<T>(data: T): Buffer {
  return Buffer.from(encode(data));
}

/**
 * Deserializes MessagePack or JSON automatically. The result is untrusted
 * and must be validated by the caller.
 */
export function decodeMessage(raw: string | Buffer | ArrayBuffer): unknown {
  if (typeof raw === "string") {
    return JSON.parse(raw);
  }

  const buffer = raw instanceof ArrayBuffer ? Buffer.from(raw) : raw;

  try {
    return decode(buffer);
  } catch (error) {
    logger.debug("Failed to decode MessagePack, falling back to JSON", LogCategory.HTTP, {
      error: error instanceof Error ? error.message : String(error),
    });
    return JSON.parse(buffer.toString());
  }
}
