/**
 * Signalling wire format.
 *
 * Messages travel as UTF-8 encoded JSON objects:
 *
 * ```
 * {"type":"offer","sdp":"v=0..."}
 * {"type":"answer","sdp":"v=0..."}
 * {"type":"candidate","sdp":"candidate:...","sdpMid":"0","sdpMLineIndex":0}
 * ```
 *
 * Older peers put the candidate line under `candidate` instead of `sdp`;
 * both are accepted on decode.
 */

import { toError } from "@paircast/utils";
import { SignalDecodeError } from "./errors.js";
import type { SignalMessage } from "./types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function encodeSignal(message: SignalMessage): Uint8Array {
  const wire =
    message.type === "candidate"
      ? {
          type: message.type,
          sdp: message.sdp,
          sdpMid: message.sdpMid,
          sdpMLineIndex: message.sdpMLineIndex,
        }
      : { type: message.type, sdp: message.sdp };
  return encoder.encode(JSON.stringify(wire));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a payload received from the channel.
 *
 * @throws SignalDecodeError for invalid UTF-8 or JSON, an unknown type or
 * missing fields
 */
export function decodeSignal(payload: Uint8Array): SignalMessage {
  let text: string;
  try {
    text = decoder.decode(payload);
  } catch {
    throw new SignalDecodeError("payload is not valid UTF-8");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SignalDecodeError(`payload is not JSON: ${toError(error).message}`);
  }
  if (!isRecord(parsed)) {
    throw new SignalDecodeError("payload is not a JSON object");
  }

  const type = parsed.type;
  switch (type) {
    case "offer":
    case "answer": {
      if (typeof parsed.sdp !== "string") {
        throw new SignalDecodeError(`${type} without sdp`);
      }
      return type === "offer"
        ? { type: "offer", sdp: parsed.sdp }
        : { type: "answer", sdp: parsed.sdp };
    }
    case "candidate": {
      const line = typeof parsed.sdp === "string" ? parsed.sdp : parsed.candidate;
      if (typeof line !== "string") {
        throw new SignalDecodeError("candidate without candidate line");
      }
      const index = parsed.sdpMLineIndex;
      if (typeof index !== "number" || !Number.isInteger(index) || index < 0) {
        throw new SignalDecodeError("candidate without valid sdpMLineIndex");
      }
      const mid = parsed.sdpMid;
      if (mid !== undefined && mid !== null && typeof mid !== "string") {
        throw new SignalDecodeError("candidate sdpMid must be a string");
      }
      return {
        type,
        sdp: line,
        sdpMid: typeof mid === "string" ? mid : null,
        sdpMLineIndex: index,
      };
    }
    default:
      throw new SignalDecodeError(`unknown message type: ${JSON.stringify(type)}`);
  }
}
