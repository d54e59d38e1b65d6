/**
 * @paircast/session
 *
 * Offer/answer negotiation between an initiator and a responder over a
 * messaging channel.
 *
 * Features:
 * - `NegotiationController` state machine with epoch-tagged operations
 * - Buffering of candidates that arrive before the remote description
 * - Cooldown-gated ICE restart after a failed connection
 * - `PeerSession` wiring of channel, controller and an optional monitor
 * - Channel factories that apply the session's discovery settings
 * - JSON signalling codec compatible with older candidate messages
 *
 * @example
 * ```typescript
 * import { NegotiationController } from "@paircast/session";
 *
 * const controller = new NegotiationController({
 *   role: "responder",
 *   mediaSession,
 *   send: (message) => channel.send(encodeSignal(message)),
 * });
 * channel.on("message", (payload) => controller.handleMessage(payload));
 * ```
 *
 * @packageDocumentation
 */

export { DEFAULT_SESSION_CONFIG, resolveSessionConfig, type SessionConfig } from "./config.js";
export {
  InvalidTransitionError,
  MediaSessionError,
  NegotiationError,
  SignalDecodeError,
} from "./errors.js";
export { NegotiationController } from "./negotiation-controller.js";
export {
  NEGOTIATION_TRANSITIONS,
  type NegotiationEvent,
  NegotiationFsm,
  type NegotiationTransition,
} from "./negotiation-fsm.js";
export { PeerSession, type PeerSessionOptions, type SessionMonitor } from "./peer-session.js";
export { PendingCandidateBuffer } from "./pending-candidates.js";
export { RestartScheduler } from "./restart-scheduler.js";
export {
  createPeerJsChannel,
  createSessionChannel,
  type PeerJsChannelOptions,
  type SessionChannelOptions,
} from "./session-channel.js";
export { countMediaSections, hasMediaSection } from "./sdp.js";
export { decodeSignal, encodeSignal } from "./signal-codec.js";
export type * from "./types.js";
