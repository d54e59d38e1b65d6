/**
 * Session types
 *
 * Signalling messages exchanged between the two peers, the negotiation
 * state machine vocabulary and the contract of the media session the
 * controller drives.
 */

import type { Diagnostic, Logger } from "@paircast/utils";
import type { SessionConfig } from "./config.js";

/**
 * Negotiation role. The initiator originates every offer; the responder
 * only answers.
 */
export type PeerRole = "initiator" | "responder";

/**
 * Network candidate for the media path.
 */
export interface IceCandidate {
  /** Candidate line (`candidate:...`) */
  candidate: string;
  /** Media stream identification tag, when known */
  sdpMid: string | null;
  /** Index of the media section the candidate belongs to */
  sdpMLineIndex: number;
}

/**
 * Local or remote session description.
 */
export interface SessionDescription {
  type: "offer" | "answer";
  sdp: string;
}

export interface OfferMessage {
  type: "offer";
  sdp: string;
}

export interface AnswerMessage {
  type: "answer";
  sdp: string;
}

export interface CandidateMessage {
  type: "candidate";
  /** Candidate line */
  sdp: string;
  sdpMid: string | null;
  sdpMLineIndex: number;
}

/**
 * Message carried over the messaging channel.
 */
export type SignalMessage = OfferMessage | AnswerMessage | CandidateMessage;

export type NegotiationState =
  | "idle"
  | "local-offer-pending"
  | "awaiting-answer"
  | "remote-offer-received"
  | "local-answer-pending"
  | "stable"
  | "renegotiating"
  | "failed";

/**
 * Connectivity state reported by the media session.
 */
export type MediaConnectionState =
  | "new"
  | "connecting"
  | "connected"
  | "disconnected"
  | "failed"
  | "closed";

export interface CreateOfferOptions {
  /** Gather fresh credentials so the media path is re-established */
  iceRestart?: boolean;
}

/**
 * Media engine the controller negotiates for.
 *
 * Description and candidate calls may reject; the controller never
 * overlaps them. Callback registrations return an unsubscribe function.
 */
export interface MediaSession {
  /** True once a local track of the required kind is attached */
  hasLocalMedia(): boolean;
  createLocalOffer(options?: CreateOfferOptions): Promise<SessionDescription>;
  createLocalAnswer(): Promise<SessionDescription>;
  setLocalDescription(description: SessionDescription): Promise<void>;
  setRemoteDescription(description: SessionDescription): Promise<void>;
  addIceCandidate(candidate: IceCandidate): Promise<void>;
  onIceCandidate(listener: (candidate: IceCandidate) => void): () => void;
  onConnectionStateChange(listener: (state: MediaConnectionState) => void): () => void;
  onRenegotiationNeeded(listener: () => void): () => void;
}

export type NegotiationDiagnosticCode =
  | "no-local-media"
  | "offer-refused"
  | "offer-without-media"
  | "offer-out-of-state"
  | "answer-out-of-state"
  | "candidate-failed"
  | "malformed-message"
  | "renegotiation-ignored"
  | "stale-epoch"
  | "media-error"
  | "signal-send-failed"
  | "invalid-transition";

/**
 * Events emitted by the negotiation controller.
 */
export interface NegotiationControllerEvents {
  stateChange: (state: NegotiationState, previous: NegotiationState) => void;
  /** Outbound message, emitted after it was handed to `send` */
  signal: (message: SignalMessage) => void;
  diagnostic: (diagnostic: Diagnostic<NegotiationDiagnosticCode>) => void;
}

export interface NegotiationControllerOptions {
  role: PeerRole;
  mediaSession: MediaSession;
  /** Outbound path for signalling messages; must not block */
  send: (message: SignalMessage) => void;
  config?: Partial<SessionConfig>;
  /** Optional logger for debugging */
  logger?: Logger;
}
