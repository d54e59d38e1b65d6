/**
 * Media session over an RTCPeerConnection.
 *
 * Adapts the browser (or a compatible Node binding) peer connection to the
 * `MediaSession` contract the negotiation controller drives: descriptions
 * and candidates are converted to plain objects, and connection events are
 * fanned out to subscribers.
 */

import type { StatsSample } from "@paircast/monitor";
import {
  type CreateOfferOptions,
  DEFAULT_SESSION_CONFIG,
  type IceCandidate,
  type MediaConnectionState,
  type MediaSession,
  MediaSessionError,
  type SessionDescription,
} from "@paircast/session";
import { type Logger, noopLogger } from "@paircast/utils";
import type { RtcMediaSessionOptions } from "./types.js";

function toSessionDescription(
  operation: string,
  description: RTCSessionDescriptionInit,
  type: SessionDescription["type"],
): SessionDescription {
  if (!description.sdp) {
    throw new MediaSessionError(operation, new Error("description has no sdp"));
  }
  return { type, sdp: description.sdp };
}

function numberField(stats: Record<string, unknown>, key: string): number {
  const value = stats[key];
  return typeof value === "number" ? value : 0;
}

/**
 * `MediaSession` backed by an `RTCPeerConnection`.
 *
 * @example
 * ```typescript
 * const pc = new RTCPeerConnection(createPeerConnectionConfig());
 * const media = new RtcMediaSession(pc);
 * media.addTrack(cameraTrack, cameraStream);
 * const session = new PeerSession({ role: "initiator", channel, mediaSession: media });
 * ```
 */
export class RtcMediaSession implements MediaSession {
  readonly requiredMediaKind: string;

  private readonly pc: RTCPeerConnection;
  private readonly logger: Logger;
  private readonly candidateListeners = new Set<(candidate: IceCandidate) => void>();
  private readonly stateListeners = new Set<(state: MediaConnectionState) => void>();
  private readonly renegotiationListeners = new Set<() => void>();
  private state: MediaConnectionState;
  private closed = false;

  constructor(pc: RTCPeerConnection, options: RtcMediaSessionOptions = {}) {
    this.pc = pc;
    this.logger = options.logger ?? noopLogger;
    this.requiredMediaKind = options.requiredMediaKind ?? DEFAULT_SESSION_CONFIG.requiredMediaKind;
    this.state = pc.connectionState;

    pc.onicecandidate = (event) => {
      // null marks the end of gathering
      if (!event.candidate) {
        this.logger.debug?.("ICE gathering complete");
        return;
      }
      const candidate: IceCandidate = {
        candidate: event.candidate.candidate,
        sdpMid: event.candidate.sdpMid,
        sdpMLineIndex: event.candidate.sdpMLineIndex ?? 0,
      };
      for (const listener of this.candidateListeners) listener(candidate);
    };

    pc.onconnectionstatechange = () => {
      this.updateState(pc.connectionState);
    };

    pc.onnegotiationneeded = () => {
      for (const listener of this.renegotiationListeners) listener();
    };
  }

  /**
   * Last connection state seen.
   */
  get connectionState(): MediaConnectionState {
    return this.state;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  hasLocalMedia(): boolean {
    return this.pc
      .getSenders()
      .some(
        (sender) =>
          sender.track !== null &&
          sender.track.kind === this.requiredMediaKind &&
          sender.track.readyState === "live",
      );
  }

  async createLocalOffer(options: CreateOfferOptions = {}): Promise<SessionDescription> {
    const offer = await this.pc.createOffer({ iceRestart: options.iceRestart ?? false });
    return toSessionDescription("createOffer", offer, "offer");
  }

  async createLocalAnswer(): Promise<SessionDescription> {
    const answer = await this.pc.createAnswer();
    return toSessionDescription("createAnswer", answer, "answer");
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    await this.pc.setLocalDescription({ type: description.type, sdp: description.sdp });
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    await this.pc.setRemoteDescription({ type: description.type, sdp: description.sdp });
  }

  async addIceCandidate(candidate: IceCandidate): Promise<void> {
    await this.pc.addIceCandidate({
      candidate: candidate.candidate,
      sdpMid: candidate.sdpMid,
      sdpMLineIndex: candidate.sdpMLineIndex,
    });
  }

  onIceCandidate(listener: (candidate: IceCandidate) => void): () => void {
    this.candidateListeners.add(listener);
    return () => {
      this.candidateListeners.delete(listener);
    };
  }

  onConnectionStateChange(listener: (state: MediaConnectionState) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  onRenegotiationNeeded(listener: () => void): () => void {
    this.renegotiationListeners.add(listener);
    return () => {
      this.renegotiationListeners.delete(listener);
    };
  }

  /**
   * Attach a local track. Triggers `negotiationneeded` on the connection.
   */
  addTrack(track: MediaStreamTrack, ...streams: MediaStream[]): RTCRtpSender {
    return this.pc.addTrack(track, ...streams);
  }

  /**
   * Swap the track of the sender carrying the same kind, as after a
   * capture restart. No renegotiation is needed for this.
   *
   * @returns false when no sender carries a track of that kind
   */
  async replaceTrack(track: MediaStreamTrack): Promise<boolean> {
    const sender = this.pc.getSenders().find((s) => s.track?.kind === track.kind);
    if (!sender) return false;
    await sender.replaceTrack(track);
    return true;
  }

  /**
   * Outbound video counters for `analyzeStats`.
   */
  async getStatsSample(): Promise<StatsSample> {
    const report = await this.pc.getStats();
    const sample: StatsSample = {
      timestamp: Date.now(),
      bytesSent: 0,
      packetsSent: 0,
      packetsLost: 0,
      framesPerSecond: 0,
    };

    report.forEach((stats: Record<string, unknown>) => {
      if (stats.kind !== "video") return;
      if (stats.type === "outbound-rtp") {
        sample.bytesSent += numberField(stats, "bytesSent");
        sample.packetsSent += numberField(stats, "packetsSent");
        const fps = numberField(stats, "framesPerSecond");
        sample.framesPerSecond = Math.max(sample.framesPerSecond, fps);
        if (typeof stats.timestamp === "number") sample.timestamp = stats.timestamp;
      } else if (stats.type === "remote-inbound-rtp") {
        sample.packetsLost += numberField(stats, "packetsLost");
      }
    });
    return sample;
  }

  /**
   * Close the connection and release resources.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pc.onicecandidate = null;
    this.pc.onconnectionstatechange = null;
    this.pc.onnegotiationneeded = null;
    this.candidateListeners.clear();
    this.stateListeners.clear();
    this.renegotiationListeners.clear();
    this.pc.close();
  }

  private updateState(state: MediaConnectionState): void {
    if (state === this.state) return;
    this.logger.debug?.(`connection state ${this.state} -> ${state}`);
    this.state = state;
    for (const listener of this.stateListeners) listener(state);
  }
}
