import { vi } from "vitest";

export interface FakeTrack {
  kind: string;
  readyState: MediaStreamTrackState;
}

export class FakeSender {
  track: FakeTrack | null;

  constructor(track: FakeTrack | null) {
    this.track = track;
  }

  replaceTrack = vi.fn(async (track: FakeTrack | null): Promise<void> => {
    this.track = track;
  });
}

interface FakeIceEvent {
  candidate: { candidate: string; sdpMid: string | null; sdpMLineIndex: number | null } | null;
}

/**
 * The parts of RTCPeerConnection the media session touches. Handlers set
 * by the session are fired by hand.
 */
export class FakePeerConnection {
  connectionState: RTCPeerConnectionState = "new";
  onicecandidate: ((event: FakeIceEvent) => void) | null = null;
  onconnectionstatechange: (() => void) | null = null;
  onnegotiationneeded: (() => void) | null = null;
  senders: FakeSender[] = [];
  stats = new Map<string, Record<string, unknown>>();

  createOffer = vi.fn(
    async (_options?: RTCOfferOptions): Promise<RTCSessionDescriptionInit> => ({
      type: "offer",
      sdp: "v=0\r\nm=video 9 UDP/TLS/RTP/SAVPF 96\r\n",
    }),
  );
  createAnswer = vi.fn(
    async (): Promise<RTCSessionDescriptionInit> => ({
      type: "answer",
      sdp: "v=0\r\nm=video 9 UDP/TLS/RTP/SAVPF 96\r\n",
    }),
  );
  setLocalDescription = vi.fn(async (_description: RTCSessionDescriptionInit): Promise<void> => {});
  setRemoteDescription = vi.fn(async (_description: RTCSessionDescriptionInit): Promise<void> => {});
  addIceCandidate = vi.fn(async (_candidate: RTCIceCandidateInit): Promise<void> => {});
  addTrack = vi.fn((track: FakeTrack): FakeSender => {
    const sender = new FakeSender(track);
    this.senders.push(sender);
    return sender;
  });
  getStats = vi.fn(async () => this.stats);
  close = vi.fn();

  getSenders(): FakeSender[] {
    return this.senders;
  }

  fireCandidate(candidate: FakeIceEvent["candidate"]): void {
    this.onicecandidate?.({ candidate });
  }

  fireConnectionState(state: RTCPeerConnectionState): void {
    this.connectionState = state;
    this.onconnectionstatechange?.();
  }

  asPeerConnection(): RTCPeerConnection {
    return this as unknown as RTCPeerConnection;
  }
}

export function track(kind: string, readyState: MediaStreamTrackState = "live"): FakeTrack {
  return { kind, readyState };
}

export function asTrack(fake: FakeTrack): MediaStreamTrack {
  return fake as unknown as MediaStreamTrack;
}
