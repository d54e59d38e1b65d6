import type { MediaSession } from "@paircast/session";
import { vi } from "vitest";
import type { CaptureSource, RenegotiationTarget, TrackReadyState } from "../src/types.js";

/**
 * Capture pipeline driven by hand: frames arrive only when `frame()` is called.
 */
export class FakeCapture implements CaptureSource {
  isEnabled = true;
  readyState: TrackReadyState = "live";
  isRunning = true;
  userDisabled = false;

  start = vi.fn(async (): Promise<void> => {
    this.isRunning = true;
    this.readyState = "live";
  });
  stop = vi.fn(async (): Promise<void> => {
    this.isRunning = false;
  });

  private readonly listeners = new Set<() => void>();

  get listenerCount(): number {
    return this.listeners.size;
  }

  onFrame(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  frame(): void {
    for (const listener of this.listeners) listener();
  }
}

/**
 * Negotiator that becomes busy once it accepts a restart, until the test
 * sets `busy` back to false.
 */
export class FakeNegotiator implements RenegotiationTarget {
  busy = false;
  accept = true;

  canRenegotiate = vi.fn((): boolean => !this.busy);
  requestRestart = vi.fn((): boolean => {
    if (!this.accept) return false;
    this.busy = true;
    return true;
  });
}

export const VIDEO_SDP = "v=0\r\nm=video 9 UDP/TLS/RTP/SAVPF 96\r\na=mid:0\r\n";

export function createMediaSession() {
  return {
    hasLocalMedia: () => true,
    createLocalOffer: vi.fn(async () => ({ type: "offer" as const, sdp: VIDEO_SDP })),
    createLocalAnswer: vi.fn(async () => ({ type: "answer" as const, sdp: VIDEO_SDP })),
    setLocalDescription: vi.fn(async () => {}),
    setRemoteDescription: vi.fn(async () => {}),
    addIceCandidate: vi.fn(async () => {}),
    onIceCandidate: () => () => {},
    onConnectionStateChange: () => () => {},
    onRenegotiationNeeded: () => () => {},
  } satisfies MediaSession;
}
