import { vi } from "vitest";
import type {
  CreateOfferOptions,
  IceCandidate,
  MediaConnectionState,
  MediaSession,
  SessionDescription,
} from "../src/types.js";

export const VIDEO_OFFER = [
  "v=0",
  "o=- 4611731400430051336 2 IN IP4 127.0.0.1",
  "s=-",
  "t=0 0",
  "a=group:BUNDLE 0",
  "m=video 9 UDP/TLS/RTP/SAVPF 96",
  "a=mid:0",
  "a=sendonly",
  "",
].join("\r\n");

export const AUDIO_ONLY_OFFER = [
  "v=0",
  "o=- 4611731400430051337 2 IN IP4 127.0.0.1",
  "s=-",
  "t=0 0",
  "m=audio 9 UDP/TLS/RTP/SAVPF 111",
  "a=mid:0",
  "",
].join("\r\n");

export const VIDEO_ANSWER = [
  "v=0",
  "o=- 7309457104423398000 2 IN IP4 127.0.0.1",
  "s=-",
  "t=0 0",
  "m=video 9 UDP/TLS/RTP/SAVPF 96",
  "a=mid:0",
  "a=recvonly",
  "",
].join("\r\n");

export function hostCandidate(n: number): IceCandidate {
  return {
    candidate: `candidate:${n} 1 udp 2122260223 192.0.2.${n} 5000${n} typ host`,
    sdpMid: "0",
    sdpMLineIndex: 0,
  };
}

/**
 * Let every pending microtask (and the ones they schedule) run.
 */
export const settle = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Scripted media session: every call resolves immediately unless a test
 * overrides it, and callbacks are fired by hand.
 */
export class FakeMediaSession implements MediaSession {
  localMedia = true;

  createLocalOffer = vi.fn(
    async (_options?: CreateOfferOptions): Promise<SessionDescription> => ({
      type: "offer",
      sdp: VIDEO_OFFER,
    }),
  );
  createLocalAnswer = vi.fn(
    async (): Promise<SessionDescription> => ({ type: "answer", sdp: VIDEO_ANSWER }),
  );
  setLocalDescription = vi.fn(async (_description: SessionDescription): Promise<void> => {});
  setRemoteDescription = vi.fn(async (_description: SessionDescription): Promise<void> => {});
  addIceCandidate = vi.fn(async (_candidate: IceCandidate): Promise<void> => {});

  private readonly candidateListeners = new Set<(candidate: IceCandidate) => void>();
  private readonly stateListeners = new Set<(state: MediaConnectionState) => void>();
  private readonly renegotiationListeners = new Set<() => void>();

  get listenerCount(): number {
    return (
      this.candidateListeners.size + this.stateListeners.size + this.renegotiationListeners.size
    );
  }

  hasLocalMedia(): boolean {
    return this.localMedia;
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

  emitCandidate(candidate: IceCandidate): void {
    for (const listener of this.candidateListeners) listener(candidate);
  }

  emitConnectionState(state: MediaConnectionState): void {
    for (const listener of this.stateListeners) listener(state);
  }

  emitRenegotiationNeeded(): void {
    for (const listener of this.renegotiationListeners) listener();
  }
}
