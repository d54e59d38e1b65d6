import { Emitter } from "@paircast/utils";
import { vi } from "vitest";
import type { PeerNetwork, PeerNetworkEvents } from "../src/types.js";

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

export const text = (value: string): Uint8Array => encoder.encode(value);
export const read = (payload: Uint8Array): string => decoder.decode(payload);

/**
 * Let every pending microtask (and the ones they schedule) run.
 */
export const settle = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

/**
 * Scriptable network: records calls and lets tests fire events directly.
 */
export class FakeNetwork extends Emitter<PeerNetworkEvents> implements PeerNetwork {
  startAdvertising = vi.fn();
  startBrowsing = vi.fn();
  stopDiscovery = vi.fn();
  invite = vi.fn();
  send = vi.fn();
  disconnect = vi.fn();

  constructor(readonly localPeerId: string) {
    super();
  }

  fire<K extends keyof PeerNetworkEvents>(event: K, ...args: Parameters<PeerNetworkEvents[K]>): void {
    this.emit(event, ...args);
  }
}
