import type { PeerFactory, PeerNetwork, PeerNetworkEvents } from "@paircast/transport";
import { ConfigError, Emitter } from "@paircast/utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createPeerJsChannel, createSessionChannel } from "../src/session-channel.js";
import { settle } from "./helpers.js";

type PeerInstance = Awaited<ReturnType<PeerFactory>>;
type Handler = (...args: unknown[]) => void;

class ScriptedNetwork extends Emitter<PeerNetworkEvents> implements PeerNetwork {
  readonly localPeerId = "viewer";
  startAdvertising = vi.fn();
  startBrowsing = vi.fn();
  stopDiscovery = vi.fn();
  invite = vi.fn();
  send = vi.fn();
  disconnect = vi.fn();

  found(peerId: string): void {
    this.emit("peerFound", peerId);
  }
}

function createMockPeer(id: string) {
  const handlers = new Map<string, Handler[]>();
  const peer = {
    id,
    connect: vi.fn(() => ({ on: vi.fn(), close: vi.fn() })),
    destroy: vi.fn(),
    on(event: string, handler: Handler) {
      handlers.set(event, [...(handlers.get(event) ?? []), handler]);
      return peer;
    },
    simulate(event: string, ...args: unknown[]) {
      for (const handler of handlers.get(event) ?? []) handler(...args);
    },
  };
  return peer;
}

describe("createSessionChannel", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should re-invite on the configured discovery interval", () => {
    const network = new ScriptedNetwork();
    const channel = createSessionChannel(network, { config: { discoveryRetryMs: 500 } });
    channel.start("scanner");

    network.found("camera");
    vi.advanceTimersByTime(499);
    expect(network.invite).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1);
    expect(network.invite).toHaveBeenCalledTimes(2);
    channel.stop();
  });

  it("should reject an invalid config", () => {
    expect(() =>
      createSessionChannel(new ScriptedNetwork(), { config: { discoveryRetryMs: -1 } }),
    ).toThrow(ConfigError);
  });
});

describe("createPeerJsChannel", () => {
  it("should register the announcer under the configured service name", async () => {
    const peer = createMockPeer("studio");
    const createPeer = vi.fn(() => peer as unknown as PeerInstance);
    const peerOptions = { host: "192.168.1.10", port: 9000, path: "/signal" };
    const channel = createPeerJsChannel({
      config: { serviceType: "studio" },
      peerOptions,
      createPeer,
    });

    channel.start("announcer");
    await settle();

    expect(createPeer).toHaveBeenCalledWith("studio", peerOptions);
    channel.stop();
  });

  it("should dial the service again after the configured interval", async () => {
    const peer = createMockPeer("random-1");
    const createPeer = vi.fn(() => peer as unknown as PeerInstance);
    const channel = createPeerJsChannel({
      config: { serviceType: "studio", discoveryRetryMs: 1 },
      createPeer,
    });

    channel.start("scanner");
    await settle();
    expect(peer.connect).toHaveBeenCalledTimes(1);
    expect(peer.connect).toHaveBeenCalledWith("studio", { reliable: true, serialization: "raw" });

    peer.simulate("error", { type: "peer-unavailable", message: "Could not connect" });
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(peer.connect).toHaveBeenCalledTimes(2);
    channel.stop();
  });
});
