/**
 * Tests for the PeerJS peer network, against mocked PeerJS objects.
 */

import type { Peer } from "peerjs";
import { describe, expect, it, type Mock, vi } from "vitest";
import { DiscoveryError, SendFailedError } from "../src/errors.js";
import { normalizeToUint8Array, PeerJsNetwork } from "../src/peerjs-network.js";
import type { PeerConnectionState } from "../src/types.js";
import { settle } from "./helpers.js";

type Handler = (...args: unknown[]) => void;

interface MockConnection {
  peer: string;
  open: boolean;
  send: Mock;
  close: Mock;
  on(event: string, handler: Handler): MockConnection;
  simulateOpen(): void;
  simulateData(data: unknown): void;
  simulateClose(): void;
}

interface MockPeer {
  id: string;
  connections: MockConnection[];
  connect: Mock;
  destroy: Mock;
  on(event: string, handler: Handler): MockPeer;
  simulate(event: string, ...args: unknown[]): void;
}

function fire(handlers: Map<string, Handler[]>, event: string, args: unknown[]): void {
  for (const handler of handlers.get(event) ?? []) handler(...args);
}

function addHandler(handlers: Map<string, Handler[]>, event: string, handler: Handler): void {
  const list = handlers.get(event) ?? [];
  list.push(handler);
  handlers.set(event, list);
}

// Mock PeerJS DataConnection for testing
function createMockConnection(remote: string, open = false): MockConnection {
  const handlers = new Map<string, Handler[]>();

  const conn: MockConnection = {
    peer: remote,
    open,
    send: vi.fn(),
    close: vi.fn(() => conn.simulateClose()),

    on(event, handler) {
      addHandler(handlers, event, handler);
      return conn;
    },

    simulateOpen() {
      conn.open = true;
      fire(handlers, "open", []);
    },

    simulateData(data) {
      fire(handlers, "data", [data]);
    },

    simulateClose() {
      if (!conn.open) return;
      conn.open = false;
      fire(handlers, "close", []);
    },
  };
  return conn;
}

function createMockPeer(id: string): MockPeer {
  const handlers = new Map<string, Handler[]>();

  const peer: MockPeer = {
    id,
    connections: [],
    connect: vi.fn((remote: string) => {
      const conn = createMockConnection(remote);
      peer.connections.push(conn);
      return conn;
    }),
    destroy: vi.fn(),

    on(event, handler) {
      addHandler(handlers, event, handler);
      return peer;
    },

    simulate(event, ...args) {
      fire(handlers, event, args);
    },
  };
  return peer;
}

function createNetwork(peer: MockPeer, discoveryRetryMs = 1000) {
  const createPeer = vi.fn(() => peer as unknown as Peer);
  const network = new PeerJsNetwork({ createPeer, discoveryRetryMs });
  const states: Array<[string, PeerConnectionState]> = [];
  network.on("connectionStateChanged", (peerId, state) => states.push([peerId, state]));
  return { network, createPeer, states };
}

describe("PeerJsNetwork", () => {
  describe("advertising", () => {
    it("should register under the service id and accept incoming connections", async () => {
      const peer = createMockPeer("paircast-signal");
      const { network, createPeer, states } = createNetwork(peer);

      network.startAdvertising();
      await settle();
      expect(createPeer).toHaveBeenCalledWith("paircast-signal", undefined);
      expect(network.localPeerId).toBe("paircast-signal");

      const conn = createMockConnection("viewer-1");
      peer.simulate("connection", conn);
      conn.simulateOpen();

      expect(states).toEqual([
        ["viewer-1", "connecting"],
        ["viewer-1", "connected"],
      ]);
    });

    it("should use a custom service id", async () => {
      const peer = createMockPeer("studio");
      const createPeer = vi.fn(() => peer as unknown as Peer);
      const network = new PeerJsNetwork({ createPeer, serviceType: "studio" });

      network.startAdvertising();
      await settle();
      expect(createPeer).toHaveBeenCalledWith("studio", undefined);
    });

    it("should hand the PeerServer settings to the peer factory", async () => {
      const peer = createMockPeer("paircast-signal");
      const createPeer = vi.fn(() => peer as unknown as Peer);
      const peerOptions = { host: "192.168.1.10", port: 9000, path: "/signal", key: "test-key" };
      const network = new PeerJsNetwork({ createPeer, peerOptions });

      network.startAdvertising();
      await settle();
      expect(createPeer).toHaveBeenCalledWith("paircast-signal", peerOptions);
    });

    it("should close incoming connections after discovery stopped", async () => {
      const peer = createMockPeer("paircast-signal");
      const { network } = createNetwork(peer);
      network.startAdvertising();
      await settle();
      network.stopDiscovery();

      const conn = createMockConnection("viewer-1", true);
      peer.simulate("connection", conn);
      expect(conn.close).toHaveBeenCalledTimes(1);
    });

    it("should report not-connected when an accepted connection closes", async () => {
      const peer = createMockPeer("paircast-signal");
      const { network, states } = createNetwork(peer);
      network.startAdvertising();
      await settle();

      const conn = createMockConnection("viewer-1");
      peer.simulate("connection", conn);
      conn.simulateOpen();
      conn.simulateClose();

      expect(states[states.length - 1]).toEqual(["viewer-1", "not-connected"]);
      expect(() => network.send("viewer-1", new Uint8Array([1]))).toThrow(SendFailedError);
    });
  });

  describe("payloads", () => {
    async function connected() {
      const peer = createMockPeer("paircast-signal");
      const setup = createNetwork(peer);
      setup.network.startAdvertising();
      await settle();
      const conn = createMockConnection("viewer-1");
      peer.simulate("connection", conn);
      conn.simulateOpen();
      return { ...setup, conn };
    }

    it("should forward sends to the data connection", async () => {
      const { network, conn } = await connected();
      const payload = new Uint8Array([1, 2, 3]);

      network.send("viewer-1", payload);
      expect(conn.send).toHaveBeenCalledWith(payload);
    });

    it("should emit received data as Uint8Array", async () => {
      const { network, conn } = await connected();
      const received: Array<[string, Uint8Array]> = [];
      network.on("message", (peerId, payload) => received.push([peerId, payload]));

      conn.simulateData(new Uint8Array([4, 5, 6]).buffer);

      expect(received).toEqual([["viewer-1", new Uint8Array([4, 5, 6])]]);
    });

    it("should report asynchronous send rejections as errors", async () => {
      const { network, conn } = await connected();
      conn.send.mockRejectedValueOnce(new Error("buffer full"));
      const errors: Error[] = [];
      network.on("error", (error) => errors.push(error));

      network.send("viewer-1", new Uint8Array([1]));
      await settle();

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(SendFailedError);
      expect(errors[0].message).toBe("Send to viewer-1 failed: buffer full");
    });

    it("should throw when the peer is unknown", async () => {
      const { network } = await connected();
      expect(() => network.send("stranger", new Uint8Array([1]))).toThrow(
        "Send to stranger failed: peer not connected",
      );
    });
  });

  describe("browsing", () => {
    it("should dial the service id and report it as found once open", async () => {
      const peer = createMockPeer("random-1");
      const { network, createPeer, states } = createNetwork(peer);
      const found = vi.fn();
      network.on("peerFound", found);

      network.startBrowsing();
      await settle();

      expect(createPeer).toHaveBeenCalledWith(undefined, undefined);
      expect(peer.connect).toHaveBeenCalledWith("paircast-signal", {
        reliable: true,
        serialization: "raw",
      });

      peer.connections[0].simulateOpen();
      expect(found).toHaveBeenCalledWith("paircast-signal");

      network.invite("paircast-signal");
      await settle();
      expect(states).toEqual([
        ["paircast-signal", "connecting"],
        ["paircast-signal", "connected"],
      ]);
    });

    it("should reject an invitation to a peer without an open connection", async () => {
      const peer = createMockPeer("random-1");
      const { network } = createNetwork(peer);
      network.startBrowsing();
      await settle();

      expect(() => network.invite("paircast-signal")).toThrow(DiscoveryError);
    });

    it("should dial again when the service id is unavailable", async () => {
      const peer = createMockPeer("random-1");
      const { network } = createNetwork(peer, 1);
      network.startBrowsing();
      await settle();
      expect(peer.connect).toHaveBeenCalledTimes(1);

      peer.simulate("error", { type: "peer-unavailable", message: "Could not connect" });
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(peer.connect).toHaveBeenCalledTimes(2);
      network.destroy();
    });

    it("should report other peer errors", async () => {
      const peer = createMockPeer("random-1");
      const { network } = createNetwork(peer);
      const errors: Error[] = [];
      network.on("error", (error) => errors.push(error));
      network.startBrowsing();
      await settle();

      peer.simulate("error", { type: "network", message: "Lost connection to server" });

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(DiscoveryError);
      expect(errors[0].message).toBe("peer error (network): Lost connection to server");
      network.destroy();
      expect(peer.destroy).toHaveBeenCalledTimes(1);
    });

    it("should report peer creation failures", async () => {
      const network = new PeerJsNetwork({
        createPeer: () => Promise.reject(new Error("no signalling server")),
      });
      const errors: Error[] = [];
      network.on("error", (error) => errors.push(error));

      network.startBrowsing();
      await settle();

      expect(errors.map((error) => error.message)).toEqual([
        "browsing failed: no signalling server",
      ]);
    });
  });
});

describe("normalizeToUint8Array", () => {
  it("should pass Uint8Array through", () => {
    const data = new Uint8Array([1, 2]);
    expect(normalizeToUint8Array(data)).toBe(data);
  });

  it("should view other typed arrays as bytes", () => {
    const words = new Uint16Array([0x0201]);
    expect(normalizeToUint8Array(words).byteLength).toBe(2);
  });

  it("should encode strings as UTF-8", () => {
    expect(normalizeToUint8Array("hi")).toEqual(new Uint8Array([104, 105]));
  });
});
