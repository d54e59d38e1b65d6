/**
 * In-process peer network.
 *
 * A `MemoryLan` plays the role of the local network segment: peers created
 * from the same LAN can see each other's advertisements, connect and
 * exchange payloads. Every notification is delivered asynchronously (as a
 * microtask) and payloads between two peers arrive in send order, which is
 * what the real networks guarantee.
 *
 * @example
 * ```typescript
 * const lan = new MemoryLan();
 * const camera = new MessagingChannel(lan.createNetwork("camera"));
 * const viewer = new MessagingChannel(lan.createNetwork("viewer"));
 * camera.start("announcer");
 * viewer.start("scanner");
 * ```
 */

import { Emitter } from "@paircast/utils";
import { DiscoveryError, SendFailedError } from "./errors.js";
import type { PeerConnectionState, PeerNetwork, PeerNetworkEvents } from "./types.js";

function linkKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

/**
 * Shared medium for `MemoryPeerNetwork` instances.
 */
export class MemoryLan {
  private readonly nodes = new Map<string, MemoryPeerNetwork>();
  private readonly links = new Set<string>();
  private readonly failingSenders = new Set<string>();

  /**
   * Attach a new peer to this LAN.
   */
  createNetwork(peerId: string): MemoryPeerNetwork {
    if (this.nodes.has(peerId)) {
      throw new DiscoveryError(`Peer id already in use: ${peerId}`, peerId);
    }
    const node = new MemoryPeerNetwork(this, peerId);
    this.nodes.set(peerId, node);
    return node;
  }

  /**
   * Peers currently linked to the given peer.
   */
  connectedPeers(peerId: string): string[] {
    const result: string[] = [];
    for (const id of this.nodes.keys()) {
      if (id !== peerId && this.links.has(linkKey(peerId, id))) {
        result.push(id);
      }
    }
    return result;
  }

  /**
   * Tear down every link of a peer, as a radio dropout would.
   */
  dropLinks(peerId: string): void {
    for (const other of this.connectedPeers(peerId)) {
      this.unlink(peerId, other);
    }
  }

  /**
   * Make every `send` from the peer throw until switched off again.
   */
  failSends(peerId: string, enabled = true): void {
    if (enabled) {
      this.failingSenders.add(peerId);
    } else {
      this.failingSenders.delete(peerId);
    }
  }

  /** @internal */
  announce(node: MemoryPeerNetwork): void {
    for (const other of this.nodes.values()) {
      if (other !== node && other.isBrowsing) {
        other.notifyFound(node.localPeerId);
      }
    }
  }

  /** @internal */
  withdraw(node: MemoryPeerNetwork): void {
    for (const other of this.nodes.values()) {
      if (other !== node && other.isBrowsing) {
        other.notifyLost(node.localPeerId);
      }
    }
  }

  /** @internal */
  advertisers(except: MemoryPeerNetwork): string[] {
    const result: string[] = [];
    for (const node of this.nodes.values()) {
      if (node !== except && node.isAdvertising) {
        result.push(node.localPeerId);
      }
    }
    return result;
  }

  /** @internal */
  connect(from: MemoryPeerNetwork, to: string): void {
    const target = this.nodes.get(to);
    const key = linkKey(from.localPeerId, to);
    if (this.links.has(key)) return;

    if (!target || !target.isAdvertising) {
      queueMicrotask(() => from.notifyState(to, "not-connected"));
      return;
    }

    queueMicrotask(() => {
      from.notifyState(to, "connecting");
      target.notifyState(from.localPeerId, "connecting");
      queueMicrotask(() => {
        if (!target.isAdvertising) {
          from.notifyState(to, "not-connected");
          target.notifyState(from.localPeerId, "not-connected");
          return;
        }
        this.links.add(key);
        from.notifyState(to, "connected");
        target.notifyState(from.localPeerId, "connected");
      });
    });
  }

  /** @internal */
  deliver(from: string, to: string, payload: Uint8Array): void {
    if (this.failingSenders.has(from)) {
      throw new SendFailedError(to, "simulated send failure");
    }
    const target = this.nodes.get(to);
    if (!target || !this.links.has(linkKey(from, to))) {
      throw new SendFailedError(to, "peer not connected");
    }
    const copy = new Uint8Array(payload);
    queueMicrotask(() => {
      if (this.links.has(linkKey(from, to))) {
        target.notifyMessage(from, copy);
      }
    });
  }

  /** @internal */
  unlink(a: string, b: string): void {
    if (!this.links.delete(linkKey(a, b))) return;
    const left = this.nodes.get(a);
    const right = this.nodes.get(b);
    queueMicrotask(() => {
      left?.notifyState(b, "not-connected");
      right?.notifyState(a, "not-connected");
    });
  }
}

/**
 * One peer's view of a `MemoryLan`.
 */
export class MemoryPeerNetwork extends Emitter<PeerNetworkEvents> implements PeerNetwork {
  private advertising = false;
  private browsing = false;

  constructor(
    private readonly lan: MemoryLan,
    readonly localPeerId: string,
  ) {
    super();
  }

  get isAdvertising(): boolean {
    return this.advertising;
  }

  get isBrowsing(): boolean {
    return this.browsing;
  }

  startAdvertising(): void {
    if (this.advertising) return;
    this.advertising = true;
    this.lan.announce(this);
  }

  startBrowsing(): void {
    if (this.browsing) return;
    this.browsing = true;
    for (const peerId of this.lan.advertisers(this)) {
      this.notifyFound(peerId);
    }
  }

  stopDiscovery(): void {
    if (this.advertising) {
      this.advertising = false;
      this.lan.withdraw(this);
    }
    this.browsing = false;
  }

  invite(peerId: string): void {
    this.lan.connect(this, peerId);
  }

  send(peerId: string, payload: Uint8Array): void {
    this.lan.deliver(this.localPeerId, peerId, payload);
  }

  disconnect(): void {
    this.lan.dropLinks(this.localPeerId);
  }

  /** @internal */
  notifyFound(peerId: string): void {
    queueMicrotask(() => {
      if (this.browsing) this.emit("peerFound", peerId);
    });
  }

  /** @internal */
  notifyLost(peerId: string): void {
    queueMicrotask(() => this.emit("peerLost", peerId));
  }

  /** @internal */
  notifyState(peerId: string, state: PeerConnectionState): void {
    this.emit("connectionStateChanged", peerId, state);
  }

  /** @internal */
  notifyMessage(peerId: string, payload: Uint8Array): void {
    this.emit("message", peerId, payload);
  }
}
