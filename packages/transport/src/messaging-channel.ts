/**
 * Messaging channel over a peer network.
 *
 * Bootstraps discovery for one role, pins the first connected peer as the
 * canonical one and buffers outgoing payloads until it is connected.
 *
 * Ordering guarantee: when the canonical peer connects, the outbox is
 * flushed before the `connected` event fires, so everything sent before the
 * connection reaches the peer ahead of anything sent in response to it.
 *
 * Peers that connect while the slot is taken stay on standby. When the
 * canonical peer leaves, the earliest standby peer still connected takes its
 * place.
 */

import {
  type Diagnostic,
  Emitter,
  type Logger,
  logDiagnostic,
  noopLogger,
  toError,
} from "@paircast/utils";
import { SendFailedError } from "./errors.js";
import { Outbox } from "./outbox.js";
import type {
  ChannelDiagnosticCode,
  DiscoveryRole,
  MessagingChannelEvents,
  MessagingChannelOptions,
  MessagingChannelStats,
  PeerConnectionState,
  PeerNetwork,
  PeerNetworkEvents,
} from "./types.js";

export const DEFAULT_DISCOVERY_RETRY_MS = 3000;

/**
 * Buffered messaging channel bound to a single canonical peer.
 *
 * @example Announcer side:
 * ```typescript
 * const channel = new MessagingChannel(network);
 * channel.on("message", (payload) => controller.handleMessage(payload));
 * channel.start("announcer");
 * channel.send(encodeSignal(offer)); // buffered until a scanner connects
 * ```
 */
export class MessagingChannel extends Emitter<MessagingChannelEvents> {
  private readonly network: PeerNetwork;
  private readonly logger: Logger;
  private readonly discoveryRetryMs: number;
  private readonly outbox = new Outbox();

  private role: DiscoveryRole | null = null;
  private canonicalPeer: string | null = null;
  /** Connected peers waiting for the canonical slot, in connect order */
  private readonly standbyPeers = new Set<string>();
  private invitedPeer: string | null = null;
  private lastFoundPeer: string | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private currentState: PeerConnectionState = "not-connected";

  private readonly counters: MessagingChannelStats = {
    sent: 0,
    buffered: 0,
    flushed: 0,
    sendFailures: 0,
    received: 0,
    dropped: 0,
  };

  constructor(network: PeerNetwork, options: MessagingChannelOptions = {}) {
    const logger = options.logger ?? noopLogger;
    super((error, event) => logger.error?.(`listener for "${event}" failed`, error));
    this.network = network;
    this.logger = logger;
    this.discoveryRetryMs = options.discoveryRetryMs ?? DEFAULT_DISCOVERY_RETRY_MS;
  }

  get state(): PeerConnectionState {
    return this.currentState;
  }

  get canonicalPeerId(): string | null {
    return this.canonicalPeer;
  }

  get outboxSize(): number {
    return this.outbox.size;
  }

  get stats(): MessagingChannelStats {
    return { ...this.counters };
  }

  get discoveryRole(): DiscoveryRole | null {
    return this.role;
  }

  /**
   * Begin discovery. Calling it again while started does nothing.
   */
  start(role: DiscoveryRole): void {
    if (this.role) return;
    this.role = role;

    this.network.on("peerFound", this.onPeerFound);
    this.network.on("peerLost", this.onPeerLost);
    this.network.on("connectionStateChanged", this.onConnectionStateChanged);
    this.network.on("message", this.onMessage);
    this.network.on("error", this.onNetworkError);

    this.logger.info?.(`discovery started as ${role} (${this.network.localPeerId})`);
    if (role === "announcer") {
      this.network.startAdvertising();
    } else {
      this.network.startBrowsing();
    }
  }

  /**
   * Send a payload to the canonical peer, or buffer it until one connects.
   *
   * Never throws; failed writes are counted and reported as diagnostics.
   */
  send(payload: Uint8Array): void {
    const peer = this.canonicalPeer;
    if (peer === null || this.outbox.isFlushing) {
      this.outbox.enqueue(payload);
      this.counters.buffered++;
      this.logger.debug?.(`buffered ${payload.byteLength} bytes, outbox=${this.outbox.size}`);
      return;
    }
    if (this.transmit(peer, payload)) {
      this.counters.sent++;
    }
  }

  /**
   * Stop discovery, drop the connection and discard buffered payloads.
   */
  stop(): void {
    if (!this.role) return;
    this.clearRetry();

    this.network.off("peerFound", this.onPeerFound);
    this.network.off("peerLost", this.onPeerLost);
    this.network.off("connectionStateChanged", this.onConnectionStateChanged);
    this.network.off("message", this.onMessage);
    this.network.off("error", this.onNetworkError);

    this.network.stopDiscovery();
    this.network.disconnect();
    this.outbox.clear();

    const peer = this.canonicalPeer;
    this.role = null;
    this.canonicalPeer = null;
    this.standbyPeers.clear();
    this.invitedPeer = null;
    this.lastFoundPeer = null;
    this.setState("not-connected");
    if (peer !== null) {
      this.emit("disconnected", peer);
    }
  }

  private transmit(peer: string, payload: Uint8Array): boolean {
    try {
      this.network.send(peer, payload);
      return true;
    } catch (error) {
      this.recordSendFailure(toError(error), peer);
      return false;
    }
  }

  private recordSendFailure(error: Error, peer: string): void {
    this.counters.sendFailures++;
    this.report("send-failed", error.message, { peerId: peer });
  }

  private readonly onPeerFound: PeerNetworkEvents["peerFound"] = (peerId) => {
    this.lastFoundPeer = peerId;
    this.logger.debug?.(`found peer ${peerId}`);
    if (this.role === "scanner" && this.canonicalPeer === null && this.invitedPeer === null) {
      this.invite(peerId);
    }
  };

  private readonly onPeerLost: PeerNetworkEvents["peerLost"] = (peerId) => {
    if (this.lastFoundPeer === peerId) {
      this.lastFoundPeer = null;
    }
  };

  private readonly onConnectionStateChanged: PeerNetworkEvents["connectionStateChanged"] = (
    peerId,
    state,
  ) => {
    this.logger.debug?.(`peer ${peerId} -> ${state}`);
    switch (state) {
      case "connecting":
        if (this.canonicalPeer === null) {
          this.setState("connecting");
        }
        break;
      case "connected":
        this.handleConnected(peerId);
        break;
      case "not-connected":
        this.handleNotConnected(peerId);
        break;
    }
  };

  private handleConnected(peerId: string): void {
    if (this.canonicalPeer !== null) {
      if (peerId !== this.canonicalPeer && !this.standbyPeers.has(peerId)) {
        this.standbyPeers.add(peerId);
        this.report("extra-peer-ignored", `peer ${peerId} connected after ${this.canonicalPeer}`, {
          peerId,
        });
      }
      return;
    }
    this.adopt(peerId);
  }

  private handleNotConnected(peerId: string): void {
    this.standbyPeers.delete(peerId);
    if (peerId === this.invitedPeer) {
      this.invitedPeer = null;
    }
    if (peerId !== this.canonicalPeer) {
      if (this.canonicalPeer === null && this.currentState === "connecting") {
        this.setState("not-connected");
      }
      return;
    }

    this.canonicalPeer = null;
    this.setState("not-connected");
    this.emit("disconnected", peerId);

    const [next] = this.standbyPeers;
    if (next !== undefined && this.canonicalPeer === null) {
      this.standbyPeers.delete(next);
      this.report("standby-peer-promoted", `peer ${next} replaces ${peerId}`, { peerId: next });
      this.adopt(next);
      return;
    }

    if (this.role === "scanner" && this.lastFoundPeer !== null) {
      this.invite(this.lastFoundPeer);
    }
  }

  /**
   * Make a connected peer canonical, flush the outbox to it, then announce it.
   */
  private adopt(peerId: string): void {
    this.canonicalPeer = peerId;
    this.invitedPeer = null;
    this.clearRetry();

    const result = this.outbox.flush((payload) => this.transmit(peerId, payload));
    this.counters.flushed += result.delivered;
    if (result.delivered + result.failed > 0) {
      this.logger.info?.(
        `flushed outbox to ${peerId}: ${result.delivered} sent, ${result.failed} failed`,
      );
    }

    this.setState("connected");
    this.emit("connected", peerId);
  }

  private readonly onMessage: PeerNetworkEvents["message"] = (peerId, payload) => {
    if (peerId !== this.canonicalPeer) {
      this.counters.dropped++;
      this.report("foreign-message", `discarded payload from non-canonical peer ${peerId}`, {
        peerId,
      });
      return;
    }
    this.counters.received++;
    this.emit("message", payload);
  };

  private readonly onNetworkError: PeerNetworkEvents["error"] = (error) => {
    if (error instanceof SendFailedError) {
      this.recordSendFailure(error, error.peerId);
      return;
    }
    this.report("network-error", error.message);
  };

  private invite(peerId: string): void {
    this.invitedPeer = peerId;
    this.armRetry();
    try {
      this.network.invite(peerId);
    } catch (error) {
      this.report("invite-failed", toError(error).message, { peerId });
    }
  }

  private armRetry(): void {
    this.clearRetry();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.role !== "scanner" || this.canonicalPeer !== null) return;
      this.invitedPeer = null;
      if (this.lastFoundPeer !== null) {
        this.report("invite-retry", `no connection after ${this.discoveryRetryMs}ms, inviting again`, {
          peerId: this.lastFoundPeer,
        });
        this.invite(this.lastFoundPeer);
      }
    }, this.discoveryRetryMs);
  }

  private clearRetry(): void {
    if (this.retryTimer !== null) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private setState(state: PeerConnectionState): void {
    if (this.currentState !== state) {
      this.currentState = state;
      this.emit("stateChange", state);
    }
  }

  private report(
    code: ChannelDiagnosticCode,
    message: string,
    details?: Record<string, unknown>,
  ): void {
    const diagnostic: Diagnostic<ChannelDiagnosticCode> = { code, message, details };
    const level = code === "invite-retry" || code === "standby-peer-promoted" ? "info" : "warn";
    logDiagnostic(this.logger, diagnostic, level);
    this.emit("diagnostic", diagnostic);
  }
}
