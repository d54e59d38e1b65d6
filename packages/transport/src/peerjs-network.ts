/**
 * Peer network over PeerJS.
 *
 * PeerJS data connections are DTLS-encrypted and, with `reliable: true`,
 * ordered and reliable, which is exactly the channel the session needs.
 *
 * Discovery maps onto PeerJS ids: the announcer registers under the
 * well-known service id, the scanner registers under a random id and keeps
 * dialling the service id until a connection opens. An opened dial is
 * reported as `peerFound`; inviting it completes the connection.
 *
 * IMPORTANT: connections use `serialization: "raw"` so payloads travel as
 * bytes.
 *
 * Both peers must register with the same PeerServer. Without `peerOptions`
 * PeerJS falls back to its public cloud broker, so a deployment passes the
 * host, port and path of its own server on the local network.
 */

import { Emitter, type Logger, noopLogger, toError } from "@paircast/utils";
import type { DataConnection, Peer, PeerOptions } from "peerjs";
import { DiscoveryError, SendFailedError } from "./errors.js";
import { DEFAULT_DISCOVERY_RETRY_MS } from "./messaging-channel.js";
import type { PeerConnectionState, PeerNetwork, PeerNetworkEvents } from "./types.js";

export const DEFAULT_SERVICE_TYPE = "paircast-signal";

/**
 * Creates the PeerJS peer; `id` is undefined when a random id is wanted.
 */
export type PeerFactory = (
  id: string | undefined,
  options: PeerOptions | undefined,
) => Peer | Promise<Peer>;

/**
 * Options for the PeerJS network.
 */
export interface PeerJsNetworkOptions {
  /** Well-known id the announcer registers under */
  serviceType?: string;
  /** Delay between connection attempts to the service id while browsing (ms) */
  discoveryRetryMs?: number;
  /**
   * PeerServer connection settings handed to every Peer created.
   * @example { host: "192.168.1.10", port: 9000, path: "/signal", key: "test-key" }
   */
  peerOptions?: PeerOptions;
  /** Peer factory; defaults to loading `peerjs` and constructing a Peer */
  createPeer?: PeerFactory;
  /** Optional logger for debugging */
  logger?: Logger;
}

const loadPeer: PeerFactory = async (id, options) => {
  const { Peer: PeerClass } = await import("peerjs");
  if (id !== undefined) return new PeerClass(id, options);
  return options ? new PeerClass(options) : new PeerClass();
};

/**
 * Normalize incoming data to Uint8Array.
 */
export function normalizeToUint8Array(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (ArrayBuffer.isView(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  // Fallback: encode as UTF-8
  return new TextEncoder().encode(String(data));
}

export class PeerJsNetwork extends Emitter<PeerNetworkEvents> implements PeerNetwork {
  private readonly serviceType: string;
  private readonly discoveryRetryMs: number;
  private readonly peerOptions: PeerOptions | undefined;
  private readonly createPeer: PeerFactory;
  private readonly logger: Logger;

  private peer: Peer | null = null;
  private peerReady: Promise<Peer> | null = null;
  private advertising = false;
  private browsing = false;
  private dialTimer: ReturnType<typeof setTimeout> | null = null;
  private dialing: DataConnection | null = null;

  /** Open data connections by remote peer id */
  private readonly connections = new Map<string, DataConnection>();
  /** Remote peers whose connection was reported as connected */
  private readonly accepted = new Set<string>();

  constructor(options: PeerJsNetworkOptions = {}) {
    super();
    this.serviceType = options.serviceType ?? DEFAULT_SERVICE_TYPE;
    this.discoveryRetryMs = options.discoveryRetryMs ?? DEFAULT_DISCOVERY_RETRY_MS;
    this.peerOptions = options.peerOptions;
    this.createPeer = options.createPeer ?? loadPeer;
    this.logger = options.logger ?? noopLogger;
  }

  get localPeerId(): string {
    return this.peer?.id ?? (this.advertising ? this.serviceType : "");
  }

  startAdvertising(): void {
    if (this.advertising || this.browsing) return;
    this.advertising = true;
    this.openPeer(this.serviceType)
      .then((peer) => {
        peer.on("connection", (conn) => this.acceptIncoming(conn));
      })
      .catch((error) => this.fail(new DiscoveryError(`advertising failed: ${toError(error).message}`)));
  }

  startBrowsing(): void {
    if (this.advertising || this.browsing) return;
    this.browsing = true;
    this.openPeer(undefined)
      .then(() => this.dial())
      .catch((error) => this.fail(new DiscoveryError(`browsing failed: ${toError(error).message}`)));
  }

  stopDiscovery(): void {
    this.advertising = false;
    this.browsing = false;
    if (this.dialTimer !== null) {
      clearTimeout(this.dialTimer);
      this.dialTimer = null;
    }
  }

  invite(peerId: string): void {
    const conn = this.connections.get(peerId);
    if (!conn || !conn.open) {
      throw new DiscoveryError(`Peer ${peerId} is not reachable`, peerId);
    }
    if (this.accepted.has(peerId)) return;
    this.accepted.add(peerId);
    queueMicrotask(() => {
      this.emitState(peerId, "connecting");
      this.emitState(peerId, "connected");
    });
  }

  send(peerId: string, payload: Uint8Array): void {
    const conn = this.connections.get(peerId);
    if (!conn || !conn.open) {
      throw new SendFailedError(peerId, "peer not connected");
    }
    Promise.resolve(conn.send(payload)).catch((error: unknown) => {
      this.fail(new SendFailedError(peerId, toError(error).message));
    });
  }

  disconnect(): void {
    for (const conn of [...this.connections.values()]) {
      conn.close();
    }
    this.connections.clear();
    this.dialing = null;
  }

  /**
   * Disconnect and release the PeerJS peer.
   */
  destroy(): void {
    this.stopDiscovery();
    this.disconnect();
    this.peer?.destroy();
    this.peer = null;
    this.peerReady = null;
  }

  private openPeer(id: string | undefined): Promise<Peer> {
    if (!this.peerReady) {
      this.peerReady = Promise.resolve(this.createPeer(id, this.peerOptions)).then((peer) => {
        this.peer = peer;
        peer.on("error", (error) => {
          if (error.type === "peer-unavailable") {
            this.logger.debug?.(`service ${this.serviceType} not reachable yet`);
            this.dialing = null;
            this.scheduleDial();
            return;
          }
          this.fail(new DiscoveryError(`peer error (${error.type}): ${error.message}`));
        });
        return peer;
      });
    }
    return this.peerReady;
  }

  private dial(): void {
    const peer = this.peer;
    if (!this.browsing || !peer || this.dialing || this.connections.has(this.serviceType)) {
      return;
    }
    const conn = peer.connect(this.serviceType, { reliable: true, serialization: "raw" });
    this.dialing = conn;
    conn.on("open", () => {
      this.dialing = null;
      this.track(conn);
      this.emit("peerFound", conn.peer);
    });
    conn.on("error", (error: Error) => {
      this.logger.debug?.(`dial failed: ${error.message}`);
      this.dialing = null;
      this.scheduleDial();
    });
  }

  private scheduleDial(): void {
    if (!this.browsing || this.dialTimer !== null) return;
    this.dialTimer = setTimeout(() => {
      this.dialTimer = null;
      this.dial();
    }, this.discoveryRetryMs);
  }

  private acceptIncoming(conn: DataConnection): void {
    if (!this.advertising) {
      conn.close();
      return;
    }
    conn.on("open", () => {
      this.track(conn);
      this.accepted.add(conn.peer);
      this.emitState(conn.peer, "connecting");
      this.emitState(conn.peer, "connected");
    });
  }

  private track(conn: DataConnection): void {
    const remote = conn.peer;
    this.connections.set(remote, conn);

    conn.on("data", (data: unknown) => {
      // Copy the data to avoid issues with detached buffers
      this.emit("message", remote, new Uint8Array(normalizeToUint8Array(data)));
    });

    conn.on("close", () => {
      if (this.connections.get(remote) === conn) {
        this.connections.delete(remote);
      }
      if (this.accepted.delete(remote)) {
        this.emitState(remote, "not-connected");
      } else {
        this.emit("peerLost", remote);
      }
      this.scheduleDial();
    });
  }

  private emitState(peerId: string, state: PeerConnectionState): void {
    this.emit("connectionStateChanged", peerId, state);
  }

  private fail(error: Error): void {
    this.logger.error?.(error.message);
    this.emit("error", error);
  }
}
