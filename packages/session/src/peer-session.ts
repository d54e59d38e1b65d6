import type { DiscoveryRole, MessagingChannel } from "@paircast/transport";
import { type Logger, noopLogger } from "@paircast/utils";
import type { SessionConfig } from "./config.js";
import { NegotiationController } from "./negotiation-controller.js";
import { encodeSignal } from "./signal-codec.js";
import type { MediaSession, PeerRole } from "./types.js";

/**
 * Anything started and stopped together with the session, such as a track
 * lifecycle monitor.
 */
export interface SessionMonitor {
  start(): void;
  stop(): void;
}

export interface PeerSessionOptions {
  role: PeerRole;
  channel: MessagingChannel;
  mediaSession: MediaSession;
  /** Discovery side; the initiator announces and the responder scans by default */
  discoveryRole?: DiscoveryRole;
  monitor?: SessionMonitor;
  config?: Partial<SessionConfig>;
  /** Optional logger for debugging */
  logger?: Logger;
}

/**
 * One side of a two-peer media session.
 *
 * Connects the messaging channel to a negotiation controller: payloads from
 * the channel are decoded by the controller, its outbound messages are
 * encoded onto the channel. When the channel connects the initiator offers;
 * when it disconnects the negotiation starts over in a new epoch.
 *
 * @example
 * ```typescript
 * const session = new PeerSession({
 *   role: "initiator",
 *   channel: new MessagingChannel(network),
 *   mediaSession: new RtcMediaSession(new RTCPeerConnection(createPeerConnectionConfig())),
 * });
 * session.start();
 * ```
 */
export class PeerSession {
  readonly role: PeerRole;
  readonly discoveryRole: DiscoveryRole;
  readonly controller: NegotiationController;

  private readonly channel: MessagingChannel;
  private readonly monitor?: SessionMonitor;
  private readonly logger: Logger;
  private started = false;

  constructor(options: PeerSessionOptions) {
    this.role = options.role;
    this.channel = options.channel;
    this.monitor = options.monitor;
    this.logger = options.logger ?? noopLogger;
    this.discoveryRole =
      options.discoveryRole ?? (options.role === "initiator" ? "announcer" : "scanner");
    this.controller = new NegotiationController({
      role: options.role,
      mediaSession: options.mediaSession,
      send: (message) => this.channel.send(encodeSignal(message)),
      config: options.config,
      logger: options.logger,
    });
  }

  get isStarted(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.channel.on("message", this.onMessage);
    this.channel.on("connected", this.onConnected);
    this.channel.on("disconnected", this.onDisconnected);
    this.channel.start(this.discoveryRole);
    this.monitor?.start();
    this.logger.info?.(`session started as ${this.role} (${this.discoveryRole})`);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.monitor?.stop();
    this.channel.off("message", this.onMessage);
    this.channel.off("connected", this.onConnected);
    this.channel.off("disconnected", this.onDisconnected);
    this.channel.stop();
    this.controller.reset();
    this.logger.info?.("session stopped");
  }

  private readonly onMessage = (payload: Uint8Array): void => {
    void this.controller.handleMessage(payload);
  };

  private readonly onConnected = (peerId: string): void => {
    this.logger.info?.(`connected to ${peerId}`);
    if (this.role === "initiator" && this.controller.state === "idle") {
      void this.controller.createOffer();
    }
  };

  private readonly onDisconnected = (peerId: string): void => {
    this.logger.info?.(`lost ${peerId}, resetting negotiation`);
    this.controller.reset();
  };
}
