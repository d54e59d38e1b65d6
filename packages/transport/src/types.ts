/**
 * Transport types
 *
 * Contract of the peer network capability the messaging channel runs on,
 * and the events and options of the channel itself.
 */

import type { Diagnostic, Logger } from "@paircast/utils";

/**
 * How a peer takes part in discovery.
 *
 * Announcers advertise themselves and accept invitations; scanners browse
 * and invite the first peer they find.
 */
export type DiscoveryRole = "announcer" | "scanner";

/**
 * Connection state of one remote peer as reported by the network.
 */
export type PeerConnectionState = "not-connected" | "connecting" | "connected";

/**
 * Events emitted by a peer network.
 */
export interface PeerNetworkEvents {
  /** An advertising peer became visible */
  peerFound: (peerId: string) => void;
  /** A previously found peer stopped advertising */
  peerLost: (peerId: string) => void;
  /** Connection state of a remote peer changed */
  connectionStateChanged: (peerId: string, state: PeerConnectionState) => void;
  /** A payload arrived from a remote peer */
  message: (peerId: string, payload: Uint8Array) => void;
  /** Asynchronous failure (discovery or delivery) */
  error: (error: Error) => void;
}

/**
 * Discovery plus an encrypted, ordered, reliable channel to nearby peers.
 *
 * Implementations accept every invitation they receive while advertising;
 * deciding which peer matters is left to the messaging channel.
 */
export interface PeerNetwork {
  /** Identity of this peer on the network */
  readonly localPeerId: string;
  /** Advertise this peer until `stopDiscovery()` */
  startAdvertising(): void;
  /** Browse for advertising peers until `stopDiscovery()` */
  startBrowsing(): void;
  stopDiscovery(): void;
  /** Ask a found peer to connect */
  invite(peerId: string): void;
  /**
   * Transmit a payload to a connected peer.
   * Throws when the peer is not connected or the write fails synchronously.
   */
  send(peerId: string, payload: Uint8Array): void;
  /** Drop every connection */
  disconnect(): void;
  on<K extends keyof PeerNetworkEvents>(event: K, listener: PeerNetworkEvents[K]): unknown;
  off<K extends keyof PeerNetworkEvents>(event: K, listener: PeerNetworkEvents[K]): unknown;
}

export type ChannelDiagnosticCode =
  | "send-failed"
  | "extra-peer-ignored"
  | "standby-peer-promoted"
  | "foreign-message"
  | "invite-failed"
  | "invite-retry"
  | "network-error";

/**
 * Events emitted by the messaging channel.
 */
export interface MessagingChannelEvents {
  /** Canonical peer connected; fired after the outbox flush was issued */
  connected: (peerId: string) => void;
  /** Canonical peer went away */
  disconnected: (peerId: string) => void;
  /** Payload from the canonical peer */
  message: (payload: Uint8Array) => void;
  /** Channel state changed */
  stateChange: (state: PeerConnectionState) => void;
  /** Something was dropped or failed without being fatal */
  diagnostic: (diagnostic: Diagnostic<ChannelDiagnosticCode>) => void;
}

/**
 * Options for the messaging channel.
 */
export interface MessagingChannelOptions {
  /** Interval after which a scanner re-invites when no connection came up (ms) */
  discoveryRetryMs?: number;
  /** Optional logger for debugging */
  logger?: Logger;
}

/**
 * Counters kept by the messaging channel.
 */
export interface MessagingChannelStats {
  /** Payloads handed to the network */
  sent: number;
  /** Payloads put in the outbox because no peer was connected */
  buffered: number;
  /** Outbox payloads handed to the network on connect */
  flushed: number;
  /** Writes the network rejected */
  sendFailures: number;
  /** Payloads delivered from the canonical peer */
  received: number;
  /** Payloads from non-canonical peers that were discarded */
  dropped: number;
}
