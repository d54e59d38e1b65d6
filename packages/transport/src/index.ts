/**
 * @paircast/transport
 *
 * Peer discovery and the buffered messaging channel a two-peer session
 * negotiates over.
 *
 * Features:
 * - `PeerNetwork` contract for discovery plus an ordered encrypted channel
 * - `MessagingChannel` with a send-time outbox and single canonical peer
 * - `MemoryLan` in-process network for tests and local demos
 * - `PeerJsNetwork` over PeerJS data connections
 *
 * @example
 * ```typescript
 * import { MemoryLan, MessagingChannel } from "@paircast/transport";
 *
 * const lan = new MemoryLan();
 * const channel = new MessagingChannel(lan.createNetwork("viewer"));
 * channel.on("connected", (peerId) => console.log(`paired with ${peerId}`));
 * channel.start("scanner");
 * ```
 *
 * @packageDocumentation
 */

export { DiscoveryError, SendFailedError, TransportError } from "./errors.js";
export { MemoryLan, MemoryPeerNetwork } from "./memory-network.js";
export { DEFAULT_DISCOVERY_RETRY_MS, MessagingChannel } from "./messaging-channel.js";
export { Outbox, type OutboxFlushResult } from "./outbox.js";
export {
  DEFAULT_SERVICE_TYPE,
  normalizeToUint8Array,
  type PeerFactory,
  PeerJsNetwork,
  type PeerJsNetworkOptions,
} from "./peerjs-network.js";
export type * from "./types.js";
