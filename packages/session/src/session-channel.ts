/**
 * Messaging channels set up from a session config, so discovery uses the
 * same service name and retry interval as the rest of the session.
 */

import {
  MessagingChannel,
  PeerJsNetwork,
  type PeerJsNetworkOptions,
  type PeerNetwork,
} from "@paircast/transport";
import type { Logger } from "@paircast/utils";
import { resolveSessionConfig, type SessionConfig } from "./config.js";

export interface SessionChannelOptions {
  config?: Partial<SessionConfig>;
  logger?: Logger;
}

export interface PeerJsChannelOptions
  extends SessionChannelOptions,
    Pick<PeerJsNetworkOptions, "peerOptions" | "createPeer"> {}

/**
 * Channel over any peer network, re-inviting every `discoveryRetryMs`.
 *
 * @throws ConfigError when the config is invalid
 */
export function createSessionChannel(
  network: PeerNetwork,
  options: SessionChannelOptions = {},
): MessagingChannel {
  const { discoveryRetryMs } = resolveSessionConfig(options.config);
  return new MessagingChannel(network, { discoveryRetryMs, logger: options.logger });
}

/**
 * Channel over PeerJS. The announcer registers as `serviceType` and the
 * scanner dials it every `discoveryRetryMs`.
 *
 * @example
 * ```typescript
 * const channel = createPeerJsChannel({
 *   config: { serviceType: "studio-camera" },
 *   peerOptions: { host: "192.168.1.10", port: 9000, path: "/signal" },
 * });
 * const session = new PeerSession({ role: "initiator", channel, mediaSession });
 * ```
 */
export function createPeerJsChannel(options: PeerJsChannelOptions = {}): MessagingChannel {
  const config = resolveSessionConfig(options.config);
  const network = new PeerJsNetwork({
    serviceType: config.serviceType,
    discoveryRetryMs: config.discoveryRetryMs,
    peerOptions: options.peerOptions,
    createPeer: options.createPeer,
    logger: options.logger,
  });
  return createSessionChannel(network, { config, logger: options.logger });
}
