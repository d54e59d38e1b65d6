/**
 * WebRTC media types.
 */

import type { Logger } from "@paircast/utils";

/**
 * Options for the media session adapter.
 */
export interface RtcMediaSessionOptions {
  /** Track kind a sender must carry for `hasLocalMedia()` (default: "video") */
  requiredMediaKind?: string;
  /** Optional logger for debugging */
  logger?: Logger;
}

/**
 * Options for building the peer connection configuration.
 */
export interface PeerConnectionConfigOptions {
  /** ICE servers for NAT traversal (default: public STUN servers) */
  iceServers?: RTCIceServer[];
  /** Candidates gathered before an offer is made (default: 2) */
  iceCandidatePoolSize?: number;
}

/**
 * Default ICE servers (public STUN servers).
 */
export const DEFAULT_ICE_SERVERS: RTCIceServer[] = [
  { urls: "stun:stun.l.google.com:19302" },
  { urls: "stun:stun1.l.google.com:19302" },
  { urls: "stun:stun2.l.google.com:19302" },
];

export const DEFAULT_ICE_CANDIDATE_POOL_SIZE = 2;

/**
 * Configuration for a media peer connection: one bundle per media type
 * and RTCP multiplexed on the RTP port.
 */
export function createPeerConnectionConfig(
  options: PeerConnectionConfigOptions = {},
): RTCConfiguration {
  return {
    iceServers: options.iceServers ?? DEFAULT_ICE_SERVERS,
    bundlePolicy: "balanced",
    rtcpMuxPolicy: "require",
    iceCandidatePoolSize: options.iceCandidatePoolSize ?? DEFAULT_ICE_CANDIDATE_POOL_SIZE,
  };
}
