/**
 * @paircast/media-webrtc
 *
 * `MediaSession` implementation over an `RTCPeerConnection`, plus the
 * connection configuration a camera/viewer pair uses.
 *
 * @packageDocumentation
 */

export { RtcMediaSession } from "./rtc-media-session.js";
export {
  createPeerConnectionConfig,
  DEFAULT_ICE_CANDIDATE_POOL_SIZE,
  DEFAULT_ICE_SERVERS,
  type PeerConnectionConfigOptions,
  type RtcMediaSessionOptions,
} from "./types.js";
