/**
 * Transport-related error classes.
 */

import { PaircastError } from "@paircast/utils";

/**
 * Base error for transport operations.
 */
export class TransportError extends PaircastError {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * A payload could not be handed to the peer.
 */
export class SendFailedError extends TransportError {
  readonly peerId: string;

  constructor(peerId: string, reason: string) {
    super(`Send to ${peerId} failed: ${reason}`);
    this.name = "SendFailedError";
    this.peerId = peerId;
  }
}

/**
 * Advertising, browsing or inviting failed.
 */
export class DiscoveryError extends TransportError {
  readonly peerId?: string;

  constructor(message: string, peerId?: string) {
    super(message);
    this.name = "DiscoveryError";
    this.peerId = peerId;
  }
}
