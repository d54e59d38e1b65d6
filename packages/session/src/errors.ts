/**
 * Negotiation error classes.
 */

import { PaircastError } from "@paircast/utils";
import type { NegotiationState } from "./types.js";

/**
 * Payload on the channel is not a valid signalling message.
 */
export class SignalDecodeError extends PaircastError {
  constructor(message: string) {
    super(message);
    this.name = "SignalDecodeError";
  }
}

/**
 * Base error for negotiation failures.
 */
export class NegotiationError extends PaircastError {
  constructor(message: string) {
    super(message);
    this.name = "NegotiationError";
  }
}

/**
 * No transition is defined for the event in the current state.
 */
export class InvalidTransitionError extends NegotiationError {
  readonly state: NegotiationState;
  readonly event: string;

  constructor(state: NegotiationState, event: string) {
    super(`No transition for event "${event}" from state "${state}"`);
    this.name = "InvalidTransitionError";
    this.state = state;
    this.event = event;
  }
}

/**
 * The media session rejected a description or candidate operation.
 */
export class MediaSessionError extends PaircastError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "MediaSessionError";
    this.operation = operation;
    this.cause = cause;
  }
}
