/**
 * Negotiation transition table.
 *
 * Transitions are `[source, event, target]` tuples; `"*"` as source
 * matches every state. The controller decides which events to fire, the
 * table decides where they lead.
 */

import { InvalidTransitionError } from "./errors.js";
import type { NegotiationState } from "./types.js";

export type NegotiationEvent =
  | "create-offer"
  | "offer-applied"
  | "offer-abandoned"
  | "offer-rolled-back"
  | "remote-offer"
  | "remote-offer-applied"
  | "answer-sent"
  | "answer-applied"
  | "restart-requested"
  | "media-failed"
  | "connection-recovered";

export type NegotiationTransition = [NegotiationState | "*", NegotiationEvent, NegotiationState];

export const NEGOTIATION_TRANSITIONS: readonly NegotiationTransition[] = [
  // Local offer
  ["idle", "create-offer", "local-offer-pending"],
  ["stable", "create-offer", "local-offer-pending"],
  ["renegotiating", "create-offer", "local-offer-pending"],
  ["failed", "create-offer", "local-offer-pending"],
  ["local-offer-pending", "offer-applied", "awaiting-answer"],
  ["awaiting-answer", "answer-applied", "stable"],

  // Offer failed before an answer was applied
  ["local-offer-pending", "offer-abandoned", "idle"],
  ["awaiting-answer", "offer-abandoned", "idle"],
  ["renegotiating", "offer-abandoned", "idle"],
  ["local-offer-pending", "offer-rolled-back", "stable"],
  ["awaiting-answer", "offer-rolled-back", "stable"],
  ["renegotiating", "offer-rolled-back", "stable"],

  // Remote offer
  ["idle", "remote-offer", "remote-offer-received"],
  ["stable", "remote-offer", "remote-offer-received"],
  ["failed", "remote-offer", "remote-offer-received"],
  ["remote-offer-received", "remote-offer-applied", "local-answer-pending"],
  ["local-answer-pending", "answer-sent", "stable"],

  // Restarts and failures
  ["idle", "restart-requested", "renegotiating"],
  ["stable", "restart-requested", "renegotiating"],
  ["*", "media-failed", "failed"],
  ["failed", "connection-recovered", "stable"],
];

/**
 * Lookup over a transition list.
 */
export class NegotiationFsm {
  private readonly transitionIndex = new Map<
    NegotiationState | "*",
    Map<NegotiationEvent, NegotiationState>
  >();

  constructor(transitions: readonly NegotiationTransition[] = NEGOTIATION_TRANSITIONS) {
    for (const [source, event, target] of transitions) {
      let stateTransitions = this.transitionIndex.get(source);
      if (!stateTransitions) {
        stateTransitions = new Map();
        this.transitionIndex.set(source, stateTransitions);
      }
      stateTransitions.set(event, target);
    }
  }

  /**
   * Target of `event` from `state`, or undefined when none is defined.
   */
  target(state: NegotiationState, event: NegotiationEvent): NegotiationState | undefined {
    return (
      this.transitionIndex.get(state)?.get(event) ?? this.transitionIndex.get("*")?.get(event)
    );
  }

  can(state: NegotiationState, event: NegotiationEvent): boolean {
    return this.target(state, event) !== undefined;
  }

  /**
   * @throws InvalidTransitionError when no transition is defined
   */
  next(state: NegotiationState, event: NegotiationEvent): NegotiationState {
    const target = this.target(state, event);
    if (target === undefined) {
      throw new InvalidTransitionError(state, event);
    }
    return target;
  }
}
