/**
 * Offer/answer negotiation controller.
 *
 * Drives a media session through one offer/answer exchange at a time. Every
 * operation, whether requested by the application, a remote message or a
 * media callback, runs as one task on a single `SerialQueue`, so description
 * create/apply calls never overlap and the state is only ever read and
 * written by the task that owns it.
 *
 * Each task captures the session epoch it started in. `reset()` bumps the
 * epoch; a task that resumes after a reset drops its result instead of
 * touching the new session.
 *
 * Remote candidates that arrive before a remote description was applied
 * are buffered and drained, in arrival order, right after it is.
 *
 * Failure handling:
 * - a failing offer reverts to `stable` when a remote description was
 *   applied in this epoch, otherwise to `idle`
 * - a failing answer, and a failed media connection, move to `failed`
 * - the initiator answers a failed connection with one ICE restart offer
 *   after `restartCooldownMs`; further failures while it is pending are
 *   absorbed
 *
 * Public methods never reject. Refused operations and swallowed failures
 * are reported on the `diagnostic` event.
 */

import {
  type Diagnostic,
  Emitter,
  type Logger,
  type LogLevel,
  logDiagnostic,
  noopLogger,
  SerialQueue,
  toError,
} from "@paircast/utils";
import { resolveSessionConfig, type SessionConfig } from "./config.js";
import { InvalidTransitionError, MediaSessionError } from "./errors.js";
import { type NegotiationEvent, NegotiationFsm } from "./negotiation-fsm.js";
import { PendingCandidateBuffer } from "./pending-candidates.js";
import { RestartScheduler } from "./restart-scheduler.js";
import { countMediaSections, hasMediaSection } from "./sdp.js";
import { decodeSignal } from "./signal-codec.js";
import type {
  IceCandidate,
  MediaConnectionState,
  MediaSession,
  NegotiationControllerEvents,
  NegotiationControllerOptions,
  NegotiationDiagnosticCode,
  NegotiationState,
  PeerRole,
  SessionDescription,
  SignalMessage,
} from "./types.js";

const USER_OFFER_STATES: readonly NegotiationState[] = ["idle", "stable"];
const RESTART_REQUEST_STATES: readonly NegotiationState[] = ["renegotiating"];
const SCHEDULED_RESTART_STATES: readonly NegotiationState[] = ["failed"];
const RENEGOTIATION_STATES: readonly NegotiationState[] = ["stable"];

const DIAGNOSTIC_LEVELS: Partial<
  Record<NegotiationDiagnosticCode, Exclude<LogLevel, "silent">>
> = {
  "no-local-media": "info",
  "renegotiation-ignored": "debug",
  "stale-epoch": "debug",
  "media-error": "error",
  "invalid-transition": "error",
};

export class NegotiationController extends Emitter<NegotiationControllerEvents> {
  readonly role: PeerRole;
  readonly config: SessionConfig;

  private readonly mediaSession: MediaSession;
  private readonly sendMessage: (message: SignalMessage) => void;
  private readonly logger: Logger;
  private readonly fsm = new NegotiationFsm();
  private readonly queue = new SerialQueue();
  private readonly candidates = new PendingCandidateBuffer();
  private readonly restarts: RestartScheduler;
  private readonly detach: Array<() => void>;

  private currentState: NegotiationState = "idle";
  private currentEpoch = 0;
  private remoteApplied = false;
  private closed = false;

  constructor(options: NegotiationControllerOptions) {
    const logger = options.logger ?? noopLogger;
    super((error, event) => logger.error?.(`listener for "${event}" failed`, error));
    this.logger = logger;
    this.role = options.role;
    this.mediaSession = options.mediaSession;
    this.sendMessage = options.send;
    this.config = resolveSessionConfig(options.config);
    this.restarts = new RestartScheduler(this.config.restartCooldownMs);

    this.detach = [
      this.mediaSession.onIceCandidate((candidate) => this.handleLocalCandidate(candidate)),
      this.mediaSession.onConnectionStateChange((state) => {
        void this.handleConnectionStateChange(state);
      }),
      this.mediaSession.onRenegotiationNeeded(() => {
        void this.handleRenegotiationNeeded();
      }),
    ];
  }

  get state(): NegotiationState {
    return this.currentState;
  }

  get epoch(): number {
    return this.currentEpoch;
  }

  get pendingCandidateCount(): number {
    return this.candidates.size;
  }

  /**
   * True once a remote description was applied in the current epoch.
   */
  get hasRemoteDescription(): boolean {
    return this.remoteApplied;
  }

  get isRestartPending(): boolean {
    return this.restarts.isPending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Create and send an offer.
   *
   * Only the initiator offers, and only from `idle` or `stable`. Without
   * local media the call does nothing.
   *
   * @param restart - Request an ICE restart
   */
  createOffer(restart = false): Promise<void> {
    return this.enqueue((epoch) => this.runOffer(epoch, restart, USER_OFFER_STATES));
  }

  /**
   * Answer a remote offer.
   */
  handleOffer(sdp: string): Promise<void> {
    return this.enqueue((epoch) => this.runRemoteOffer(epoch, sdp));
  }

  /**
   * Apply the remote answer to our outstanding offer.
   */
  handleAnswer(sdp: string): Promise<void> {
    return this.enqueue((epoch) => this.runRemoteAnswer(epoch, sdp));
  }

  /**
   * Apply a remote candidate, or buffer it until a remote description exists.
   */
  handleCandidate(candidate: IceCandidate): Promise<void> {
    return this.enqueue((epoch) => this.runRemoteCandidate(epoch, candidate));
  }

  /**
   * Decode a payload from the messaging channel and dispatch it.
   */
  handleMessage(payload: Uint8Array): Promise<void> {
    if (this.closed) return Promise.resolve();
    let message: SignalMessage;
    try {
      message = decodeSignal(payload);
    } catch (error) {
      this.report("malformed-message", toError(error).message, { bytes: payload.byteLength });
      return Promise.resolve();
    }
    this.logger.debug?.(`received ${message.type}`);
    switch (message.type) {
      case "offer":
        return this.handleOffer(message.sdp);
      case "answer":
        return this.handleAnswer(message.sdp);
      case "candidate":
        return this.handleCandidate({
          candidate: message.sdp,
          sdpMid: message.sdpMid,
          sdpMLineIndex: message.sdpMLineIndex,
        });
    }
  }

  /**
   * Forward a locally gathered candidate to the peer right away.
   */
  handleLocalCandidate(candidate: IceCandidate): void {
    if (this.closed) return;
    this.transmit({
      type: "candidate",
      sdp: candidate.candidate,
      sdpMid: candidate.sdpMid,
      sdpMLineIndex: candidate.sdpMLineIndex,
    });
  }

  handleConnectionStateChange(state: MediaConnectionState): Promise<void> {
    return this.enqueue(() => {
      this.logger.debug?.(`media connection ${state}`);
      if (state === "failed") {
        this.onConnectionFailed();
      } else if (state === "connected") {
        this.restarts.cancel();
        if (this.currentState === "failed" && this.remoteApplied) {
          this.transition("connection-recovered");
        }
      }
    });
  }

  /**
   * Renegotiate after the media session changed its tracks. Honored only
   * by the initiator in `stable`.
   */
  handleRenegotiationNeeded(): Promise<void> {
    return this.enqueue(async (epoch) => {
      if (this.role !== "initiator" || this.currentState !== "stable") {
        this.report(
          "renegotiation-ignored",
          `renegotiation needed ignored (${this.role}, ${this.currentState})`,
        );
        return;
      }
      await this.runOffer(epoch, false, RENEGOTIATION_STATES);
    });
  }

  /**
   * Whether a restart request would be accepted right now.
   */
  canRenegotiate(): boolean {
    return (
      !this.closed &&
      this.role === "initiator" &&
      (this.currentState === "idle" || this.currentState === "stable") &&
      this.queue.pending === 0
    );
  }

  /**
   * Start an ICE restart offer on behalf of an external monitor.
   *
   * @returns false when refused (wrong role, state or an operation in flight)
   */
  requestRestart(): boolean {
    if (!this.canRenegotiate()) {
      if (!this.closed) {
        this.report("offer-refused", `restart refused in state ${this.currentState}`);
      }
      return false;
    }
    this.transition("restart-requested");
    void this.enqueue((epoch) => this.runOffer(epoch, true, RESTART_REQUEST_STATES));
    return true;
  }

  /**
   * Resolve once every queued operation has finished.
   */
  whenIdle(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Tear down the current epoch: pending candidates and any armed restart
   * are discarded and the state returns to `idle`.
   */
  reset(): void {
    this.currentEpoch++;
    this.candidates.discard();
    this.restarts.cancel();
    this.remoteApplied = false;

    const previous = this.currentState;
    if (previous !== "idle") {
      this.currentState = "idle";
      this.emit("stateChange", "idle", previous);
    }
    this.logger.info?.(`negotiation reset, epoch ${this.currentEpoch}`);
  }

  /**
   * Reset and stop listening to the media session. Later calls do nothing.
   */
  close(): void {
    if (this.closed) return;
    this.reset();
    this.closed = true;
    for (const unsubscribe of this.detach.splice(0)) {
      unsubscribe();
    }
  }

  /**
   * Queue a task tagged with the epoch of the call. A task whose epoch
   * ended before it got to run is dropped.
   */
  private enqueue(task: (epoch: number) => void | Promise<void>): Promise<void> {
    if (this.closed) return Promise.resolve();
    const epoch = this.currentEpoch;
    const run = (): void | Promise<void> => {
      if (this.isStale(epoch, "queued operation")) return;
      return task(epoch);
    };
    return this.queue.run(run).catch((error: unknown) => {
      if (error instanceof InvalidTransitionError) {
        this.report("invalid-transition", error.message, {
          state: error.state,
          event: error.event,
        });
        return;
      }
      this.report("media-error", toError(error).message);
    });
  }

  private async runOffer(
    epoch: number,
    restart: boolean,
    allowed: readonly NegotiationState[],
  ): Promise<void> {
    if (this.role !== "initiator") {
      this.report("offer-refused", "the responder does not create offers");
      return;
    }
    if (!allowed.includes(this.currentState)) {
      this.report("offer-refused", `cannot create an offer in state ${this.currentState}`);
      return;
    }
    if (!this.mediaSession.hasLocalMedia()) {
      this.report("no-local-media", "no local media attached, offer not created");
      if (this.currentState === "renegotiating") {
        this.rollBack();
      }
      return;
    }

    this.transition("create-offer");
    let offer: SessionDescription;
    try {
      offer = await this.mediaSession.createLocalOffer({ iceRestart: restart });
      if (this.isStale(epoch, "createLocalOffer")) return;
      await this.mediaSession.setLocalDescription(offer);
    } catch (error) {
      if (this.isStale(epoch, "offer")) return;
      this.report("media-error", new MediaSessionError("offer", error).message);
      this.rollBack();
      return;
    }
    if (this.isStale(epoch, "setLocalDescription")) return;

    this.transmit({ type: "offer", sdp: offer.sdp });
    this.transition("offer-applied");
  }

  private async runRemoteOffer(epoch: number, sdp: string): Promise<void> {
    const kind = this.config.requiredMediaKind;
    if (!hasMediaSection(sdp, kind)) {
      this.report("offer-without-media", `offer has no m=${kind} section`, {
        mediaSections: countMediaSections(sdp),
      });
      return;
    }
    if (!this.fsm.can(this.currentState, "remote-offer")) {
      this.report("offer-out-of-state", `offer dropped in state ${this.currentState}`);
      return;
    }

    this.transition("remote-offer");
    try {
      await this.mediaSession.setRemoteDescription({ type: "offer", sdp });
      if (this.isStale(epoch, "setRemoteDescription")) return;
      this.remoteApplied = true;
      await this.applyPendingCandidates(epoch);
      if (this.isStale(epoch, "pending candidates")) return;
      this.transition("remote-offer-applied");

      const answer = await this.mediaSession.createLocalAnswer();
      if (this.isStale(epoch, "createLocalAnswer")) return;
      await this.mediaSession.setLocalDescription(answer);
      if (this.isStale(epoch, "setLocalDescription")) return;

      this.transmit({ type: "answer", sdp: answer.sdp });
      this.transition("answer-sent");
    } catch (error) {
      if (this.isStale(epoch, "answer")) return;
      this.report("media-error", new MediaSessionError("answer", error).message);
      this.transition("media-failed");
    }
  }

  private async runRemoteAnswer(epoch: number, sdp: string): Promise<void> {
    if (this.currentState !== "awaiting-answer") {
      this.report("answer-out-of-state", `answer dropped in state ${this.currentState}`);
      return;
    }

    try {
      await this.mediaSession.setRemoteDescription({ type: "answer", sdp });
    } catch (error) {
      if (this.isStale(epoch, "setRemoteDescription")) return;
      this.report("media-error", new MediaSessionError("setRemoteDescription", error).message);
      this.rollBack();
      return;
    }
    if (this.isStale(epoch, "setRemoteDescription")) return;

    this.remoteApplied = true;
    await this.applyPendingCandidates(epoch);
    if (this.isStale(epoch, "pending candidates")) return;
    this.transition("answer-applied");
  }

  private async runRemoteCandidate(epoch: number, candidate: IceCandidate): Promise<void> {
    if (!this.remoteApplied) {
      this.candidates.add(candidate, epoch);
      this.logger.debug?.(`buffered candidate, ${this.candidates.size} pending`);
      return;
    }
    await this.applyCandidate(candidate);
  }

  private async applyPendingCandidates(epoch: number): Promise<void> {
    const pending = this.candidates.drain(epoch);
    if (pending.length > 0) {
      this.logger.debug?.(`applying ${pending.length} buffered candidates`);
    }
    for (const candidate of pending) {
      if (epoch !== this.currentEpoch) return;
      await this.applyCandidate(candidate);
    }
  }

  private async applyCandidate(candidate: IceCandidate): Promise<void> {
    try {
      await this.mediaSession.addIceCandidate(candidate);
    } catch (error) {
      this.report("candidate-failed", new MediaSessionError("addIceCandidate", error).message, {
        candidate: candidate.candidate,
      });
    }
  }

  private onConnectionFailed(): void {
    if (this.currentState !== "failed") {
      this.transition("media-failed");
    }
    if (this.role !== "initiator") return;

    const armed = this.restarts.schedule(() => {
      void this.enqueue((epoch) => this.runOffer(epoch, true, SCHEDULED_RESTART_STATES));
    });
    if (armed) {
      this.logger.info?.(`ICE restart in ${this.restarts.cooldownMs}ms`);
    } else {
      this.logger.debug?.("ICE restart already pending");
    }
  }

  /**
   * Return to the last stable point after a failed offer.
   */
  private rollBack(): void {
    this.transition(this.remoteApplied ? "offer-rolled-back" : "offer-abandoned");
  }

  private isStale(epoch: number, step: string): boolean {
    if (epoch === this.currentEpoch) return false;
    this.report("stale-epoch", `${step} finished after a reset, result dropped`, {
      epoch,
      current: this.currentEpoch,
    });
    return true;
  }

  private transmit(message: SignalMessage): void {
    try {
      this.sendMessage(message);
    } catch (error) {
      this.report("signal-send-failed", `${message.type}: ${toError(error).message}`);
      return;
    }
    this.emit("signal", message);
  }

  private transition(event: NegotiationEvent): void {
    const previous = this.currentState;
    const next = this.fsm.next(previous, event);
    if (next === previous) return;
    this.currentState = next;
    this.logger.debug?.(`${previous} -> ${next} (${event})`);
    this.emit("stateChange", next, previous);
  }

  private report(
    code: NegotiationDiagnosticCode,
    message: string,
    details?: Record<string, unknown>,
  ): void {
    const diagnostic: Diagnostic<NegotiationDiagnosticCode> = { code, message, details };
    logDiagnostic(this.logger, diagnostic, DIAGNOSTIC_LEVELS[code] ?? "warn");
    this.emit("diagnostic", diagnostic);
  }
}
