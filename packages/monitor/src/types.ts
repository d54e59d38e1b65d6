/**
 * Monitor types
 *
 * Contracts of the capture pipeline being watched and of the negotiator
 * asked to renegotiate after a capture restart.
 */

import type { SessionConfig } from "@paircast/session";
import type { Diagnostic, Logger } from "@paircast/utils";

export type TrackReadyState = "live" | "ended";

/**
 * Local capture pipeline feeding the outgoing track.
 */
export interface CaptureSource {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Whether the outgoing track is enabled */
  isEnabled: boolean;
  readonly readyState: TrackReadyState;
  readonly isRunning: boolean;
  /** Set when a user action disabled the track; the monitor leaves it alone */
  readonly userDisabled?: boolean;
  /** Called for every captured frame; returns an unsubscribe function */
  onFrame(listener: () => void): () => void;
}

/**
 * What the monitor needs from the negotiation controller.
 */
export interface RenegotiationTarget {
  canRenegotiate(): boolean;
  requestRestart(): boolean | Promise<boolean>;
}

/**
 * Snapshot of the watched pipeline.
 */
export interface ConnectionHealth {
  /** Time of the last frame, or of the last (re)start when none arrived since */
  lastFrameAt: number;
  /** Stalls since the last frame */
  consecutiveStallCount: number;
  /** No capture restart starts before this time (ms, 0 before the first restart) */
  restartCooldownUntil: number;
  framesObserved: number;
  captureRestarts: number;
  /** A renegotiation request is waiting for the negotiator */
  renegotiationPending: boolean;
}

export type CaptureRestartReason = "stall" | "ended";

export type MonitorDiagnosticCode =
  | "capture-restart-failed"
  | "renegotiation-deferred"
  | "renegotiation-in-progress"
  | "renegotiation-refused"
  | "track-ended";

export interface TrackLifecycleMonitorEvents {
  /** No frame for longer than the stall threshold */
  stall: (silentMs: number) => void;
  captureRestarted: (reason: CaptureRestartReason) => void;
  renegotiationRequested: () => void;
  trackReenabled: () => void;
  diagnostic: (diagnostic: Diagnostic<MonitorDiagnosticCode>) => void;
}

export interface TrackLifecycleMonitorOptions {
  capture: CaptureSource;
  negotiator: RenegotiationTarget;
  config?: Partial<SessionConfig>;
  /** Optional logger for debugging */
  logger?: Logger;
  /** Clock in milliseconds; defaults to `Date.now` */
  now?: () => number;
}
