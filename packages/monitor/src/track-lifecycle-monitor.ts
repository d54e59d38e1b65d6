/**
 * Watchdog over the local capture pipeline.
 *
 * Every `healthCheckIntervalMs` (first after `initialHealthCheckDelayMs`)
 * the monitor checks that frames keep arriving. When they stop for longer
 * than `stallThresholdMs`, or the track ends, capture is stopped, restarted
 * after `captureRestartDelayMs` and the negotiator is asked for an ICE
 * restart so the remote side picks the new pipeline up.
 *
 * After a restart no other restart starts for `stallThresholdMs`, so a
 * track that ends again right away does not spin the capture.
 *
 * The negotiator is only asked when it reports it can renegotiate;
 * otherwise the request waits for a later check. A restart that happens
 * while the monitor's previous request is still being negotiated does not
 * ask again.
 */

import { resolveSessionConfig, type SessionConfig } from "@paircast/session";
import {
  type Diagnostic,
  Emitter,
  type Logger,
  logDiagnostic,
  noopLogger,
  toError,
} from "@paircast/utils";
import type {
  CaptureRestartReason,
  CaptureSource,
  ConnectionHealth,
  MonitorDiagnosticCode,
  RenegotiationTarget,
  TrackLifecycleMonitorEvents,
  TrackLifecycleMonitorOptions,
} from "./types.js";

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class TrackLifecycleMonitor extends Emitter<TrackLifecycleMonitorEvents> {
  readonly config: SessionConfig;

  private readonly capture: CaptureSource;
  private readonly negotiator: RenegotiationTarget;
  private readonly logger: Logger;
  private readonly now: () => number;

  private started = false;
  private restarting = false;
  private renegotiationPending = false;
  /** Our last request was accepted and its negotiation has not finished */
  private requestOutstanding = false;
  private firstCheck: ReturnType<typeof setTimeout> | null = null;
  private interval: ReturnType<typeof setInterval> | null = null;
  private unsubscribeFrames: (() => void) | null = null;

  private lastFrameAt = 0;
  private lastRestartAt: number | null = null;
  private consecutiveStallCount = 0;
  private framesObserved = 0;
  private captureRestarts = 0;

  constructor(options: TrackLifecycleMonitorOptions) {
    const logger = options.logger ?? noopLogger;
    super((error, event) => logger.error?.(`listener for "${event}" failed`, error));
    this.logger = logger;
    this.capture = options.capture;
    this.negotiator = options.negotiator;
    this.config = resolveSessionConfig(options.config);
    this.now = options.now ?? (() => Date.now());
  }

  get isStarted(): boolean {
    return this.started;
  }

  get health(): ConnectionHealth {
    return {
      lastFrameAt: this.lastFrameAt,
      consecutiveStallCount: this.consecutiveStallCount,
      restartCooldownUntil: this.restartCooldownUntil(),
      framesObserved: this.framesObserved,
      captureRestarts: this.captureRestarts,
      renegotiationPending: this.renegotiationPending,
    };
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.lastFrameAt = this.now();
    this.unsubscribeFrames = this.capture.onFrame(this.onFrame);

    this.firstCheck = setTimeout(() => {
      this.firstCheck = null;
      this.tick();
      this.interval = setInterval(() => this.tick(), this.config.healthCheckIntervalMs);
    }, this.config.initialHealthCheckDelayMs);
    this.logger.debug?.(`monitoring capture, first check in ${this.config.initialHealthCheckDelayMs}ms`);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    if (this.firstCheck !== null) {
      clearTimeout(this.firstCheck);
      this.firstCheck = null;
    }
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.unsubscribeFrames?.();
    this.unsubscribeFrames = null;
    this.renegotiationPending = false;
    this.requestOutstanding = false;
  }

  /**
   * Run one health check. Called by the interval; public for tests.
   */
  async check(): Promise<void> {
    if (!this.started || this.restarting) return;
    const now = this.now();

    if (this.requestOutstanding && this.negotiator.canRenegotiate()) {
      this.requestOutstanding = false;
    }
    if (this.renegotiationPending) {
      await this.requestRenegotiation();
    }

    const cooldownUntil = this.restartCooldownUntil();
    if (this.capture.isRunning && now < cooldownUntil) {
      this.logger.debug?.(`capture restarted recently, no restart before ${cooldownUntil}`);
      this.reenableTrack();
      return;
    }

    if (this.capture.readyState === "ended" && this.capture.isRunning) {
      this.report("track-ended", "capture track ended, restarting capture");
      await this.restartCapture("ended");
      return;
    }

    const silentMs = now - this.lastFrameAt;
    if (this.capture.isRunning && silentMs > this.config.stallThresholdMs) {
      this.consecutiveStallCount++;
      this.logger.warn?.(`no frames for ${silentMs}ms, restarting capture`);
      this.emit("stall", silentMs);
      await this.restartCapture("stall");
      return;
    }

    this.reenableTrack();
  }

  /** A restart is followed by a quiet period as long as the stall threshold */
  private restartCooldownUntil(): number {
    return this.lastRestartAt === null ? 0 : this.lastRestartAt + this.config.stallThresholdMs;
  }

  private tick(): void {
    this.check().catch((error: unknown) => {
      this.logger.error?.("health check failed", error);
    });
  }

  private readonly onFrame = (): void => {
    this.lastFrameAt = this.now();
    this.framesObserved++;
    this.consecutiveStallCount = 0;
  };

  private async restartCapture(reason: CaptureRestartReason): Promise<void> {
    this.restarting = true;
    try {
      await this.capture.stop();
      await sleep(this.config.captureRestartDelayMs);
      if (!this.started) return;
      await this.capture.start();
    } catch (error) {
      this.report("capture-restart-failed", toError(error).message, { reason });
      return;
    } finally {
      this.restarting = false;
    }

    const restartedAt = this.now();
    this.lastFrameAt = restartedAt;
    this.lastRestartAt = restartedAt;
    this.captureRestarts++;
    this.reenableTrack();
    this.logger.info?.(`capture restarted (${reason})`);
    this.emit("captureRestarted", reason);

    if (this.requestOutstanding && !this.negotiator.canRenegotiate()) {
      this.report("renegotiation-in-progress", "previous renegotiation still running, not asking again");
      return;
    }
    this.renegotiationPending = true;
    await this.requestRenegotiation();
  }

  private async requestRenegotiation(): Promise<void> {
    if (!this.negotiator.canRenegotiate()) {
      this.report("renegotiation-deferred", "negotiator busy, retrying on the next check");
      return;
    }
    this.renegotiationPending = false;
    const accepted = await this.negotiator.requestRestart();
    if (!accepted) {
      this.renegotiationPending = true;
      this.report("renegotiation-refused", "negotiator refused the restart, retrying on the next check");
      return;
    }
    this.requestOutstanding = true;
    this.emit("renegotiationRequested");
  }

  private reenableTrack(): void {
    if (this.capture.isEnabled || this.capture.userDisabled) return;
    this.capture.isEnabled = true;
    this.logger.info?.("re-enabled disabled capture track");
    this.emit("trackReenabled");
  }

  private report(
    code: MonitorDiagnosticCode,
    message: string,
    details?: Record<string, unknown>,
  ): void {
    const diagnostic: Diagnostic<MonitorDiagnosticCode> = { code, message, details };
    logDiagnostic(this.logger, diagnostic, code === "capture-restart-failed" ? "error" : "info");
    this.emit("diagnostic", diagnostic);
  }
}
