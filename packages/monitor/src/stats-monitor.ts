/**
 * Periodic outbound stats check.
 *
 * Samples the media session every `intervalMs`, compares each sample with
 * the previous one and reports every issue `analyzeStats` flags as a
 * diagnostic.
 */

import {
  ConfigError,
  type Diagnostic,
  Emitter,
  type Logger,
  logDiagnostic,
  noopLogger,
  toError,
} from "@paircast/utils";
import {
  analyzeStats,
  type StatsHealthReport,
  type StatsIssue,
  type StatsSample,
} from "./stats-health.js";

export const DEFAULT_STATS_INTERVAL_MS = 2000;

/**
 * Anything that can produce outbound counters, such as `RtcMediaSession`.
 */
export interface StatsSource {
  getStatsSample(): Promise<StatsSample>;
}

export type StatsDiagnosticCode = StatsIssue | "stats-failed";

export interface StatsMonitorEvents {
  /** One analysed interval */
  report: (report: StatsHealthReport) => void;
  diagnostic: (diagnostic: Diagnostic<StatsDiagnosticCode>) => void;
}

export interface StatsMonitorOptions {
  source: StatsSource;
  /**
   * Time between samples (ms).
   * @default 2000
   */
  intervalMs?: number;
  /** Optional logger for debugging */
  logger?: Logger;
}

function describeIssue(issue: StatsIssue, report: StatsHealthReport, intervalMs: number): string {
  switch (issue) {
    case "low-fps":
      return `sending ${report.framesPerSecond} fps`;
    case "frozen":
      return `no bytes sent for ${intervalMs}ms`;
    case "packet-loss":
      return `${report.packetsLostDelta} packets lost`;
  }
}

export class StatsMonitor extends Emitter<StatsMonitorEvents> {
  readonly intervalMs: number;

  private readonly source: StatsSource;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private previous: StatsSample | null = null;
  private sampling = false;

  constructor(options: StatsMonitorOptions) {
    const logger = options.logger ?? noopLogger;
    super((error, event) => logger.error?.(`listener for "${event}" failed`, error));
    const intervalMs = options.intervalMs ?? DEFAULT_STATS_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new ConfigError(
        "intervalMs",
        `expected a positive number of milliseconds, got ${intervalMs}`,
      );
    }
    this.intervalMs = intervalMs;
    this.source = options.source;
    this.logger = logger;
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer !== null) return;
    this.previous = null;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    this.previous = null;
  }

  /**
   * Take one sample and analyse it against the previous one.
   *
   * @returns null for the first sample, which has nothing to compare with
   */
  async sample(): Promise<StatsHealthReport | null> {
    const current = await this.source.getStatsSample();
    const previous = this.previous;
    this.previous = current;
    if (previous === null) return null;

    const report = analyzeStats(previous, current);
    this.logger.debug?.(
      `outbound ${report.bitrateMbps.toFixed(2)} Mbps at ${report.framesPerSecond} fps`,
    );
    this.emit("report", report);
    const intervalMs = current.timestamp - previous.timestamp;
    for (const issue of report.issues) {
      this.report(issue, describeIssue(issue, report, intervalMs));
    }
    return report;
  }

  private tick(): void {
    if (this.sampling) return;
    this.sampling = true;
    this.sample()
      .catch((error: unknown) => {
        this.report("stats-failed", toError(error).message);
      })
      .finally(() => {
        this.sampling = false;
      });
  }

  private report(code: StatsDiagnosticCode, message: string): void {
    const diagnostic: Diagnostic<StatsDiagnosticCode> = { code, message };
    logDiagnostic(this.logger, diagnostic, code === "stats-failed" ? "error" : "warn");
    this.emit("diagnostic", diagnostic);
  }
}
