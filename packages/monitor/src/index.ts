/**
 * @paircast/monitor
 *
 * Keeps the outgoing capture alive: a stall watchdog that restarts capture
 * and asks the negotiator for an ICE restart, plus a periodic outbound stats
 * check.
 *
 * @example
 * ```typescript
 * import { StatsMonitor, TrackLifecycleMonitor } from "@paircast/monitor";
 *
 * const monitor = new TrackLifecycleMonitor({
 *   capture,
 *   negotiator: session.controller,
 * });
 * monitor.on("captureRestarted", (reason) => console.log(`capture restarted: ${reason}`));
 *
 * const stats = new StatsMonitor({ source: mediaSession });
 * stats.on("diagnostic", (d) => console.warn(d.code, d.message));
 * stats.start();
 * ```
 *
 * @packageDocumentation
 */

export {
  analyzeStats,
  FROZEN_INTERVAL_MS,
  LOW_FPS_THRESHOLD,
  type StatsHealthReport,
  type StatsIssue,
  type StatsSample,
} from "./stats-health.js";
export {
  DEFAULT_STATS_INTERVAL_MS,
  type StatsDiagnosticCode,
  StatsMonitor,
  type StatsMonitorEvents,
  type StatsMonitorOptions,
  type StatsSource,
} from "./stats-monitor.js";
export { TrackLifecycleMonitor } from "./track-lifecycle-monitor.js";
export type * from "./types.js";
