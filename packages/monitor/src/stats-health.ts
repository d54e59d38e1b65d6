/**
 * Outbound video statistics between two samples.
 */

/** Outbound RTP counters at one point in time */
export interface StatsSample {
  /** Milliseconds */
  timestamp: number;
  bytesSent: number;
  packetsSent: number;
  packetsLost: number;
  framesPerSecond: number;
}

export type StatsIssue = "low-fps" | "frozen" | "packet-loss";

export interface StatsHealthReport {
  bitrateMbps: number;
  framesPerSecond: number;
  packetsLostDelta: number;
  issues: StatsIssue[];
}

/** Below this, a non-zero frame rate counts as low */
export const LOW_FPS_THRESHOLD = 5;

/** No bytes sent for longer than this means the stream is frozen */
export const FROZEN_INTERVAL_MS = 3000;

export function analyzeStats(previous: StatsSample, current: StatsSample): StatsHealthReport {
  const bytesDelta = current.bytesSent - previous.bytesSent;
  const intervalMs = current.timestamp - previous.timestamp;
  const packetsLostDelta = Math.max(0, current.packetsLost - previous.packetsLost);

  const bitrateMbps = intervalMs > 0 ? (bytesDelta * 8) / (intervalMs / 1000) / 1_000_000 : 0;

  const issues: StatsIssue[] = [];
  if (current.framesPerSecond > 0 && current.framesPerSecond < LOW_FPS_THRESHOLD) {
    issues.push("low-fps");
  }
  if (bytesDelta === 0 && intervalMs > FROZEN_INTERVAL_MS) {
    issues.push("frozen");
  }
  if (packetsLostDelta > 0) {
    issues.push("packet-loss");
  }

  return {
    bitrateMbps,
    framesPerSecond: current.framesPerSecond,
    packetsLostDelta,
    issues,
  };
}
