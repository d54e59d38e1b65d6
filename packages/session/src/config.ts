import { ConfigError } from "@paircast/utils";

/**
 * Settings shared by the negotiation controller, the session wiring and
 * the track monitor.
 */
export interface SessionConfig {
  /**
   * Delay between a failed connection and the restart offer (ms).
   * @default 2000
   */
  restartCooldownMs: number;

  /**
   * Interval between track health checks (ms).
   * @default 5000
   */
  healthCheckIntervalMs: number;

  /**
   * Delay before the first health check after the monitor starts (ms).
   * @default 2000
   */
  initialHealthCheckDelayMs: number;

  /**
   * Frame silence counted as a stalled capture (ms).
   * @default 6000
   */
  stallThresholdMs: number;

  /**
   * Pause between stopping and starting capture during a restart (ms).
   * @default 1000
   */
  captureRestartDelayMs: number;

  /**
   * Media section an offer must carry to be answered.
   * @example "video" matches an `m=video` line
   * @default "video"
   */
  requiredMediaKind: string;

  /**
   * Discovery service name.
   * @default "paircast-signal"
   */
  serviceType: string;

  /**
   * Interval after which a scanner invites again (ms).
   * @default 3000
   */
  discoveryRetryMs: number;
}

export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = Object.freeze({
  restartCooldownMs: 2000,
  healthCheckIntervalMs: 5000,
  initialHealthCheckDelayMs: 2000,
  stallThresholdMs: 6000,
  captureRestartDelayMs: 1000,
  requiredMediaKind: "video",
  serviceType: "paircast-signal",
  discoveryRetryMs: 3000,
});

const DURATION_FIELDS = [
  "restartCooldownMs",
  "healthCheckIntervalMs",
  "initialHealthCheckDelayMs",
  "stallThresholdMs",
  "captureRestartDelayMs",
  "discoveryRetryMs",
] as const;

/**
 * Fill defaults and validate.
 *
 * @throws ConfigError when a duration is negative or not finite, or a name is empty
 */
export function resolveSessionConfig(config: Partial<SessionConfig> = {}): SessionConfig {
  const resolved: SessionConfig = { ...DEFAULT_SESSION_CONFIG, ...config };

  for (const field of DURATION_FIELDS) {
    const value = resolved[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(field, `expected a non-negative number of milliseconds, got ${value}`);
    }
  }
  if (resolved.requiredMediaKind.trim() === "") {
    throw new ConfigError("requiredMediaKind", "must not be empty");
  }
  if (resolved.serviceType.trim() === "") {
    throw new ConfigError("serviceType", "must not be empty");
  }
  return resolved;
}
