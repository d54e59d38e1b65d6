/**
 * Cooldown-gated restart timer.
 *
 * At most one restart is armed at a time: while the timer runs, further
 * `schedule()` calls are ignored, so a burst of failure notifications
 * yields exactly one restart.
 *
 * @example
 * ```typescript
 * const restarts = new RestartScheduler(2000);
 * connection.on("failed", () => restarts.schedule(() => sendRestartOffer()));
 * connection.on("connected", () => restarts.cancel());
 * ```
 */
export class RestartScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(readonly cooldownMs: number) {}

  get isPending(): boolean {
    return this.timer !== null;
  }

  /**
   * Arm the timer unless it is already armed.
   *
   * @returns false when a restart was already pending
   */
  schedule(action: () => void): boolean {
    if (this.timer !== null) return false;
    this.timer = setTimeout(() => {
      this.timer = null;
      action();
    }, this.cooldownMs);
    return true;
  }

  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
