/**
 * Typed event emitter used by the channel, controller and monitor.
 *
 * Each event name maps to a listener signature; `on`/`off` are public,
 * `emit` is reserved for the owning component.
 */

/**
 * Widest listener signature; every concrete listener is assignable to it.
 */
export type Listener = (...args: never[]) => void;

/**
 * Map of event names to listener signatures.
 */
export type EventMap<Events> = { [K in keyof Events]: Listener };

/**
 * Called when a listener throws. Delivery to the remaining listeners
 * continues before this hook runs.
 */
export type ListenerErrorHandler = (error: unknown, event: string) => void;

export class Emitter<Events extends EventMap<Events>> {
  private readonly listeners: Map<keyof Events, Set<Listener>> = new Map();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  /**
   * Subscribe to an event.
   */
  on<K extends keyof Events>(event: K, listener: Events[K]): this {
    let listeners = this.listeners.get(event);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(event, listeners);
    }
    listeners.add(listener);
    return this;
  }

  /**
   * Unsubscribe from an event.
   */
  off<K extends keyof Events>(event: K, listener: Events[K]): this {
    const listeners = this.listeners.get(event);
    if (listeners) {
      listeners.delete(listener);
    }
    return this;
  }

  /**
   * Number of listeners currently attached to an event.
   */
  listenerCount(event: keyof Events): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  protected removeAllListeners(): void {
    this.listeners.clear();
  }

  /**
   * Deliver an event to every listener.
   *
   * A throwing listener does not prevent delivery to the others. The first
   * error is handed to the error hook, or rethrown once all listeners ran
   * when no hook was given.
   */
  protected emit<K extends keyof Events>(event: K, ...args: Parameters<Events[K]>): void {
    const listeners = this.listeners.get(event);
    if (!listeners || listeners.size === 0) return;

    let failure: { error: unknown } | undefined;
    for (const listener of [...listeners]) {
      try {
        (listener as (...args: Parameters<Events[K]>) => void)(...args);
      } catch (error) {
        if (this.onListenerError) {
          this.onListenerError(error, String(event));
        } else if (!failure) {
          failure = { error };
        }
      }
    }
    if (failure) {
      throw failure.error;
    }
  }
}
