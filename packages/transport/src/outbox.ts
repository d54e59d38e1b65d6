/**
 * Send-time outbox.
 *
 * Holds serialized payloads while no peer is connected and hands them to
 * the network, oldest first, once one is. There is no per-message retry:
 * a payload that fails during the flush is counted and dropped.
 */

import { OrderedQueue } from "@paircast/utils";

/**
 * Outcome of one outbox flush.
 */
export interface OutboxFlushResult {
  /** Payloads the deliver callback accepted */
  delivered: number;
  /** Payloads the deliver callback rejected */
  failed: number;
}

export class Outbox {
  private readonly queue = new OrderedQueue<Uint8Array>();
  private flushing = false;

  get size(): number {
    return this.queue.size;
  }

  /**
   * True while `flush()` is handing payloads to the network.
   */
  get isFlushing(): boolean {
    return this.flushing;
  }

  enqueue(payload: Uint8Array): void {
    this.queue.enqueue(payload);
  }

  /**
   * Deliver every queued payload in enqueue order.
   *
   * Payloads enqueued while the flush runs are delivered by the same call,
   * after everything that was queued before them.
   *
   * @param deliver - Returns false when the payload could not be sent
   */
  flush(deliver: (payload: Uint8Array) => boolean): OutboxFlushResult {
    const result: OutboxFlushResult = { delivered: 0, failed: 0 };
    if (this.flushing) return result;

    this.flushing = true;
    try {
      while (!this.queue.isEmpty) {
        for (const payload of this.queue.drain()) {
          if (deliver(payload)) {
            result.delivered++;
          } else {
            result.failed++;
          }
        }
      }
    } finally {
      this.flushing = false;
    }
    return result;
  }

  clear(): void {
    this.queue.clear();
  }
}
