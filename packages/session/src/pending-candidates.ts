import { OrderedQueue } from "@paircast/utils";
import type { IceCandidate } from "./types.js";

interface TaggedCandidate {
  candidate: IceCandidate;
  epoch: number;
}

/**
 * Remote candidates that arrived before a remote description existed.
 *
 * Every entry is tagged with the epoch it arrived in; draining returns only
 * the entries of the requested epoch, in arrival order, and empties the
 * buffer either way.
 */
export class PendingCandidateBuffer {
  private readonly queue = new OrderedQueue<TaggedCandidate>();

  get size(): number {
    return this.queue.size;
  }

  add(candidate: IceCandidate, epoch: number): void {
    this.queue.enqueue({ candidate, epoch });
  }

  drain(epoch: number): IceCandidate[] {
    return this.queue
      .drain()
      .filter((entry) => entry.epoch === epoch)
      .map((entry) => entry.candidate);
  }

  discard(): void {
    this.queue.clear();
  }
}
