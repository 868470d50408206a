/**
 * @module primitives/replay-window
 * @description Bounded record of the seqs accepted on one channel.
 *
 * Keeps the most recent `capacity` seqs in ascending order. Once the window
 * is full the smallest is evicted and becomes the floor: any seq at or
 * below the floor counts as seen, whether or not it was ever accepted.
 * Seqs from one sender only grow, so only fragments delayed by more than
 * `capacity` newer ones are refused that way.
 */

import { DEFAULT_REPLAY_WINDOW_SIZE } from "../interfaces/channel.js";

export class ReplayWindow {
  readonly capacity: number;
  private readonly accepted: bigint[] = [];
  private floor: bigint | null = null;

  constructor(capacity: number = DEFAULT_REPLAY_WINDOW_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Replay window capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** True when `seq` was accepted before or falls at or below the floor. */
  has(seq: bigint): boolean {
    if (this.floor !== null && seq <= this.floor) return true;
    const index = this.search(seq);
    return this.accepted[index] === seq;
  }

  /** Record an accepted seq. Recording one already held is a no-op. */
  add(seq: bigint): void {
    if (this.has(seq)) return;
    this.accepted.splice(this.search(seq), 0, seq);
    if (this.accepted.length > this.capacity) {
      this.floor = this.accepted.shift() ?? this.floor;
    }
  }

  get size(): number {
    return this.accepted.length;
  }

  /** Lowest index whose seq is not below `seq`. */
  private search(seq: bigint): number {
    let lo = 0;
    let hi = this.accepted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const value = this.accepted[mid];
      if (value !== undefined && value < seq) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
