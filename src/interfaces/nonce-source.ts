/**
 * @module interfaces/nonce-source
 * @description INonceSource: process-wide, strictly increasing sequence numbers.
 */

import type { Nonce } from "../types/branded.js";

/**
 * Width of one draw band: every call to `next()` advances by 2^256, so a
 * draw never lands in the range of a hash-sized value produced elsewhere.
 */
export const NONCE_STEP = 1n << 256n;

/**
 * @interface INonceSource
 * @description Owns the only counter mutated by unrelated concurrent activity.
 */
export interface INonceSource {
  /**
   * @command
   * @description Returns a value strictly greater than every value this
   * source has returned before. Never returns the same value twice.
   */
  next(): Nonce;

  /**
   * @query
   * @description Number of values drawn so far.
   */
  readonly draws: number;
}
