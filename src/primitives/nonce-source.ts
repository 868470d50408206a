/**
 * @module primitives/nonce-source
 * @description Process-wide monotonically increasing nonce counter.
 *
 * Seeded from SHA-256 of a fresh UUIDv7 (time-ordered, unique), read as a
 * 256-bit integer. Each draw adds 2^256, so draws occupy disjoint bands
 * above the seed. The counter is private and only `next()` moves it;
 * `next()` is synchronous, which on the single JS thread makes the
 * read-increment-return step atomic for every async caller.
 *
 * Nothing is persisted. Keys die with the process, so nonces need not
 * survive it.
 */

import { v7 as uuidv7 } from "uuid";
import type { INonceSource } from "../interfaces/nonce-source.js";
import { NONCE_STEP } from "../interfaces/nonce-source.js";
import type { Nonce } from "../types/branded.js";
import { bytesToNonce, hash256 } from "../backends/crypto-utils.js";
import { log } from "../logger.js";

let sharedInstance: NonceSource | null = null;

export class NonceSource implements INonceSource {
  private current: bigint;
  private count = 0;

  /**
   * @param seed - Starting value. Defaults to hash(uuidv7()); pass one only in tests.
   */
  constructor(seed?: bigint) {
    this.current = seed ?? NonceSource.freshSeed();
    log.nonce("nonce source seeded");
  }

  /**
   * The process-wide instance, created on first use.
   */
  static shared(): NonceSource {
    if (!sharedInstance) {
      sharedInstance = new NonceSource();
    }
    return sharedInstance;
  }

  private static freshSeed(): bigint {
    return bytesToNonce(hash256(new TextEncoder().encode(uuidv7())));
  }

  next(): Nonce {
    this.current += NONCE_STEP;
    this.count++;
    return this.current as Nonce;
  }

  get draws(): number {
    return this.count;
  }
}
