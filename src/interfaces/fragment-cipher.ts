/**
 * @module interfaces/fragment-cipher
 * @description IFragmentCipher: per-fragment stream encryption and authentication.
 *
 * The keystream and the tag key are both derived from (EKey, seq), so a
 * seq must never be used twice under one key: two ciphertexts under the
 * same keystream XOR to the XOR of their plaintexts. `seal` draws the seq
 * from the nonce source for that reason; `encrypt` with a caller-chosen
 * seq exists for tests and tooling.
 */

import type { Nonce, SharedKey } from "../types/branded.js";
import type { Fragment } from "../types/channel.js";

/**
 * Size of the SHA-256 authentication tag in bytes.
 */
export const AUTH_TAG_LENGTH = 32;

/**
 * @interface IFragmentCipher
 */
export interface IFragmentCipher {
  /**
   * @command
   * @description Encrypt under a fresh seq from the nonce source.
   */
  seal(key: SharedKey, plaintext: Uint8Array): Fragment;

  /**
   * @query
   * @description Encrypt under the given seq.
   */
  encrypt(key: SharedKey, seq: Nonce, plaintext: Uint8Array): Fragment;

  /**
   * @query
   * @description Verify the tag in constant time, then decrypt.
   * @throws {AuthenticationError} code=TAG_MISMATCH
   */
  decrypt(key: SharedKey, fragment: Fragment): Uint8Array;
}
