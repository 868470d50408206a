/**
 * @module primitives/fragment-cipher
 * @description Per-fragment XOR stream encryption with a SHA-256 authentication tag.
 *
 * For a fragment with sequence number seq under key K:
 *   keystream  = PRF("ENC", K, lp(seq)) cut to |plaintext|
 *   ciphertext = plaintext ⊕ keystream
 *   authTag    = SHA-256( SHA-256("AUTH" ‖ K ‖ lp(seq)) ‖ lp(seq) ‖ ciphertext )
 *
 * where lp(seq) is the seq's minimal big-endian bytes behind a one-byte
 * length. Every fragment stands alone, so fragments verify and decrypt in
 * whatever order they arrive.
 */

import type { IFragmentCipher } from "../interfaces/fragment-cipher.js";
import type { INonceSource } from "../interfaces/nonce-source.js";
import { AuthenticationError } from "../interfaces/errors.js";
import type { AuthTag, Nonce, SharedKey } from "../types/branded.js";
import type { Fragment } from "../types/channel.js";
import {
  constantTimeEqual,
  hash256,
  lengthPrefixedNonce,
  prf,
} from "../backends/crypto-utils.js";
import { log } from "../logger.js";
import { NonceSource } from "./nonce-source.js";

const ENC_TAG = "ENC";
const AUTH_TAG = new TextEncoder().encode("AUTH");

/**
 * FragmentCipher: stateless apart from the nonce source used by `seal`.
 */
export class FragmentCipher implements IFragmentCipher {
  constructor(private readonly nonces: INonceSource = NonceSource.shared()) {}

  seal(key: SharedKey, plaintext: Uint8Array): Fragment {
    return this.encrypt(key, this.nonces.next(), plaintext);
  }

  encrypt(key: SharedKey, seq: Nonce, plaintext: Uint8Array): Fragment {
    const seqBytes = lengthPrefixedNonce(seq);
    const ciphertext = xor(plaintext, prf(ENC_TAG, key, seqBytes, plaintext.length));
    return {
      seq,
      ciphertext,
      authTag: computeTag(key, seqBytes, ciphertext),
    };
  }

  decrypt(key: SharedKey, fragment: Fragment): Uint8Array {
    const seqBytes = lengthPrefixedNonce(fragment.seq);
    const expected = computeTag(key, seqBytes, fragment.ciphertext);
    if (!constantTimeEqual(expected, fragment.authTag)) {
      log.cipher("tag mismatch on %d-byte fragment", fragment.ciphertext.length);
      throw new AuthenticationError("Fragment authentication failed", "TAG_MISMATCH");
    }
    return xor(
      fragment.ciphertext,
      prf(ENC_TAG, key, seqBytes, fragment.ciphertext.length)
    );
  }
}

function computeTag(key: SharedKey, seqBytes: Uint8Array, ciphertext: Uint8Array): AuthTag {
  const tagKey = hash256(AUTH_TAG, key, seqBytes);
  return hash256(tagKey, seqBytes, ciphertext) as AuthTag;
}

function xor(data: Uint8Array, keystream: Uint8Array): Uint8Array {
  const out = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = (data[i] ?? 0) ^ (keystream[i] ?? 0);
  }
  return out;
}
