/**
 * @module backends/crypto-utils
 * @description Cryptographic primitives built on @noble/curves and @noble/hashes.
 *
 * Provides:
 * - P-256 point validation, scalar multiplication, base-point multiplication
 * - SHA-256 hashing over concatenated parts
 * - HMAC-SHA256 counter-mode PRF for keystreams
 * - Constant-time byte comparison
 * - Nonce ⇄ byte encoding and random identifiers
 *
 * Curve arithmetic is delegated entirely to @noble/curves. Functions here
 * take and return branded byte arrays; no curve point objects leak out.
 */

import { p256 } from "@noble/curves/p256";
import { bytesToNumberBE, equalBytes } from "@noble/curves/abstract/utils";
import { sha256 } from "@noble/hashes/sha2";
import { hmac } from "@noble/hashes/hmac";
import {
  bytesToHex,
  concatBytes,
  hexToBytes,
  randomBytes as nobleRandomBytes,
  utf8ToBytes,
} from "@noble/hashes/utils";
import { IdentificationError } from "../interfaces/errors.js";
import type {
  CompressedPoint,
  ConnectionId,
  HandshakeId,
  MessageId,
  Nonce,
  SecretScalar,
} from "../types/branded.js";

export { bytesToHex, hexToBytes, concatBytes };

/** Length of a SEC1 compressed P-256 point. */
export const COMPRESSED_POINT_LENGTH = 33;

/** Length of a P-256 secret scalar. */
export const SCALAR_LENGTH = 32;

/** Length of a SHA-256 digest. */
export const HASH_LENGTH = 32;

/** Longest nonce encoding the one-byte length prefix can describe. */
export const MAX_NONCE_BYTES = 255;

type CurvePoint = typeof p256.ProjectivePoint.BASE;

// ─── Points ────────────────────────────────────────────────────────

function toCurvePoint(bytes: Uint8Array): CurvePoint {
  if (bytes.length !== COMPRESSED_POINT_LENGTH) {
    throw new IdentificationError(
      `Expected ${COMPRESSED_POINT_LENGTH}-byte compressed point, got ${bytes.length} bytes`,
      "INVALID_KEY_ENCODING"
    );
  }
  try {
    // fromHex runs the on-curve check and rejects the point at infinity
    return p256.ProjectivePoint.fromHex(bytes);
  } catch (err) {
    throw new IdentificationError(
      `Not a valid P-256 point: ${err instanceof Error ? err.message : String(err)}`,
      "INVALID_POINT"
    );
  }
}

function toCompressed(point: CurvePoint): CompressedPoint {
  return point.toRawBytes(true) as CompressedPoint;
}

/**
 * Check that `bytes` is a well-formed compressed point on P-256.
 *
 * @returns The same bytes, branded.
 * @throws {IdentificationError} code=INVALID_KEY_ENCODING on a wrong length,
 *   code=INVALID_POINT if the bytes do not describe a curve point.
 */
export function validatePoint(bytes: Uint8Array): CompressedPoint {
  return toCompressed(toCurvePoint(bytes));
}

/**
 * scalar · point. The point must already be valid.
 */
export function scalarMultiply(scalar: SecretScalar, point: CompressedPoint): CompressedPoint {
  return toCompressed(toCurvePoint(point).multiply(scalarToBigInt(scalar)));
}

/**
 * scalar · G.
 */
export function basePointMultiply(scalar: SecretScalar): CompressedPoint {
  return p256.getPublicKey(scalar, true) as CompressedPoint;
}

/**
 * A uniformly random scalar in [1, n).
 */
export function generateScalar(): SecretScalar {
  return p256.utils.randomPrivateKey() as SecretScalar;
}

/**
 * Check a 32-byte secret is a usable scalar (non-zero, below the curve order).
 */
export function isValidScalar(bytes: Uint8Array): bytes is SecretScalar {
  return bytes.length === SCALAR_LENGTH && p256.utils.isValidPrivateKey(bytes);
}

function scalarToBigInt(scalar: SecretScalar): bigint {
  return p256.utils.normPrivateKeyToScalar(scalar);
}

// ─── Hashing ───────────────────────────────────────────────────────

/**
 * SHA-256 over the concatenation of `parts`.
 */
export function hash256(...parts: Uint8Array[]): Uint8Array {
  return sha256(concatBytes(...parts));
}

/**
 * Keystream PRF: HMAC-SHA256(key, tag ‖ nonce ‖ u32be(block)) for
 * block = 0, 1, ..., concatenated and cut to `length` bytes.
 */
export function prf(tag: string, key: Uint8Array, nonce: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length);
  const prefix = concatBytes(utf8ToBytes(tag), nonce);
  const counter = new Uint8Array(4);
  const counterView = new DataView(counter.buffer);

  for (let block = 0, offset = 0; offset < length; block++, offset += HASH_LENGTH) {
    counterView.setUint32(0, block, false);
    const digest = hmac(sha256, key, concatBytes(prefix, counter));
    out.set(digest.subarray(0, Math.min(HASH_LENGTH, length - offset)), offset);
  }

  return out;
}

/**
 * Byte comparison whose running time depends only on the length.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  return equalBytes(a, b);
}

/**
 * Overwrite a buffer with zeros.
 */
export function wipe(bytes: Uint8Array): void {
  bytes.fill(0);
}

// ─── Nonce Encoding ────────────────────────────────────────────────

/**
 * Minimal big-endian encoding of a non-negative nonce (zero encodes as 0x00).
 *
 * @throws {RangeError} if negative or wider than 255 bytes.
 */
export function nonceToBytes(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new RangeError("Nonce must be non-negative");
  }
  let hex = value.toString(16);
  if (hex.length % 2 === 1) hex = "0" + hex;
  const bytes = hexToBytes(hex);
  if (bytes.length > MAX_NONCE_BYTES) {
    throw new RangeError(`Nonce wider than ${MAX_NONCE_BYTES} bytes`);
  }
  return bytes;
}

/**
 * Inverse of `nonceToBytes`.
 */
export function bytesToNonce(bytes: Uint8Array): Nonce {
  return bytesToNumberBE(bytes) as Nonce;
}

/**
 * `len(1) ‖ nonceToBytes(value)`, the form in which a seq enters every hash.
 */
export function lengthPrefixedNonce(value: bigint): Uint8Array {
  const bytes = nonceToBytes(value);
  return concatBytes(Uint8Array.of(bytes.length), bytes);
}

// ─── Random Identifiers ────────────────────────────────────────────

/**
 * Cryptographically random bytes.
 */
export function randomBytes(length: number): Uint8Array {
  return nobleRandomBytes(length);
}

export function randomConnectionId(): ConnectionId {
  return bytesToHex(randomBytes(16)) as ConnectionId;
}

export function randomHandshakeId(): HandshakeId {
  return bytesToHex(randomBytes(16)) as HandshakeId;
}

export function randomMessageId(): MessageId {
  return bytesToHex(randomBytes(8)) as MessageId;
}
