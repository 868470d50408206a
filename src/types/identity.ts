/**
 * @module types/identity
 * @description Long-lived static identity of a process.
 *
 * The public key is advertised to peers and checked against their
 * authorization sets. The secret key never leaves the process; the
 * identity provider multiplies points with it on request instead of
 * handing it out.
 */

import type { CompressedPoint, SecretScalar } from "./branded.js";

/**
 * Key material of a static identity.
 */
export interface StaticIdentity {
  readonly secretKey: SecretScalar;
  readonly publicKey: CompressedPoint;
}

/**
 * What a process is willing to tell anyone about itself.
 */
export interface PublicIdentity {
  /** Fixed: P-256, SEC1 compressed. */
  readonly algorithm: "ECDH-P256";
  readonly publicKey: CompressedPoint;
  /** Hex of the compressed key, handy for allowlists and logs. */
  readonly fingerprint: string;
}
