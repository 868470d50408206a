/**
 * @module backends/static-identity
 * @description Software-backed P-256 static identity.
 *
 * Holds the long-lived secret scalar of the process. The scalar is never
 * returned; callers get the public key, or the product of the scalar with
 * a point they supply.
 */

import type { IIdentityProvider } from "../interfaces/identity-provider.js";
import { IdentityError } from "../interfaces/identity-provider.js";
import type { CompressedPoint } from "../types/branded.js";
import type { PublicIdentity, StaticIdentity } from "../types/identity.js";
import {
  basePointMultiply,
  bytesToHex,
  generateScalar,
  isValidScalar,
  scalarMultiply,
  wipe,
} from "./crypto-utils.js";

/**
 * StaticIdentityProvider: one P-256 key pair per process.
 *
 * @example
 * ```ts
 * const identity = StaticIdentityProvider.generate();
 * const policy = AuthorizationPolicy.allowOnly([peerPublicKey]);
 * const agreement = new KeyAgreement(identity, policy);
 * ```
 */
export class StaticIdentityProvider implements IIdentityProvider {
  private state: StaticIdentity | null;

  private constructor(state: StaticIdentity) {
    this.state = state;
  }

  /**
   * Fresh random identity.
   */
  static generate(): StaticIdentityProvider {
    const secretKey = generateScalar();
    return new StaticIdentityProvider({
      secretKey,
      publicKey: basePointMultiply(secretKey),
    });
  }

  /**
   * Identity from an existing 32-byte secret. The bytes are copied.
   *
   * @throws {IdentityError} code=INVALID_SECRET if zero, too large, or the wrong length.
   */
  static fromSecretKey(secret: Uint8Array): StaticIdentityProvider {
    const secretKey = Uint8Array.from(secret);
    if (!isValidScalar(secretKey)) {
      throw new IdentityError(
        "Secret key must be a 32-byte scalar in [1, n)",
        "INVALID_SECRET"
      );
    }
    return new StaticIdentityProvider({
      secretKey,
      publicKey: basePointMultiply(secretKey),
    });
  }

  getPublicKey(): CompressedPoint {
    return this.require().publicKey;
  }

  exportPublicIdentity(): PublicIdentity {
    const publicKey = this.getPublicKey();
    return {
      algorithm: "ECDH-P256",
      publicKey,
      fingerprint: bytesToHex(publicKey),
    };
  }

  multiply(point: CompressedPoint): CompressedPoint {
    return scalarMultiply(this.require().secretKey, point);
  }

  /**
   * Zero the secret. Every later call throws NOT_PROVISIONED.
   */
  destroy(): void {
    if (this.state) {
      wipe(this.state.secretKey);
      this.state = null;
    }
  }

  private require(): StaticIdentity {
    if (!this.state) {
      throw new IdentityError("No identity provisioned", "NOT_PROVISIONED");
    }
    return this.state;
  }
}
