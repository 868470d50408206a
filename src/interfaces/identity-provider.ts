/**
 * @module interfaces/identity-provider
 * @description IIdentityProvider: the process's static key pair.
 *
 * The secret key stays inside the provider. Key agreement asks the
 * provider to multiply a peer's point by it instead of reading it.
 */

import type { CompressedPoint } from "../types/branded.js";
import type { PublicIdentity } from "../types/identity.js";

/**
 * Errors that may be thrown by IIdentityProvider operations.
 */
export class IdentityError extends Error {
  constructor(
    message: string,
    public readonly code: "NOT_PROVISIONED" | "INVALID_SECRET"
  ) {
    super(message);
    this.name = "IdentityError";
  }
}

/**
 * @interface IIdentityProvider
 */
export interface IIdentityProvider {
  /**
   * @query
   * @description The compressed public key advertised during handshakes.
   * @throws {IdentityError} code=NOT_PROVISIONED
   */
  getPublicKey(): CompressedPoint;

  /**
   * @query
   * @description Public key plus fingerprint.
   */
  exportPublicIdentity(): PublicIdentity;

  /**
   * @query
   * @description secretKey · point, compressed.
   * @param point - A point that has already been validated.
   * @throws {IdentityError} code=NOT_PROVISIONED
   */
  multiply(point: CompressedPoint): CompressedPoint;
}
