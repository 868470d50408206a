/**
 * @module primitives/authorization-policy
 * @description Set of static public keys this process will accept as peers.
 */

import type { IAuthorizationPolicy } from "../interfaces/authorization.js";
import { AuthorizationError } from "../interfaces/errors.js";
import type { CompressedPoint } from "../types/branded.js";
import { bytesToHex } from "../backends/crypto-utils.js";

export interface AuthorizationPolicyOptions {
  /** When false every key passes `authorize`. Default: true */
  required?: boolean;
}

/**
 * AuthorizationPolicy: hex-keyed membership set.
 *
 * @example
 * ```ts
 * const policy = AuthorizationPolicy.allowOnly([serverKey]);
 * policy.authorize(candidate); // throws AuthorizationError if absent
 * ```
 */
export class AuthorizationPolicy implements IAuthorizationPolicy {
  private readonly members = new Set<string>();
  private readonly required: boolean;

  constructor(
    publicKeys: Iterable<CompressedPoint> = [],
    options: AuthorizationPolicyOptions = {}
  ) {
    this.required = options.required ?? true;
    for (const key of publicKeys) {
      this.members.add(bytesToHex(key));
    }
  }

  /** Accepts any peer. */
  static open(): AuthorizationPolicy {
    return new AuthorizationPolicy([], { required: false });
  }

  /** Accepts exactly the listed keys. */
  static allowOnly(publicKeys: Iterable<CompressedPoint>): AuthorizationPolicy {
    return new AuthorizationPolicy(publicKeys, { required: true });
  }

  // ─── Queries ────────────────────────────────────────────────────

  isMember(publicKey: CompressedPoint): boolean {
    return this.members.has(bytesToHex(publicKey));
  }

  isRequired(): boolean {
    return this.required;
  }

  authorize(publicKey: CompressedPoint): void {
    if (!this.required) return;
    if (!this.isMember(publicKey)) {
      throw new AuthorizationError(
        `Public key ${bytesToHex(publicKey).slice(0, 16)}… is not authorized`,
        "NOT_AUTHORIZED"
      );
    }
  }

  get size(): number {
    return this.members.size;
  }

  // ─── Commands ───────────────────────────────────────────────────

  add(publicKey: CompressedPoint): void {
    this.members.add(bytesToHex(publicKey));
  }

  remove(publicKey: CompressedPoint): boolean {
    return this.members.delete(bytesToHex(publicKey));
  }
}
