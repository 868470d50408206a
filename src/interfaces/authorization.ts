/**
 * @module interfaces/authorization
 * @description IAuthorizationPolicy: which static public keys may complete a handshake.
 */

import type { CompressedPoint } from "../types/branded.js";

/**
 * @interface IAuthorizationPolicy
 * @description Membership set consulted by both handshake roles.
 * Read-only while a handshake is running; how it gets populated is up to
 * the application.
 */
export interface IAuthorizationPolicy {
  /**
   * @query
   * @description Set lookup, no side effects.
   */
  isMember(publicKey: CompressedPoint): boolean;

  /**
   * @query
   * @description When false, `authorize` accepts every key.
   */
  isRequired(): boolean;

  /**
   * @query
   * @description Throws when membership is required and the key is not a member.
   * @throws {AuthorizationError} code=NOT_AUTHORIZED
   */
  authorize(publicKey: CompressedPoint): void;
}
