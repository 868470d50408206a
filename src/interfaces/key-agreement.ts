/**
 * @module interfaces/key-agreement
 * @description IKeyAgreement: unauthenticated three-term ECDH handshake.
 *
 * Client (ephemeral a, static c) and server (ephemeral b, static s) each
 * hash three point products:
 *
 * | Term | Client computes | Server computes |
 * |------|-----------------|-----------------|
 * | 1    | a·B             | b·A             |
 * | 2    | c·B             | b·C             |
 * | 3    | a·S             | s·A             |
 *
 * The pairs are algebraically equal, so both sides arrive at the same
 * `EKey = SHA-256(t1 ‖ t2 ‖ t3)` without sending it.
 *
 * No signature is produced or checked. Only a holder of the matching
 * secret key can derive an EKey that decrypts later traffic, but anyone
 * can fabricate a plausible transcript from public values alone. The
 * protocol is repudiable and gives no non-repudiation guarantee.
 */

import type { PeerAddress } from "../types/branded.js";
import type { Channel } from "../types/channel.js";
import type {
  HandshakeExchange,
  HandshakeReply,
  HandshakeRequest,
  PendingHandshake,
} from "../types/handshake.js";

/**
 * @interface IKeyAgreement
 */
export interface IKeyAgreement {
  /**
   * @command
   * @description Client role, end to end: build a request, hand it to
   * `exchange`, and turn the reply into a channel.
   *
   * @throws {ProtocolViolationError} if the reply is missing fields.
   * @throws {IdentificationError} if B or the server key is not a valid point.
   * @throws {AuthorizationError} if the server key is not authorized.
   */
  initiate(peerAddress: PeerAddress, exchange: HandshakeExchange): Promise<Channel>;

  /**
   * @command
   * @description Client role, step one: fresh ephemeral pair and request.
   */
  createRequest(): PendingHandshake;

  /**
   * @command
   * @description Client role, step two. Consumes the pending handshake; its
   * ephemeral scalar is zeroed whether or not this succeeds.
   */
  complete(pending: PendingHandshake, reply: HandshakeReply, peerAddress: PeerAddress): Channel;

  /**
   * @command
   * @description Server role.
   *
   * @throws {IdentificationError} if A or the client key is not a valid point.
   * @throws {AuthorizationError} if the client key is not authorized.
   */
  respond(
    request: HandshakeRequest,
    peerAddress: PeerAddress
  ): { reply: HandshakeReply; channel: Channel };
}
