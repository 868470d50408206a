/**
 * @module types/handshake
 * @description Handshake and traffic frames, as discriminated unions.
 *
 * Every frame crossing the transport decodes into exactly one of the
 * `WireFrame` variants or is rejected at the codec boundary. Point fields
 * are SEC1-compressed P-256 points. Nothing in a handshake is signed:
 * authenticity is implicit in the ability to derive the shared key.
 */

import type {
  CompressedPoint,
  ConnectionId,
  HandshakeId,
  SecretScalar,
} from "./branded.js";
import type { Fragment } from "./channel.js";

/**
 * Client → server. Carries the client's ephemeral point A and its static
 * public key.
 */
export interface HandshakeRequest {
  readonly kind: "HANDSHAKE_REQUEST";
  readonly handshakeId: HandshakeId;
  readonly ephemeralPoint: CompressedPoint;
  readonly publicKey: CompressedPoint;
}

/**
 * Server → client. Echoes the handshake id and hands out the connection id.
 */
export interface HandshakeReply {
  readonly kind: "HANDSHAKE_REPLY";
  readonly handshakeId: HandshakeId;
  readonly connectionId: ConnectionId;
  readonly ephemeralPoint: CompressedPoint;
  readonly publicKey: CompressedPoint;
}

/**
 * Reason carried by a rejection, mirroring the error the responder raised.
 */
export type HandshakeRejectReason = "IDENTIFICATION" | "AUTHORIZATION" | "PROTOCOL";

/**
 * Server → client when `respond` failed.
 */
export interface HandshakeReject {
  readonly kind: "HANDSHAKE_REJECT";
  readonly handshakeId: HandshakeId;
  readonly reason: HandshakeRejectReason;
}

/**
 * One encrypted fragment on an established channel.
 */
export interface TrafficFrame {
  readonly kind: "TRAFFIC";
  readonly connectionId: ConnectionId;
  readonly fragment: Fragment;
}

export type WireFrame =
  | HandshakeRequest
  | HandshakeReply
  | HandshakeReject
  | TrafficFrame;

export type WireFrameKind = WireFrame["kind"];

/**
 * Single-use scalar/point pair. Owned by one handshake attempt.
 */
export interface EphemeralKeyPair {
  readonly scalar: SecretScalar;
  readonly point: CompressedPoint;
}

/**
 * Client-side state kept between sending a request and receiving the reply.
 */
export interface PendingHandshake {
  readonly request: HandshakeRequest;
  readonly ephemeral: EphemeralKeyPair;
}

/**
 * The transport continuation handed to `KeyAgreement.initiate`: sends the
 * request and resolves with the matching reply.
 */
export type HandshakeExchange = (request: HandshakeRequest) => Promise<HandshakeReply>;
