/**
 * @module codec
 * @description Wire codec: binary frames for handshakes and channel traffic.
 *
 * Frame types (first byte):
 * - 0x20: HandshakeRequest  (83 bytes)
 * - 0x21: HandshakeReply    (99 bytes)
 * - 0x22: HandshakeReject   (18 bytes)
 * - 0x23: Traffic           (50 + seqLen + ciphertext bytes)
 *
 * Decoding checks shape only: prefix, lengths, enumerations. Whether a
 * point field is really on the curve is for key agreement to decide.
 * Anything that does not match a known variant is a ProtocolViolationError.
 */

import { ProtocolViolationError } from "../interfaces/errors.js";
import { AUTH_TAG_LENGTH } from "../interfaces/fragment-cipher.js";
import type {
  AuthTag,
  CompressedPoint,
  ConnectionId,
  HandshakeId,
} from "../types/branded.js";
import type {
  HandshakeReject,
  HandshakeRejectReason,
  HandshakeReply,
  HandshakeRequest,
  TrafficFrame,
  WireFrame,
} from "../types/handshake.js";
import {
  bytesToHex,
  bytesToNonce,
  COMPRESSED_POINT_LENGTH,
  hexToBytes,
  nonceToBytes,
} from "../backends/crypto-utils.js";

export * from "./chunker.js";

// ─── Frame Type Constants ───────────────────────────────────────────

export const FRAME_HANDSHAKE_REQUEST = 0x20;
export const FRAME_HANDSHAKE_REPLY = 0x21;
export const FRAME_HANDSHAKE_REJECT = 0x22;
export const FRAME_TRAFFIC = 0x23;

/** Byte length of connection ids and handshake ids on the wire. */
export const ID_LENGTH = 16;

export const HANDSHAKE_REQUEST_LENGTH = 1 + ID_LENGTH + 2 * COMPRESSED_POINT_LENGTH;
export const HANDSHAKE_REPLY_LENGTH = 1 + 2 * ID_LENGTH + 2 * COMPRESSED_POINT_LENGTH;
export const HANDSHAKE_REJECT_LENGTH = 1 + ID_LENGTH + 1;
const TRAFFIC_HEADER_LENGTH = 1 + ID_LENGTH + 1;

const REJECT_CODES: Record<HandshakeRejectReason, number> = {
  IDENTIFICATION: 0x01,
  AUTHORIZATION: 0x02,
  PROTOCOL: 0x03,
};

// ─── Encoding ───────────────────────────────────────────────────────

/**
 * Serialize any frame variant.
 */
export function encodeFrame(frame: WireFrame): Uint8Array {
  switch (frame.kind) {
    case "HANDSHAKE_REQUEST":
      return encodeHandshakeRequest(frame);
    case "HANDSHAKE_REPLY":
      return encodeHandshakeReply(frame);
    case "HANDSHAKE_REJECT":
      return encodeHandshakeReject(frame);
    case "TRAFFIC":
      return encodeTraffic(frame);
  }
}

/**
 * Layout: 0x20 ‖ handshakeId(16) ‖ A(33) ‖ clientPublicKey(33)
 */
export function encodeHandshakeRequest(request: HandshakeRequest): Uint8Array {
  const buffer = new Uint8Array(HANDSHAKE_REQUEST_LENGTH);
  let offset = 0;
  buffer[offset++] = FRAME_HANDSHAKE_REQUEST;
  offset = writeId(buffer, offset, request.handshakeId);
  offset = writePoint(buffer, offset, request.ephemeralPoint);
  writePoint(buffer, offset, request.publicKey);
  return buffer;
}

/**
 * Layout: 0x21 ‖ handshakeId(16) ‖ connectionId(16) ‖ B(33) ‖ serverPublicKey(33)
 */
export function encodeHandshakeReply(reply: HandshakeReply): Uint8Array {
  const buffer = new Uint8Array(HANDSHAKE_REPLY_LENGTH);
  let offset = 0;
  buffer[offset++] = FRAME_HANDSHAKE_REPLY;
  offset = writeId(buffer, offset, reply.handshakeId);
  offset = writeId(buffer, offset, reply.connectionId);
  offset = writePoint(buffer, offset, reply.ephemeralPoint);
  writePoint(buffer, offset, reply.publicKey);
  return buffer;
}

/**
 * Layout: 0x22 ‖ handshakeId(16) ‖ reason(1)
 */
export function encodeHandshakeReject(reject: HandshakeReject): Uint8Array {
  const buffer = new Uint8Array(HANDSHAKE_REJECT_LENGTH);
  buffer[0] = FRAME_HANDSHAKE_REJECT;
  const offset = writeId(buffer, 1, reject.handshakeId);
  buffer[offset] = REJECT_CODES[reject.reason];
  return buffer;
}

/**
 * Layout: 0x23 ‖ connectionId(16) ‖ seqLen(1) ‖ seq ‖ authTag(32) ‖ ciphertext
 */
export function encodeTraffic(frame: TrafficFrame): Uint8Array {
  const seq = nonceToBytes(frame.fragment.seq);
  const { ciphertext, authTag } = frame.fragment;
  const buffer = new Uint8Array(
    TRAFFIC_HEADER_LENGTH + seq.length + AUTH_TAG_LENGTH + ciphertext.length
  );
  let offset = 0;
  buffer[offset++] = FRAME_TRAFFIC;
  offset = writeId(buffer, offset, frame.connectionId);
  buffer[offset++] = seq.length;
  buffer.set(seq, offset);
  offset += seq.length;
  buffer.set(authTag, offset);
  offset += AUTH_TAG_LENGTH;
  buffer.set(ciphertext, offset);
  return buffer;
}

// ─── Decoding ───────────────────────────────────────────────────────

/**
 * Parse a frame received from the transport.
 *
 * @throws {ProtocolViolationError} code=MALFORMED_FRAME on an unknown
 *   prefix, a wrong length, or an unknown enumeration value.
 */
export function decodeFrame(data: Uint8Array): WireFrame {
  if (data.length === 0) {
    throw new ProtocolViolationError("Empty frame", "MALFORMED_FRAME");
  }

  switch (data[0]) {
    case FRAME_HANDSHAKE_REQUEST:
      return decodeHandshakeRequest(data);
    case FRAME_HANDSHAKE_REPLY:
      return decodeHandshakeReply(data);
    case FRAME_HANDSHAKE_REJECT:
      return decodeHandshakeReject(data);
    case FRAME_TRAFFIC:
      return decodeTraffic(data);
    default:
      throw new ProtocolViolationError(
        `Unknown frame type 0x${(data[0] ?? 0).toString(16)}`,
        "MALFORMED_FRAME"
      );
  }
}

function decodeHandshakeRequest(data: Uint8Array): HandshakeRequest {
  expectLength(data, HANDSHAKE_REQUEST_LENGTH, "HandshakeRequest");
  let offset = 1;
  const handshakeId = readId(data, offset) as HandshakeId;
  offset += ID_LENGTH;
  const ephemeralPoint = readPoint(data, offset);
  offset += COMPRESSED_POINT_LENGTH;
  const publicKey = readPoint(data, offset);
  return { kind: "HANDSHAKE_REQUEST", handshakeId, ephemeralPoint, publicKey };
}

function decodeHandshakeReply(data: Uint8Array): HandshakeReply {
  expectLength(data, HANDSHAKE_REPLY_LENGTH, "HandshakeReply");
  let offset = 1;
  const handshakeId = readId(data, offset) as HandshakeId;
  offset += ID_LENGTH;
  const connectionId = readId(data, offset) as ConnectionId;
  offset += ID_LENGTH;
  const ephemeralPoint = readPoint(data, offset);
  offset += COMPRESSED_POINT_LENGTH;
  const publicKey = readPoint(data, offset);
  return { kind: "HANDSHAKE_REPLY", handshakeId, connectionId, ephemeralPoint, publicKey };
}

function decodeHandshakeReject(data: Uint8Array): HandshakeReject {
  expectLength(data, HANDSHAKE_REJECT_LENGTH, "HandshakeReject");
  const handshakeId = readId(data, 1) as HandshakeId;
  const code = data[1 + ID_LENGTH];
  const entry = Object.entries(REJECT_CODES).find(([, value]) => value === code);
  if (!entry) {
    throw new ProtocolViolationError(`Unknown reject reason ${code}`, "MALFORMED_FRAME");
  }
  return {
    kind: "HANDSHAKE_REJECT",
    handshakeId,
    reason: entry[0] as HandshakeRejectReason,
  };
}

function decodeTraffic(data: Uint8Array): TrafficFrame {
  if (data.length < TRAFFIC_HEADER_LENGTH + 1 + AUTH_TAG_LENGTH) {
    throw new ProtocolViolationError(
      `Traffic frame too short (${data.length} bytes)`,
      "MALFORMED_FRAME"
    );
  }
  let offset = 1;
  const connectionId = readId(data, offset) as ConnectionId;
  offset += ID_LENGTH;
  const seqLength = data[offset++] ?? 0;
  if (seqLength === 0 || data.length < offset + seqLength + AUTH_TAG_LENGTH) {
    throw new ProtocolViolationError(
      `Traffic frame declares ${seqLength}-byte seq that does not fit`,
      "MALFORMED_FRAME"
    );
  }
  const seq = bytesToNonce(data.slice(offset, offset + seqLength));
  offset += seqLength;
  const authTag = data.slice(offset, offset + AUTH_TAG_LENGTH) as AuthTag;
  offset += AUTH_TAG_LENGTH;
  const ciphertext = data.slice(offset);

  return { kind: "TRAFFIC", connectionId, fragment: { seq, ciphertext, authTag } };
}

// ─── Internal ───────────────────────────────────────────────────────

function expectLength(data: Uint8Array, length: number, name: string): void {
  if (data.length !== length) {
    throw new ProtocolViolationError(
      `${name} must be ${length} bytes, got ${data.length}`,
      "MALFORMED_FRAME"
    );
  }
}

function writeId(buffer: Uint8Array, offset: number, id: string): number {
  const bytes = hexToBytes(id);
  if (bytes.length !== ID_LENGTH) {
    throw new ProtocolViolationError(`Id ${id} is not ${ID_LENGTH} bytes`, "MALFORMED_FRAME");
  }
  buffer.set(bytes, offset);
  return offset + ID_LENGTH;
}

function readId(data: Uint8Array, offset: number): string {
  return bytesToHex(data.subarray(offset, offset + ID_LENGTH));
}

function writePoint(buffer: Uint8Array, offset: number, point: CompressedPoint): number {
  if (point.length !== COMPRESSED_POINT_LENGTH) {
    throw new ProtocolViolationError(
      `Point field must be ${COMPRESSED_POINT_LENGTH} bytes, got ${point.length}`,
      "MALFORMED_FRAME"
    );
  }
  buffer.set(point, offset);
  return offset + COMPRESSED_POINT_LENGTH;
}

function readPoint(data: Uint8Array, offset: number): CompressedPoint {
  return data.slice(offset, offset + COMPRESSED_POINT_LENGTH) as CompressedPoint;
}
