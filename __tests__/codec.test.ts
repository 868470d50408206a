import { describe, it, expect } from "vitest";
import {
  decodeFrame,
  encodeFrame,
  FRAME_HANDSHAKE_REJECT,
  FRAME_HANDSHAKE_REPLY,
  FRAME_HANDSHAKE_REQUEST,
  FRAME_TRAFFIC,
  HANDSHAKE_REJECT_LENGTH,
  HANDSHAKE_REPLY_LENGTH,
  HANDSHAKE_REQUEST_LENGTH,
} from "../src/codec/index.js";
import { ProtocolViolationError } from "../src/interfaces/errors.js";
import { NONCE_STEP } from "../src/interfaces/nonce-source.js";
import {
  basePointMultiply,
  bytesToHex,
  generateScalar,
  randomBytes,
} from "../src/backends/crypto-utils.js";
import type {
  AuthTag,
  CompressedPoint,
  ConnectionId,
  HandshakeId,
  Nonce,
} from "../src/types/branded.js";
import type {
  HandshakeRejectReason,
  HandshakeReply,
  HandshakeRequest,
  TrafficFrame,
} from "../src/types/handshake.js";

// ─── Fixtures ──────────────────────────────────────────────────────

const HANDSHAKE_ID = "00112233445566778899aabbccddeeff" as HandshakeId;
const CONNECTION_ID = "ffeeddccbbaa99887766554433221100" as ConnectionId;

function point(): CompressedPoint {
  return basePointMultiply(generateScalar());
}

function createTestRequest(): HandshakeRequest {
  return {
    kind: "HANDSHAKE_REQUEST",
    handshakeId: HANDSHAKE_ID,
    ephemeralPoint: point(),
    publicKey: point(),
  };
}

function createTestReply(): HandshakeReply {
  return {
    kind: "HANDSHAKE_REPLY",
    handshakeId: HANDSHAKE_ID,
    connectionId: CONNECTION_ID,
    ephemeralPoint: point(),
    publicKey: point(),
  };
}

function createTestTraffic(seq: bigint, ciphertext: Uint8Array): TrafficFrame {
  return {
    kind: "TRAFFIC",
    connectionId: CONNECTION_ID,
    fragment: {
      seq: seq as Nonce,
      ciphertext,
      authTag: new Uint8Array(32).fill(0xab) as AuthTag,
    },
  };
}

function expectMalformed(data: Uint8Array): void {
  let caught: unknown;
  try {
    decodeFrame(data);
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ProtocolViolationError);
  expect((caught as ProtocolViolationError).code).toBe("MALFORMED_FRAME");
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("Wire Codec", () => {
  describe("Constants", () => {
    it("should define the frame type prefixes", () => {
      expect(FRAME_HANDSHAKE_REQUEST).toBe(0x20);
      expect(FRAME_HANDSHAKE_REPLY).toBe(0x21);
      expect(FRAME_HANDSHAKE_REJECT).toBe(0x22);
      expect(FRAME_TRAFFIC).toBe(0x23);
    });

    it("should define the fixed handshake lengths", () => {
      expect(HANDSHAKE_REQUEST_LENGTH).toBe(83);
      expect(HANDSHAKE_REPLY_LENGTH).toBe(99);
      expect(HANDSHAKE_REJECT_LENGTH).toBe(18);
    });
  });

  describe("HandshakeRequest", () => {
    it("should lay out prefix, id, A and the client key", () => {
      const request = createTestRequest();
      const buffer = encodeFrame(request);

      expect(buffer.length).toBe(83);
      expect(buffer[0]).toBe(0x20);
      expect(bytesToHex(buffer.subarray(1, 17))).toBe(HANDSHAKE_ID);
      expect(bytesToHex(buffer.subarray(17, 50))).toBe(bytesToHex(request.ephemeralPoint));
      expect(bytesToHex(buffer.subarray(50, 83))).toBe(bytesToHex(request.publicKey));
    });

    it("should decode back to the same fields", () => {
      const request = createTestRequest();
      const decoded = decodeFrame(encodeFrame(request));

      expect(decoded.kind).toBe("HANDSHAKE_REQUEST");
      if (decoded.kind !== "HANDSHAKE_REQUEST") return;
      expect(decoded.handshakeId).toBe(HANDSHAKE_ID);
      expect(bytesToHex(decoded.ephemeralPoint)).toBe(bytesToHex(request.ephemeralPoint));
      expect(bytesToHex(decoded.publicKey)).toBe(bytesToHex(request.publicKey));
    });

    it("should reject a request one byte short", () => {
      expectMalformed(encodeFrame(createTestRequest()).slice(0, 82));
    });
  });

  describe("HandshakeReply", () => {
    it("should carry the connection id after the handshake id", () => {
      const buffer = encodeFrame(createTestReply());
      expect(buffer.length).toBe(99);
      expect(buffer[0]).toBe(0x21);
      expect(bytesToHex(buffer.subarray(17, 33))).toBe(CONNECTION_ID);
    });

    it("should decode back to the same fields", () => {
      const reply = createTestReply();
      const decoded = decodeFrame(encodeFrame(reply));

      expect(decoded.kind).toBe("HANDSHAKE_REPLY");
      if (decoded.kind !== "HANDSHAKE_REPLY") return;
      expect(decoded.handshakeId).toBe(HANDSHAKE_ID);
      expect(decoded.connectionId).toBe(CONNECTION_ID);
      expect(bytesToHex(decoded.publicKey)).toBe(bytesToHex(reply.publicKey));
    });

    it("should reject a reply with trailing bytes", () => {
      const buffer = encodeFrame(createTestReply());
      const padded = new Uint8Array(buffer.length + 1);
      padded.set(buffer);
      expectMalformed(padded);
    });
  });

  describe("HandshakeReject", () => {
    const cases: [HandshakeRejectReason, number][] = [
      ["IDENTIFICATION", 1],
      ["AUTHORIZATION", 2],
      ["PROTOCOL", 3],
    ];

    for (const [reason, code] of cases) {
      it(`should encode ${reason} as ${code}`, () => {
        const buffer = encodeFrame({ kind: "HANDSHAKE_REJECT", handshakeId: HANDSHAKE_ID, reason });
        expect(buffer.length).toBe(18);
        expect(buffer[0]).toBe(0x22);
        expect(buffer[17]).toBe(code);

        const decoded = decodeFrame(buffer);
        expect(decoded).toEqual({ kind: "HANDSHAKE_REJECT", handshakeId: HANDSHAKE_ID, reason });
      });
    }

    it("should reject an unknown reason code", () => {
      const buffer = encodeFrame({
        kind: "HANDSHAKE_REJECT",
        handshakeId: HANDSHAKE_ID,
        reason: "PROTOCOL",
      });
      buffer[17] = 9;
      expectMalformed(buffer);
    });
  });

  describe("Traffic", () => {
    it("should write the seq with a one-byte length", () => {
      const ciphertext = Uint8Array.of(1, 2, 3);
      const buffer = encodeFrame(createTestTraffic(0x0102n, ciphertext));

      expect(buffer.length).toBe(1 + 16 + 1 + 2 + 32 + 3);
      expect(buffer[0]).toBe(0x23);
      expect(bytesToHex(buffer.subarray(1, 17))).toBe(CONNECTION_ID);
      expect(buffer[17]).toBe(2);
      expect(bytesToHex(buffer.subarray(18, 20))).toBe("0102");
      expect(buffer[20]).toBe(0xab);
      expect(bytesToHex(buffer.subarray(52))).toBe("010203");
    });

    it("should carry seqs wider than 256 bits", () => {
      const seq = 3n * NONCE_STEP + 77n;
      const ciphertext = randomBytes(40);
      const decoded = decodeFrame(encodeFrame(createTestTraffic(seq, ciphertext)));

      expect(decoded.kind).toBe("TRAFFIC");
      if (decoded.kind !== "TRAFFIC") return;
      expect(decoded.connectionId).toBe(CONNECTION_ID);
      expect(decoded.fragment.seq).toBe(seq);
      expect(bytesToHex(decoded.fragment.ciphertext)).toBe(bytesToHex(ciphertext));
      expect(bytesToHex(decoded.fragment.authTag)).toBe("ab".repeat(32));
    });

    it("should accept an empty ciphertext", () => {
      const decoded = decodeFrame(encodeFrame(createTestTraffic(1n, new Uint8Array(0))));
      if (decoded.kind !== "TRAFFIC") throw new Error("expected traffic");
      expect(decoded.fragment.ciphertext.length).toBe(0);
    });

    it("should reject a zero-length seq", () => {
      const buffer = encodeFrame(createTestTraffic(1n, Uint8Array.of(1)));
      buffer[17] = 0;
      expectMalformed(buffer);
    });

    it("should reject a seq length that runs past the tag", () => {
      const buffer = encodeFrame(createTestTraffic(1n, new Uint8Array(0)));
      buffer[17] = 200;
      expectMalformed(buffer);
    });
  });

  describe("Malformed input", () => {
    it("should reject an empty frame", () => {
      expectMalformed(new Uint8Array(0));
    });

    it("should reject an unknown prefix", () => {
      expectMalformed(Uint8Array.of(0x99, 0, 0, 0));
    });

    it("should refuse to encode a point of the wrong length", () => {
      const request = { ...createTestRequest(), publicKey: new Uint8Array(32) as CompressedPoint };
      expect(() => encodeFrame(request)).toThrow(ProtocolViolationError);
    });
  });
});
