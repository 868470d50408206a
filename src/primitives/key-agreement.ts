/**
 * @module primitives/key-agreement
 * @description Client and server halves of the ephemeral three-term ECDH handshake.
 *
 * Wire exchange (cleartext):
 *   client → server: handshakeId, A = a·G, C (client static key)
 *   server → client: handshakeId, connectionId, B = b·G, S (server static key)
 *
 * EKey = SHA-256(a·B ‖ c·B ‖ a·S) = SHA-256(b·A ‖ b·C ‖ s·A)
 *
 * Nothing is signed. A party proves it holds its static secret only by
 * deriving an EKey that decrypts the traffic that follows, and any
 * transcript can be forged from public values alone, so conversations are
 * repudiable. There is no key-confirmation round: a mismatched EKey shows
 * up as the first fragment failing authentication.
 */

import type { IAuthorizationPolicy } from "../interfaces/authorization.js";
import type { IIdentityProvider } from "../interfaces/identity-provider.js";
import type { IKeyAgreement } from "../interfaces/key-agreement.js";
import { ProtocolViolationError } from "../interfaces/errors.js";
import type {
  CompressedPoint,
  ConnectionId,
  EpochMillis,
  PeerAddress,
  SharedKey,
} from "../types/branded.js";
import type { Channel, ChannelRole } from "../types/channel.js";
import type {
  HandshakeExchange,
  HandshakeReply,
  HandshakeRequest,
  PendingHandshake,
} from "../types/handshake.js";
import {
  basePointMultiply,
  generateScalar,
  hash256,
  randomConnectionId,
  randomHandshakeId,
  scalarMultiply,
  validatePoint,
  wipe,
} from "../backends/crypto-utils.js";
import { log } from "../logger.js";

const HEX_ID = /^[0-9a-f]{32}$/;

/**
 * EKey = SHA-256(t1 ‖ t2 ‖ t3) over compressed point encodings.
 */
export function deriveSharedKey(
  t1: CompressedPoint,
  t2: CompressedPoint,
  t3: CompressedPoint
): SharedKey {
  return hash256(t1, t2, t3) as SharedKey;
}

/**
 * KeyAgreement: stateless apart from the identity and policy it is given.
 *
 * @example
 * ```ts
 * const agreement = new KeyAgreement(identity, AuthorizationPolicy.open());
 * const channel = await agreement.initiate(address, (request) => sendAndAwaitReply(request));
 * ```
 */
export class KeyAgreement implements IKeyAgreement {
  constructor(
    private readonly identity: IIdentityProvider,
    private readonly policy: IAuthorizationPolicy
  ) {}

  // ─── Client Role ────────────────────────────────────────────────

  async initiate(peerAddress: PeerAddress, exchange: HandshakeExchange): Promise<Channel> {
    const pending = this.createRequest();
    let reply: HandshakeReply;
    try {
      reply = await exchange(pending.request);
    } catch (err) {
      wipe(pending.ephemeral.scalar);
      throw err;
    }
    return this.complete(pending, reply, peerAddress);
  }

  createRequest(): PendingHandshake {
    const scalar = generateScalar();
    const ephemeral = { scalar, point: basePointMultiply(scalar) };
    const request: HandshakeRequest = {
      kind: "HANDSHAKE_REQUEST",
      handshakeId: randomHandshakeId(),
      ephemeralPoint: ephemeral.point,
      publicKey: this.identity.getPublicKey(),
    };
    log.handshake("created request %s", request.handshakeId);
    return { request, ephemeral };
  }

  complete(pending: PendingHandshake, reply: HandshakeReply, peerAddress: PeerAddress): Channel {
    const a = pending.ephemeral.scalar;
    try {
      if (a.every((byte) => byte === 0)) {
        throw new ProtocolViolationError(
          `Handshake ${pending.request.handshakeId} was already completed`,
          "UNEXPECTED_MESSAGE"
        );
      }
      assertReplyShape(reply, pending);

      const serverEphemeral = validatePoint(reply.ephemeralPoint);
      const serverKey = validatePoint(reply.publicKey);
      this.policy.authorize(serverKey);

      const sharedKey = deriveSharedKey(
        scalarMultiply(a, serverEphemeral),
        this.identity.multiply(serverEphemeral),
        scalarMultiply(a, serverKey)
      );

      log.handshake("initiator derived key for %s (%s)", reply.connectionId, peerAddress);
      return createChannel(reply.connectionId, sharedKey, peerAddress, "INITIATOR");
    } finally {
      wipe(a);
    }
  }

  // ─── Server Role ────────────────────────────────────────────────

  respond(
    request: HandshakeRequest,
    peerAddress: PeerAddress
  ): { reply: HandshakeReply; channel: Channel } {
    assertRequestShape(request);

    const clientEphemeral = validatePoint(request.ephemeralPoint);
    const clientKey = validatePoint(request.publicKey);
    this.policy.authorize(clientKey);

    const b = generateScalar();
    try {
      const connectionId = randomConnectionId();
      const sharedKey = deriveSharedKey(
        scalarMultiply(b, clientEphemeral),
        scalarMultiply(b, clientKey),
        this.identity.multiply(clientEphemeral)
      );

      const reply: HandshakeReply = {
        kind: "HANDSHAKE_REPLY",
        handshakeId: request.handshakeId,
        connectionId,
        ephemeralPoint: basePointMultiply(b),
        publicKey: this.identity.getPublicKey(),
      };

      log.handshake("responder derived key for %s (%s)", connectionId, peerAddress);
      return {
        reply,
        channel: createChannel(connectionId, sharedKey, peerAddress, "RESPONDER"),
      };
    } finally {
      wipe(b);
    }
  }
}

// ─── Internal: Shape Checks ────────────────────────────────────────

function assertReplyShape(reply: HandshakeReply, pending: PendingHandshake): void {
  if (reply.kind !== "HANDSHAKE_REPLY") {
    throw new ProtocolViolationError(
      `Expected HANDSHAKE_REPLY, got ${String(reply.kind)}`,
      "UNEXPECTED_MESSAGE"
    );
  }
  if (reply.handshakeId !== pending.request.handshakeId) {
    throw new ProtocolViolationError(
      `Reply for ${reply.handshakeId} does not answer ${pending.request.handshakeId}`,
      "UNEXPECTED_MESSAGE"
    );
  }
  if (typeof reply.connectionId !== "string" || !HEX_ID.test(reply.connectionId)) {
    throw new ProtocolViolationError("Reply has no valid connectionId", "MISSING_FIELD");
  }
  assertBytesField(reply.ephemeralPoint, "B");
  assertBytesField(reply.publicKey, "serverPublicKey");
}

function assertRequestShape(request: HandshakeRequest): void {
  if (request.kind !== "HANDSHAKE_REQUEST") {
    throw new ProtocolViolationError(
      `Expected HANDSHAKE_REQUEST, got ${String(request.kind)}`,
      "UNEXPECTED_MESSAGE"
    );
  }
  if (typeof request.handshakeId !== "string" || !HEX_ID.test(request.handshakeId)) {
    throw new ProtocolViolationError("Request has no valid handshakeId", "MISSING_FIELD");
  }
  assertBytesField(request.ephemeralPoint, "A");
  assertBytesField(request.publicKey, "clientPublicKey");
}

function assertBytesField(value: unknown, field: string): void {
  if (!(value instanceof Uint8Array)) {
    throw new ProtocolViolationError(`Missing field ${field}`, "MISSING_FIELD");
  }
}

function createChannel(
  connectionId: ConnectionId,
  sharedKey: SharedKey,
  peerAddress: PeerAddress,
  role: ChannelRole
): Channel {
  const now = Date.now() as EpochMillis;
  return {
    connectionId,
    sharedKey,
    peerAddress,
    role,
    status: "ACTIVE",
    establishedAt: now,
    lastActivity: now,
    fragmentsSent: 0,
    fragmentsReceived: 0,
  };
}
