import { describe, it, expect, afterEach, vi } from "vitest";
import { ChannelRegistry } from "../src/primitives/channel-registry.js";
import { KeyAgreement } from "../src/primitives/key-agreement.js";
import { AuthorizationPolicy } from "../src/primitives/authorization-policy.js";
import { FragmentCipher } from "../src/primitives/fragment-cipher.js";
import { NonceSource } from "../src/primitives/nonce-source.js";
import { StaticIdentityProvider } from "../src/backends/static-identity.js";
import { bytesToHex, randomConnectionId } from "../src/backends/crypto-utils.js";
import { InMemoryBus, InMemoryTransport } from "../src/transports/in-memory.js";
import { decodeFrame, encodeFrame, FRAME_HANDSHAKE_REPLY } from "../src/codec/index.js";
import { ChannelError } from "../src/interfaces/channel.js";
import { NONCE_STEP } from "../src/interfaces/nonce-source.js";
import {
  AuthorizationError,
  IdentificationError,
  ProtocolViolationError,
} from "../src/interfaces/errors.js";
import type { IAuthorizationPolicy } from "../src/interfaces/authorization.js";
import type {
  CompressedPoint,
  ConnectionId,
  HandshakeId,
  PeerAddress,
  SharedKey,
} from "../src/types/branded.js";
import type { HandshakeRejectReason } from "../src/types/handshake.js";
import type {
  ChannelClosedEvent,
  ChannelExpiredEvent,
  FragmentRejectedEvent,
  HandshakeFailedEvent,
} from "../src/types/events.js";

// ─── Helpers ───────────────────────────────────────────────────────

const registries: ChannelRegistry[] = [];

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function makePeer(
  name: string,
  options: {
    idleTimeoutMs?: number;
    handshakeTimeoutMs?: number;
    policy?: IAuthorizationPolicy;
  } = {}
) {
  const address = name as PeerAddress;
  const identity = StaticIdentityProvider.generate();
  const transport = new InMemoryTransport(address);
  const registry = new ChannelRegistry(
    new KeyAgreement(identity, options.policy ?? AuthorizationPolicy.open()),
    transport,
    { idleTimeoutMs: options.idleTimeoutMs, handshakeTimeoutMs: options.handshakeTimeoutMs }
  );
  registries.push(registry);
  return { address, identity, transport, registry };
}

function isZeroed(bytes: Uint8Array): boolean {
  return bytes.every((byte) => byte === 0);
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}

/** 0x02 ‖ 0xff×32: x is above the field prime. */
function offCurvePoint(): CompressedPoint {
  const bytes = new Uint8Array(33).fill(0xff);
  bytes[0] = 0x02;
  return bytes as CompressedPoint;
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("ChannelRegistry", () => {
  afterEach(() => {
    for (const registry of registries) registry.destroy();
    registries.length = 0;
    InMemoryBus.reset();
    vi.useRealTimers();
  });

  describe("getOrCreate()", () => {
    it("runs a handshake and both ends hold the same key", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");

      const channel = await alice.registry.getOrCreate(bob.address);
      const accepted = bob.registry.lookup(channel.connectionId);

      expect(channel.role).toBe("INITIATOR");
      expect(channel.peerAddress).toBe(bob.address);
      expect(accepted?.role).toBe("RESPONDER");
      expect(accepted?.peerAddress).toBe(alice.address);
      expect(accepted && bytesToHex(accepted.sharedKey)).toBe(bytesToHex(channel.sharedKey));
    });

    it("emits CHANNEL_ESTABLISHED on both ends without key material", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const established: string[] = [];
      alice.registry.on("CHANNEL_ESTABLISHED", (e) => {
        established.push(e.channel.role);
        expect("sharedKey" in e.channel).toBe(false);
      });
      bob.registry.on("CHANNEL_ESTABLISHED", (e) => established.push(e.channel.role));

      await alice.registry.getOrCreate(bob.address);
      expect(established.sort()).toEqual(["INITIATOR", "RESPONDER"]);
    });

    it("coalesces 50 concurrent callers onto one handshake", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      let handshakes = 0;
      bob.registry.on("CHANNEL_ESTABLISHED", () => handshakes++);

      const channels = await Promise.all(
        Array.from({ length: 50 }, () => alice.registry.getOrCreate(bob.address))
      );

      expect(new Set(channels).size).toBe(1);
      expect(handshakes).toBe(1);
      expect(bob.registry.listChannels()).toHaveLength(1);
    });

    it("returns the live channel without a new handshake", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");

      const first = await alice.registry.getOrCreate(bob.address);
      const second = await alice.registry.getOrCreate(bob.address);

      expect(second).toBe(first);
      expect(bob.registry.listChannels()).toHaveLength(1);
    });

    it("indexes initiated channels by address and accepted ones by id only", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");

      const channel = await alice.registry.getOrCreate(bob.address);
      expect(alice.registry.get(bob.address)).toBe(channel);
      expect(bob.registry.get(alice.address)).toBeUndefined();
      expect(bob.registry.lookup(channel.connectionId)).toBeDefined();
    });

    it("accepts only the reply that comes from the addressed peer", async () => {
      const alice = makePeer("alice");
      const bobTransport = new InMemoryTransport("bob" as PeerAddress);
      const malloryTransport = new InMemoryTransport("mallory" as PeerAddress);
      const bobAgreement = new KeyAgreement(
        StaticIdentityProvider.generate(),
        AuthorizationPolicy.open()
      );
      const malloryAgreement = new KeyAgreement(
        StaticIdentityProvider.generate(),
        AuthorizationPolicy.open()
      );

      let genuineId: ConnectionId | undefined;
      bobTransport.onReceive((data, from) => {
        const frame = decodeFrame(data);
        if (frame.kind !== "HANDSHAKE_REQUEST") return;
        const forged = malloryAgreement.respond(frame, from).reply;
        const genuine = bobAgreement.respond(frame, from).reply;
        genuineId = genuine.connectionId;
        void malloryTransport.transmit(from, encodeFrame(forged));
        void bobTransport.transmit(from, encodeFrame(genuine));
      });

      const channel = await alice.registry.getOrCreate("bob" as PeerAddress);
      expect(channel.connectionId).toBe(genuineId);
    });
  });

  describe("handshake failures", () => {
    it("surfaces the responder's authorization failure to the caller", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob", { policy: AuthorizationPolicy.allowOnly([]) });
      const failures: HandshakeFailedEvent[] = [];
      alice.registry.on("HANDSHAKE_FAILED", (e) => failures.push(e));
      bob.registry.on("HANDSHAKE_FAILED", (e) => failures.push(e));

      const err = await rejection(alice.registry.getOrCreate(bob.address));

      expect(err).toBeInstanceOf(AuthorizationError);
      expect(failures.map((f) => [f.role, f.errorName])).toEqual([
        ["RESPONDER", "AuthorizationError"],
        ["INITIATOR", "AuthorizationError"],
      ]);
      expect(bob.registry.listChannels()).toHaveLength(0);
      expect(alice.registry.pendingHandshakeCount).toBe(0);
    });

    it("fails when the server key is not authorized locally", async () => {
      const stranger = StaticIdentityProvider.generate().getPublicKey();
      const alice = makePeer("alice", { policy: AuthorizationPolicy.allowOnly([stranger]) });
      const bob = makePeer("bob");

      const err = await rejection(alice.registry.getOrCreate(bob.address));
      expect(err).toBeInstanceOf(AuthorizationError);
      expect(alice.registry.get(bob.address)).toBeUndefined();
    });

    it("leaves other channels untouched", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const carol = makePeer("carol", { policy: AuthorizationPolicy.allowOnly([]) });

      const channel = await alice.registry.getOrCreate(bob.address);
      await rejection(alice.registry.getOrCreate(carol.address));

      expect(alice.registry.get(bob.address)).toBe(channel);
      expect(isZeroed(channel.sharedKey)).toBe(false);
    });

    const rejectCases: [HandshakeRejectReason, new (...args: never[]) => Error][] = [
      ["IDENTIFICATION", IdentificationError],
      ["AUTHORIZATION", AuthorizationError],
      ["PROTOCOL", ProtocolViolationError],
    ];

    for (const [reason, errorClass] of rejectCases) {
      it(`maps a ${reason} reject to ${errorClass.name}`, async () => {
        const alice = makePeer("alice");
        const server = new InMemoryTransport("server" as PeerAddress);
        server.onReceive((data, from) => {
          const frame = decodeFrame(data);
          if (frame.kind !== "HANDSHAKE_REQUEST") return;
          void server.transmit(
            from,
            encodeFrame({ kind: "HANDSHAKE_REJECT", handshakeId: frame.handshakeId, reason })
          );
        });

        const err = await rejection(alice.registry.getOrCreate("server" as PeerAddress));
        expect(err).toBeInstanceOf(errorClass);
      });
    }

    it("fails with MALFORMED_FRAME when the reply is truncated", async () => {
      const alice = makePeer("alice");
      const server = new InMemoryTransport("server" as PeerAddress);
      server.onReceive((data, from) => {
        const truncated = data.slice(0, 33);
        truncated[0] = FRAME_HANDSHAKE_REPLY;
        void server.transmit(from, truncated);
      });

      const err = await rejection(alice.registry.getOrCreate("server" as PeerAddress));

      expect(err).toBeInstanceOf(ProtocolViolationError);
      expect(err).toMatchObject({ code: "MALFORMED_FRAME" });
      expect(alice.registry.pendingHandshakeCount).toBe(0);
    });

    it("fails with UNEXPECTED_MESSAGE when the peer echoes the request", async () => {
      const alice = makePeer("alice");
      const server = new InMemoryTransport("server" as PeerAddress);
      server.onReceive((data, from) => {
        void server.transmit(from, data);
      });

      const err = await rejection(alice.registry.getOrCreate("server" as PeerAddress));

      expect(err).toBeInstanceOf(ProtocolViolationError);
      expect(err).toMatchObject({ code: "UNEXPECTED_MESSAGE" });
    });

    it("ignores a malformed answer from another address", async () => {
      vi.useFakeTimers();
      const alice = makePeer("alice", { handshakeTimeoutMs: 5000 });
      const silent = new InMemoryTransport("silent" as PeerAddress);
      const mallory = new InMemoryTransport("mallory" as PeerAddress);
      silent.onReceive((data) => {
        const truncated = data.slice(0, 33);
        truncated[0] = FRAME_HANDSHAKE_REPLY;
        void mallory.transmit(alice.address, truncated);
      });

      const outcome = rejection(alice.registry.getOrCreate(silent.getLocalAddress()));
      await vi.advanceTimersByTimeAsync(0);
      expect(alice.registry.pendingHandshakeCount).toBe(1);

      await vi.advanceTimersByTimeAsync(5000);
      expect(await outcome).toMatchObject({ code: "HANDSHAKE_TIMEOUT" });
    });

    it("answers an off-curve request with an IDENTIFICATION reject", async () => {
      const bob = makePeer("bob");
      const mallory = new InMemoryTransport("mallory" as PeerAddress);
      const replies: Uint8Array[] = [];
      mallory.onReceive((data) => replies.push(data));

      const handshakeId = "0f".repeat(16) as HandshakeId;
      await mallory.transmit(
        bob.address,
        encodeFrame({
          kind: "HANDSHAKE_REQUEST",
          handshakeId,
          ephemeralPoint: offCurvePoint(),
          publicKey: StaticIdentityProvider.generate().getPublicKey(),
        })
      );
      await sleep(5);

      expect(replies).toHaveLength(1);
      expect(decodeFrame(replies[0] ?? new Uint8Array(0))).toEqual({
        kind: "HANDSHAKE_REJECT",
        handshakeId,
        reason: "IDENTIFICATION",
      });
    });

    it("times out when no reply arrives", async () => {
      vi.useFakeTimers();
      const alice = makePeer("alice", { handshakeTimeoutMs: 5000 });
      const silent = new InMemoryTransport("silent" as PeerAddress);
      const requests: Uint8Array[] = [];
      silent.onReceive((data) => requests.push(data));

      const attempt = alice.registry.getOrCreate(silent.getLocalAddress());
      const outcome = rejection(attempt);
      await vi.advanceTimersByTimeAsync(5000);
      const err = await outcome;

      expect(err).toBeInstanceOf(ChannelError);
      expect((err as ChannelError).code).toBe("HANDSHAKE_TIMEOUT");
      expect(alice.registry.pendingHandshakeCount).toBe(0);

      const retry = alice.registry.getOrCreate(silent.getLocalAddress());
      expect(retry).not.toBe(attempt);
      await vi.advanceTimersByTimeAsync(0);
      expect(requests).toHaveLength(2);

      alice.registry.destroy();
      const destroyed = await rejection(retry);
      expect((destroyed as ChannelError).code).toBe("DESTROYED");
    });

    it("fails when the peer address is unreachable", async () => {
      const alice = makePeer("alice");
      const err = await rejection(alice.registry.getOrCreate("nobody" as PeerAddress));
      expect(err).toMatchObject({ code: "ADDRESS_UNREACHABLE" });
    });
  });

  describe("idle expiry", () => {
    it("erases the key and the entry after the idle timeout", async () => {
      vi.useFakeTimers();
      const alice = makePeer("alice", { idleTimeoutMs: 20_000 });
      const bob = makePeer("bob", { idleTimeoutMs: 20_000 });
      const expired: ChannelExpiredEvent[] = [];
      alice.registry.on("CHANNEL_EXPIRED", (e) => expired.push(e));

      const channel = await alice.registry.getOrCreate(bob.address);
      const accepted = bob.registry.lookup(channel.connectionId);
      if (!accepted) throw new Error("responder has no channel");

      vi.advanceTimersByTime(19_999);
      expect(alice.registry.get(bob.address)).toBe(channel);

      vi.advanceTimersByTime(1);
      expect(alice.registry.get(bob.address)).toBeUndefined();
      expect(bob.registry.lookup(channel.connectionId)).toBeUndefined();
      expect(isZeroed(channel.sharedKey)).toBe(true);
      expect(isZeroed(accepted.sharedKey)).toBe(true);
      expect(expired).toHaveLength(1);
      expect(expired[0]?.idleMs).toBe(20_000);
      expect(expired[0]?.channel.status).toBe("CLOSED");
    });

    it("negotiates a fresh key after expiry", async () => {
      vi.useFakeTimers();
      const alice = makePeer("alice", { idleTimeoutMs: 1000 });
      const bob = makePeer("bob", { idleTimeoutMs: 1000 });

      const first = await alice.registry.getOrCreate(bob.address);
      const firstKey = bytesToHex(first.sharedKey);
      vi.advanceTimersByTime(1000);

      const second = await alice.registry.getOrCreate(bob.address);
      expect(second.connectionId).not.toBe(first.connectionId);
      expect(bytesToHex(second.sharedKey)).not.toBe(firstKey);
    });

    it("pushes expiry out on every touch", async () => {
      vi.useFakeTimers();
      const alice = makePeer("alice", { idleTimeoutMs: 20_000 });
      const bob = makePeer("bob", { idleTimeoutMs: 20_000 });
      const channel = await alice.registry.getOrCreate(bob.address);

      vi.advanceTimersByTime(15_000);
      alice.registry.touch(channel.connectionId, "SENT");
      vi.advanceTimersByTime(15_000);
      expect(alice.registry.lookup(channel.connectionId)).toBeDefined();

      vi.advanceTimersByTime(5_000);
      expect(alice.registry.lookup(channel.connectionId)).toBeUndefined();
    });

    it("treats a stale lastActivity as expired on lookup", async () => {
      vi.useFakeTimers();
      const alice = makePeer("alice", { idleTimeoutMs: 20_000 });
      const bob = makePeer("bob", { idleTimeoutMs: 20_000 });
      const expired: ChannelExpiredEvent[] = [];
      alice.registry.on("CHANNEL_EXPIRED", (e) => expired.push(e));
      const channel = await alice.registry.getOrCreate(bob.address);

      vi.setSystemTime(Date.now() + 20_000);
      expect(alice.registry.lookup(channel.connectionId)).toBeUndefined();
      expect(expired).toHaveLength(1);
      expect(isZeroed(channel.sharedKey)).toBe(true);
    });
  });

  describe("touch()", () => {
    it("replaces the record, counts traffic and keeps the key buffer", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const channel = await alice.registry.getOrCreate(bob.address);

      const sent = alice.registry.touch(channel.connectionId, "SENT");
      const received = alice.registry.touch(channel.connectionId, "RECEIVED");

      expect(sent).not.toBe(channel);
      expect(sent?.fragmentsSent).toBe(1);
      expect(received?.fragmentsSent).toBe(1);
      expect(received?.fragmentsReceived).toBe(1);
      expect(received?.sharedKey).toBe(channel.sharedKey);
      expect(alice.registry.get(bob.address)).toBe(received);
    });

    it("returns undefined for an unknown channel", () => {
      const alice = makePeer("alice");
      expect(alice.registry.touch(randomConnectionId(), "SENT")).toBeUndefined();
    });
  });

  describe("close()", () => {
    it("zeroes the key and emits CHANNEL_CLOSED", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const closed: ChannelClosedEvent[] = [];
      alice.registry.on("CHANNEL_CLOSED", (e) => closed.push(e));
      const channel = await alice.registry.getOrCreate(bob.address);

      alice.registry.close(channel.connectionId);

      expect(isZeroed(channel.sharedKey)).toBe(true);
      expect(alice.registry.get(bob.address)).toBeUndefined();
      expect(closed.map((e) => e.reason)).toEqual(["LOCAL"]);
    });

    it("throws CHANNEL_NOT_FOUND for an unknown id", () => {
      const alice = makePeer("alice");
      let caught: unknown;
      try {
        alice.registry.close(randomConnectionId());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ChannelError);
      expect((caught as ChannelError).code).toBe("CHANNEL_NOT_FOUND");
    });
  });

  describe("traffic", () => {
    it("routes a traffic frame to listeners by connection id", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const channel = await alice.registry.getOrCreate(bob.address);
      const routed: [ConnectionId, bigint][] = [];
      bob.registry.onTraffic((ch, fragment) => routed.push([ch.connectionId, fragment.seq]));

      const fragment = new FragmentCipher(new NonceSource(0n)).seal(
        channel.sharedKey,
        Uint8Array.of(1)
      );
      await alice.transport.transmit(
        bob.address,
        encodeFrame({ kind: "TRAFFIC", connectionId: channel.connectionId, fragment })
      );
      await sleep(5);

      expect(routed).toEqual([[channel.connectionId, NONCE_STEP]]);
    });

    it("keeps routing when a traffic listener throws", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const channel = await alice.registry.getOrCreate(bob.address);
      const routed: ConnectionId[] = [];
      bob.registry.onTraffic(() => {
        throw new Error("listener failure");
      });
      bob.registry.onTraffic((ch) => routed.push(ch.connectionId));

      const fragment = new FragmentCipher().seal(channel.sharedKey, Uint8Array.of(1));
      await alice.transport.transmit(
        bob.address,
        encodeFrame({ kind: "TRAFFIC", connectionId: channel.connectionId, fragment })
      );
      await sleep(5);

      expect(routed).toEqual([channel.connectionId]);
    });

    it("drops traffic for an unknown connection", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const rejected: FragmentRejectedEvent[] = [];
      bob.registry.on("FRAGMENT_REJECTED", (e) => rejected.push(e));
      const routed: ConnectionId[] = [];
      bob.registry.onTraffic((ch) => routed.push(ch.connectionId));

      const stray = randomConnectionId();
      const fragment = new FragmentCipher().seal(
        new Uint8Array(32) as SharedKey,
        Uint8Array.of(1)
      );
      await alice.transport.transmit(
        bob.address,
        encodeFrame({ kind: "TRAFFIC", connectionId: stray, fragment })
      );
      await sleep(5);

      expect(routed).toHaveLength(0);
      expect(rejected.map((e) => [e.connectionId, e.reason])).toEqual([
        [stray, "UNKNOWN_CONNECTION"],
      ]);
    });

    it("drops malformed frames and keeps working", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");

      await alice.transport.transmit(bob.address, Uint8Array.of(0x99, 1, 2));
      await alice.transport.transmit(bob.address, Uint8Array.of(0x20, 1));
      await sleep(5);

      await expect(alice.registry.getOrCreate(bob.address)).resolves.toBeDefined();
    });
  });

  describe("destroy()", () => {
    it("closes every channel and refuses new work", async () => {
      const alice = makePeer("alice");
      const bob = makePeer("bob");
      const closed: ChannelClosedEvent[] = [];
      alice.registry.on("CHANNEL_CLOSED", (e) => closed.push(e));
      const channel = await alice.registry.getOrCreate(bob.address);

      alice.registry.destroy();

      expect(closed.map((e) => e.reason)).toEqual(["SHUTDOWN"]);
      expect(isZeroed(channel.sharedKey)).toBe(true);
      expect(alice.registry.listChannels()).toHaveLength(0);
      const err = await rejection(alice.registry.getOrCreate(bob.address));
      expect((err as ChannelError).code).toBe("DESTROYED");
    });
  });
});
