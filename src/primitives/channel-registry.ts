/**
 * @module primitives/channel-registry
 * @description Full implementation of the IChannelRegistry interface.
 *
 * Owns every live channel in the process. Drives the client side of the
 * handshake over the transport, answers inbound handshakes, routes traffic
 * frames by connection id, and erases channels after a period of silence.
 *
 * Wire prefixes handled here (see codec):
 *   0x20 = HandshakeRequest  (answered with a reply or a reject)
 *   0x21 = HandshakeReply    (settles a pending handshake)
 *   0x22 = HandshakeReject   (fails a pending handshake)
 *   0x23 = Traffic           (routed to onTraffic listeners)
 */

import { ChannelEmitter } from "./base-emitter.js";
import type { IChannelRegistry, TrafficListener } from "../interfaces/channel.js";
import type { ChannelRegistryConfig } from "../interfaces/channel.js";
import {
  ChannelError,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_IDLE_TIMEOUT_MS,
} from "../interfaces/channel.js";
import {
  AuthorizationError,
  IdentificationError,
  ProtocolViolationError,
} from "../interfaces/errors.js";
import type { IKeyAgreement } from "../interfaces/key-agreement.js";
import type { ITransport } from "../interfaces/transport.js";
import type {
  ConnectionId,
  EpochMillis,
  HandshakeId,
  PeerAddress,
} from "../types/branded.js";
import type {
  Channel,
  ChannelCloseReason,
  ChannelRole,
  TrafficDirection,
} from "../types/channel.js";
import { toChannelInfo } from "../types/channel.js";
import type {
  HandshakeReject,
  HandshakeRejectReason,
  HandshakeReply,
  HandshakeRequest,
  TrafficFrame,
  WireFrame,
} from "../types/handshake.js";
import { decodeFrame, encodeFrame, ID_LENGTH } from "../codec/index.js";
import { bytesToHex, wipe } from "../backends/crypto-utils.js";
import { log } from "../logger.js";

interface PendingReply {
  readonly peerAddress: PeerAddress;
  readonly resolve: (reply: HandshakeReply) => void;
  readonly reject: (err: Error) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

/**
 * ChannelRegistry: the per-process table of live channels.
 *
 * @example
 * ```ts
 * const registry = new ChannelRegistry(keyAgreement, transport, { idleTimeoutMs: 20_000 });
 * const channel = await registry.getOrCreate("bob" as PeerAddress);
 * registry.onTraffic((channel, fragment) => { ... });
 * ```
 */
export class ChannelRegistry extends ChannelEmitter implements IChannelRegistry {
  private readonly channels = new Map<ConnectionId, Channel>();
  private readonly byAddress = new Map<PeerAddress, ConnectionId>();
  private readonly inflight = new Map<PeerAddress, Promise<Channel>>();
  private readonly pendingReplies = new Map<HandshakeId, PendingReply>();
  private readonly idleTimers = new Map<ConnectionId, ReturnType<typeof setTimeout>>();
  private readonly trafficListeners = new Set<TrafficListener>();

  private readonly config: Required<ChannelRegistryConfig>;
  private transportUnsub: (() => void) | null = null;
  private destroyed = false;

  constructor(
    private readonly keyAgreement: IKeyAgreement,
    private readonly transport: ITransport,
    config: ChannelRegistryConfig = {}
  ) {
    super();
    this.config = {
      idleTimeoutMs: config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS,
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
    };

    this.transportUnsub = this.transport.onReceive((data, from) => {
      this.handleTransportMessage(data, from);
    });
  }

  // ─── Commands ───────────────────────────────────────────────────

  getOrCreate(peerAddress: PeerAddress): Promise<Channel> {
    if (this.destroyed) {
      return Promise.reject(new ChannelError("Registry destroyed", "DESTROYED"));
    }

    const existing = this.get(peerAddress);
    if (existing) return Promise.resolve(existing);

    const running = this.inflight.get(peerAddress);
    if (running) return running;

    const attempt = this.establish(peerAddress);
    this.inflight.set(peerAddress, attempt);
    return attempt;
  }

  touch(connectionId: ConnectionId, direction: TrafficDirection): Channel | undefined {
    const channel = this.lookup(connectionId);
    if (!channel) return undefined;

    const updated: Channel = {
      ...channel,
      lastActivity: Date.now() as EpochMillis,
      fragmentsSent: channel.fragmentsSent + (direction === "SENT" ? 1 : 0),
      fragmentsReceived: channel.fragmentsReceived + (direction === "RECEIVED" ? 1 : 0),
    };
    this.channels.set(connectionId, updated);
    this.scheduleIdleTimer(connectionId);
    return updated;
  }

  close(connectionId: ConnectionId): void {
    this.closeWithReason(connectionId, "LOCAL");
  }

  /**
   * Tear a channel down and report why.
   *
   * @throws {ChannelError} code=CHANNEL_NOT_FOUND
   */
  closeWithReason(connectionId: ConnectionId, reason: ChannelCloseReason): void {
    const closed = this.teardown(connectionId);
    if (!closed) {
      throw new ChannelError(`No channel ${connectionId}`, "CHANNEL_NOT_FOUND");
    }
    log.registry("closed %s (%s)", connectionId, reason);
    this.emit({
      type: "CHANNEL_CLOSED",
      channel: toChannelInfo(closed),
      reason,
      timestamp: Date.now() as EpochMillis,
    });
  }

  onTraffic(listener: TrafficListener): () => void {
    this.trafficListeners.add(listener);
    return () => {
      this.trafficListeners.delete(listener);
    };
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    if (this.transportUnsub) {
      this.transportUnsub();
      this.transportUnsub = null;
    }
    for (const pending of this.pendingReplies.values()) {
      clearTimeout(pending.timer);
      pending.reject(new ChannelError("Registry destroyed", "DESTROYED"));
    }
    this.pendingReplies.clear();

    for (const connectionId of [...this.channels.keys()]) {
      this.closeWithReason(connectionId, "SHUTDOWN");
    }
    this.trafficListeners.clear();
    this.removeAllListeners();
  }

  // ─── Queries ────────────────────────────────────────────────────

  get(peerAddress: PeerAddress): Channel | undefined {
    const connectionId = this.byAddress.get(peerAddress);
    return connectionId === undefined ? undefined : this.lookup(connectionId);
  }

  lookup(connectionId: ConnectionId): Channel | undefined {
    const channel = this.channels.get(connectionId);
    if (!channel) return undefined;

    const idleMs = Date.now() - channel.lastActivity;
    if (idleMs >= this.config.idleTimeoutMs) {
      this.expire(connectionId);
      return undefined;
    }
    return channel;
  }

  listChannels(): readonly Channel[] {
    return [...this.channels.keys()]
      .map((id) => this.lookup(id))
      .filter((channel): channel is Channel => channel !== undefined);
  }

  get pendingHandshakeCount(): number {
    return this.pendingReplies.size;
  }

  // ─── Internal: Client Handshake ─────────────────────────────────

  private async establish(peerAddress: PeerAddress): Promise<Channel> {
    try {
      const channel = await this.keyAgreement.initiate(peerAddress, (request) =>
        this.exchange(peerAddress, request)
      );
      if (this.destroyed) {
        wipe(channel.sharedKey);
        throw new ChannelError("Registry destroyed", "DESTROYED");
      }
      this.register(channel);
      this.byAddress.set(peerAddress, channel.connectionId);
      return channel;
    } catch (err) {
      this.emitHandshakeFailed(peerAddress, "INITIATOR", err);
      throw err;
    } finally {
      this.inflight.delete(peerAddress);
    }
  }

  private exchange(peerAddress: PeerAddress, request: HandshakeRequest): Promise<HandshakeReply> {
    return new Promise<HandshakeReply>((resolve, reject) => {
      const { handshakeId } = request;
      const timer = setTimeout(() => {
        this.pendingReplies.delete(handshakeId);
        reject(
          new ChannelError(
            `Handshake with ${peerAddress} timed out after ${this.config.handshakeTimeoutMs}ms`,
            "HANDSHAKE_TIMEOUT"
          )
        );
      }, this.config.handshakeTimeoutMs);

      this.pendingReplies.set(handshakeId, { peerAddress, resolve, reject, timer });
      log.registry("handshake %s -> %s", handshakeId, peerAddress);

      this.transport.transmit(peerAddress, encodeFrame(request)).catch((err: unknown) => {
        const pending = this.pendingReplies.get(handshakeId);
        if (!pending) return;
        clearTimeout(pending.timer);
        this.pendingReplies.delete(handshakeId);
        pending.reject(err instanceof Error ? err : new Error(String(err)));
      });
    });
  }

  // ─── Internal: Transport Message Dispatch ───────────────────────

  private handleTransportMessage(data: Uint8Array, from: PeerAddress): void {
    let frame: WireFrame;
    try {
      frame = decodeFrame(data);
    } catch (err) {
      log.registry("dropped frame from %s: %s", from, describe(err));
      // Every frame carries its handshake or connection id at bytes 1..16.
      const answered =
        data.length > ID_LENGTH
          ? this.pendingAnsweredBy(bytesToHex(data.subarray(1, 1 + ID_LENGTH)), from)
          : undefined;
      if (answered !== undefined) {
        this.failPending(
          answered,
          from,
          new ProtocolViolationError(
            `Malformed answer to handshake ${answered} from ${from}: ${describe(err)}`,
            "MALFORMED_FRAME"
          )
        );
      }
      return;
    }

    switch (frame.kind) {
      case "HANDSHAKE_REQUEST": {
        const answered = this.pendingAnsweredBy(frame.handshakeId, from);
        if (answered !== undefined) {
          this.failUnexpected(answered, from, frame.kind);
          break;
        }
        this.handleRequest(frame, from);
        break;
      }
      case "HANDSHAKE_REPLY":
        this.settle(frame.handshakeId, from, (pending) => pending.resolve(frame));
        break;
      case "HANDSHAKE_REJECT":
        this.settle(frame.handshakeId, from, (pending) =>
          pending.reject(rejectionError(frame, from))
        );
        break;
      case "TRAFFIC": {
        const answered = this.pendingAnsweredBy(frame.connectionId, from);
        if (answered !== undefined) {
          this.failUnexpected(answered, from, frame.kind);
          break;
        }
        this.handleTraffic(frame);
        break;
      }
    }
  }

  /**
   * The pending handshake that `id` names, when `from` is the peer it was sent to.
   */
  private pendingAnsweredBy(id: string, from: PeerAddress): HandshakeId | undefined {
    for (const [handshakeId, pending] of this.pendingReplies) {
      if (handshakeId === id && pending.peerAddress === from) return handshakeId;
    }
    return undefined;
  }

  private failPending(handshakeId: HandshakeId, from: PeerAddress, err: Error): void {
    this.settle(handshakeId, from, (pending) => pending.reject(err));
  }

  private failUnexpected(handshakeId: HandshakeId, from: PeerAddress, kind: WireFrame["kind"]): void {
    this.failPending(
      handshakeId,
      from,
      new ProtocolViolationError(
        `Handshake ${handshakeId} answered by ${from} with ${kind}`,
        "UNEXPECTED_MESSAGE"
      )
    );
  }

  private handleRequest(request: HandshakeRequest, from: PeerAddress): void {
    let accepted: { reply: HandshakeReply; channel: Channel };
    try {
      accepted = this.keyAgreement.respond(request, from);
    } catch (err) {
      this.emitHandshakeFailed(from, "RESPONDER", err);
      const reason = rejectReason(err);
      if (reason === null) {
        log.registry("handshake %s from %s failed: %s", request.handshakeId, from, describe(err));
        return;
      }
      const reject: HandshakeReject = {
        kind: "HANDSHAKE_REJECT",
        handshakeId: request.handshakeId,
        reason,
      };
      this.transport.transmit(from, encodeFrame(reject)).catch((sendErr: unknown) => {
        log.registry("could not send reject to %s: %s", from, describe(sendErr));
      });
      return;
    }

    const { reply, channel } = accepted;
    this.register(channel);
    this.transport.transmit(from, encodeFrame(reply)).catch((err: unknown) => {
      log.registry("could not send reply to %s: %s", from, describe(err));
      if (this.channels.has(channel.connectionId)) {
        this.closeWithReason(channel.connectionId, "LOCAL");
      }
    });
  }

  private settle(
    handshakeId: HandshakeId,
    from: PeerAddress,
    action: (pending: PendingReply) => void
  ): void {
    const pending = this.pendingReplies.get(handshakeId);
    if (!pending) {
      log.registry("no pending handshake %s; frame from %s dropped", handshakeId, from);
      return;
    }
    if (pending.peerAddress !== from) {
      log.registry(
        "handshake %s answered by %s instead of %s; dropped",
        handshakeId,
        from,
        pending.peerAddress
      );
      return;
    }
    clearTimeout(pending.timer);
    this.pendingReplies.delete(handshakeId);
    action(pending);
  }

  private handleTraffic(frame: TrafficFrame): void {
    const channel = this.lookup(frame.connectionId);
    if (!channel) {
      log.registry("traffic for unknown connection %s dropped", frame.connectionId);
      this.emit({
        type: "FRAGMENT_REJECTED",
        connectionId: frame.connectionId,
        reason: "UNKNOWN_CONNECTION",
        timestamp: Date.now() as EpochMillis,
      });
      return;
    }
    for (const listener of [...this.trafficListeners]) {
      try {
        listener(channel, frame.fragment);
      } catch (err) {
        log.registry("traffic listener failed on %s: %s", frame.connectionId, describe(err));
      }
    }
  }

  // ─── Internal: Lifecycle ────────────────────────────────────────

  private register(channel: Channel): void {
    this.channels.set(channel.connectionId, channel);
    this.scheduleIdleTimer(channel.connectionId);
    log.registry(
      "established %s with %s as %s",
      channel.connectionId,
      channel.peerAddress,
      channel.role
    );
    this.emit({
      type: "CHANNEL_ESTABLISHED",
      channel: toChannelInfo(channel),
      timestamp: Date.now() as EpochMillis,
    });
  }

  private scheduleIdleTimer(connectionId: ConnectionId): void {
    const previous = this.idleTimers.get(connectionId);
    if (previous !== undefined) clearTimeout(previous);
    this.idleTimers.set(
      connectionId,
      setTimeout(() => this.expire(connectionId), this.config.idleTimeoutMs)
    );
  }

  private expire(connectionId: ConnectionId): void {
    const closed = this.teardown(connectionId);
    if (!closed) return;
    const idleMs = Date.now() - closed.lastActivity;
    log.registry("expired %s after %dms idle", connectionId, idleMs);
    this.emit({
      type: "CHANNEL_EXPIRED",
      channel: toChannelInfo(closed),
      idleMs,
      timestamp: Date.now() as EpochMillis,
    });
  }

  /**
   * Remove a channel from every table and zero its key.
   * @returns The final record, or undefined if there was none.
   */
  private teardown(connectionId: ConnectionId): Channel | undefined {
    const channel = this.channels.get(connectionId);
    if (!channel) return undefined;

    const timer = this.idleTimers.get(connectionId);
    if (timer !== undefined) clearTimeout(timer);
    this.idleTimers.delete(connectionId);
    this.channels.delete(connectionId);
    if (this.byAddress.get(channel.peerAddress) === connectionId) {
      this.byAddress.delete(channel.peerAddress);
    }
    wipe(channel.sharedKey);

    return { ...channel, status: "CLOSED" };
  }

  private emitHandshakeFailed(peerAddress: PeerAddress, role: ChannelRole, err: unknown): void {
    log.handshake("%s handshake with %s failed: %s", role, peerAddress, describe(err));
    this.emit({
      type: "HANDSHAKE_FAILED",
      peerAddress,
      role,
      errorName: err instanceof Error ? err.name : "Error",
      message: describe(err),
      timestamp: Date.now() as EpochMillis,
    });
  }
}

// ─── Internal: Rejection Mapping ─────────────────────────────────────

function rejectReason(err: unknown): HandshakeRejectReason | null {
  if (err instanceof IdentificationError) return "IDENTIFICATION";
  if (err instanceof AuthorizationError) return "AUTHORIZATION";
  if (err instanceof ProtocolViolationError) return "PROTOCOL";
  return null;
}

function rejectionError(frame: HandshakeReject, from: PeerAddress): Error {
  const message = `Handshake ${frame.handshakeId} rejected by ${from}`;
  switch (frame.reason) {
    case "IDENTIFICATION":
      return new IdentificationError(`${message}: identification failed`, "INVALID_POINT");
    case "AUTHORIZATION":
      return new AuthorizationError(`${message}: not authorized`, "NOT_AUTHORIZED");
    case "PROTOCOL":
      return new ProtocolViolationError(`${message}: protocol violation`, "UNEXPECTED_MESSAGE");
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
