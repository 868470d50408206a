/**
 * @module node
 * @description SecureNode: the orchestrator that wires the channel primitives together.
 *
 * A SecureNode instance manages:
 * - Identity (static key pair, authorization set)
 * - Channels (handshakes, idle expiry, demultiplexing)
 * - Traffic (chunking, per-fragment encryption, replay checks, reassembly)
 *
 * Outbound: chunk → seal → traffic frame → transmit → touch.
 * Inbound:  demux → replay check → decrypt → touch → reassemble → deliver.
 *
 * @example
 * ```ts
 * const node = new SecureNode({ transport: new InMemoryTransport("alice" as PeerAddress) });
 * node.boot();
 *
 * node.onMessage(({ connectionId, payload }) => {
 *   void node.reply(connectionId, payload);
 * });
 *
 * await node.send("bob" as PeerAddress, new TextEncoder().encode("hello"));
 * ```
 */

import { ChannelEmitter } from "./primitives/base-emitter.js";
import { AuthorizationPolicy } from "./primitives/authorization-policy.js";
import { ChannelRegistry } from "./primitives/channel-registry.js";
import { FragmentCipher } from "./primitives/fragment-cipher.js";
import { KeyAgreement } from "./primitives/key-agreement.js";
import { NonceSource } from "./primitives/nonce-source.js";
import { ReplayWindow } from "./primitives/replay-window.js";
import { StaticIdentityProvider } from "./backends/static-identity.js";
import { bytesToHex } from "./backends/crypto-utils.js";
import {
  chunkPayload,
  decodeChunk,
  encodeChunk,
  encodeTraffic,
  Reassembler,
} from "./codec/index.js";
import type { IAuthorizationPolicy } from "./interfaces/authorization.js";
import {
  ChannelError,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_REPLAY_WINDOW_SIZE,
} from "./interfaces/channel.js";
import {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_REASSEMBLY_TIMEOUT_MS,
} from "./interfaces/chunker.js";
import { AuthenticationError } from "./interfaces/errors.js";
import type { IIdentityProvider } from "./interfaces/identity-provider.js";
import type { INonceSource } from "./interfaces/nonce-source.js";
import type { ITransport } from "./interfaces/transport.js";
import type {
  CompressedPoint,
  ConnectionId,
  EpochMillis,
  PeerAddress,
} from "./types/branded.js";
import type {
  Channel,
  ChannelInfo,
  Fragment,
  MessageCallback,
} from "./types/channel.js";
import { toChannelInfo } from "./types/channel.js";
import type { FragmentRejectReason, SecureChannelEventType } from "./types/events.js";
import { log } from "./logger.js";

// ─── Configuration ────────────────────────────────────────────────

/**
 * What to do with a channel when one of its fragments fails authentication.
 * `drop` discards the fragment only; `teardown` also closes the channel.
 */
export type AuthFailurePolicy = "drop" | "teardown";

export interface SecureNodeConfig {
  /** Message-passing substrate. Closed on shutdown. */
  transport: ITransport;
  /** Static identity. Default: a freshly generated key pair */
  identity?: IIdentityProvider;
  /** Peers this node accepts. Default: AuthorizationPolicy.open() */
  authorization?: IAuthorizationPolicy;
  /** Sequence numbers for outbound fragments. Default: NonceSource.shared() */
  nonceSource?: INonceSource;
  /** Idle period before a channel's key is erased. Default: 20000 (20s) */
  idleTimeoutMs?: number;
  /** How long to wait for a handshake reply. Default: 30000 (30s) */
  handshakeTimeoutMs?: number;
  /** Largest payload slice per fragment, in bytes. Default: 1024 */
  maxChunkSize?: number;
  /** How long a partial message waits for its missing chunks. Default: 30000 (30s) */
  reassemblyTimeoutMs?: number;
  /** Default: "drop" */
  authFailurePolicy?: AuthFailurePolicy;
  /** Reject a fragment whose seq was already accepted on the channel. Default: true */
  replayProtection?: boolean;
  /** Recent seqs remembered per channel; older ones count as replays. Default: 1024 */
  replayWindowSize?: number;
}

type TrafficSettings = Required<
  Omit<SecureNodeConfig, "transport" | "identity" | "authorization" | "nonceSource">
>;

export interface SecureNodeStatus {
  readonly booted: boolean;
  readonly address: PeerAddress;
  /** Hex of the compressed static public key. */
  readonly publicKey: string;
  readonly channels: readonly ChannelInfo[];
  readonly pendingMessages: number;
}

/** Events re-emitted from the registry and the reassembler. */
const FORWARDED_EVENTS: readonly SecureChannelEventType[] = [
  "CHANNEL_ESTABLISHED",
  "CHANNEL_EXPIRED",
  "CHANNEL_CLOSED",
  "HANDSHAKE_FAILED",
  "FRAGMENT_REJECTED",
  "REASSEMBLY_COMPLETE",
  "REASSEMBLY_TIMEOUT",
];

// ─── Orchestrator ──────────────────────────────────────────────────

export class SecureNode extends ChannelEmitter {
  readonly identity: IIdentityProvider;
  readonly authorization: IAuthorizationPolicy;
  readonly transport: ITransport;

  private readonly config: TrafficSettings;
  private readonly cipher: FragmentCipher;
  private registry: ChannelRegistry | null = null;
  private reassembler: Reassembler | null = null;
  private booted = false;

  /** Seqs accepted per channel, for replay rejection. */
  private readonly seenSeqs = new Map<ConnectionId, ReplayWindow>();
  private readonly messageCallbacks = new Set<MessageCallback>();

  constructor(config: SecureNodeConfig) {
    super();
    this.transport = config.transport;
    this.identity = config.identity ?? StaticIdentityProvider.generate();
    this.authorization = config.authorization ?? AuthorizationPolicy.open();
    this.cipher = new FragmentCipher(config.nonceSource ?? NonceSource.shared());
    this.config = {
      idleTimeoutMs: config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS,
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
      maxChunkSize: config.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE,
      reassemblyTimeoutMs: config.reassemblyTimeoutMs ?? DEFAULT_REASSEMBLY_TIMEOUT_MS,
      authFailurePolicy: config.authFailurePolicy ?? "drop",
      replayProtection: config.replayProtection ?? true,
      replayWindowSize: config.replayWindowSize ?? DEFAULT_REPLAY_WINDOW_SIZE,
    };
    if (!Number.isInteger(this.config.replayWindowSize) || this.config.replayWindowSize < 1) {
      throw new RangeError(
        `replayWindowSize must be a positive integer, got ${this.config.replayWindowSize}`
      );
    }
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * Start answering handshakes and traffic on the transport.
   */
  boot(): void {
    if (this.booted) return;

    const registry = new ChannelRegistry(
      new KeyAgreement(this.identity, this.authorization),
      this.transport,
      {
        idleTimeoutMs: this.config.idleTimeoutMs,
        handshakeTimeoutMs: this.config.handshakeTimeoutMs,
      }
    );
    const reassembler = new Reassembler({ timeoutMs: this.config.reassemblyTimeoutMs });

    for (const type of FORWARDED_EVENTS) {
      registry.on(type, (event) => this.emit(event));
      reassembler.on(type, (event) => this.emit(event));
    }
    registry.on("CHANNEL_EXPIRED", ({ channel }) => this.forget(channel.connectionId));
    registry.on("CHANNEL_CLOSED", ({ channel }) => this.forget(channel.connectionId));
    registry.onTraffic((channel, fragment) => this.handleFragment(channel, fragment));

    this.registry = registry;
    this.reassembler = reassembler;
    this.booted = true;
    log.node("booted at %s", this.transport.getLocalAddress());
  }

  /**
   * Erase every channel, stop timers and close the transport.
   */
  shutdown(): void {
    if (!this.booted) return;
    this.registry?.destroy();
    this.reassembler?.clear();
    this.registry = null;
    this.reassembler = null;
    this.seenSeqs.clear();
    this.messageCallbacks.clear();
    this.transport.close();
    this.booted = false;
    log.node("shut down");
  }

  // ─── Channels ───────────────────────────────────────────────────

  /**
   * Make sure a channel to `address` exists, running a handshake if needed.
   */
  async connect(address: PeerAddress): Promise<ChannelInfo> {
    const channel = await this.requireRegistry().getOrCreate(address);
    return toChannelInfo(channel);
  }

  /**
   * Close a channel now and erase its key.
   */
  disconnect(connectionId: ConnectionId): void {
    this.requireRegistry().close(connectionId);
  }

  // ─── Traffic ────────────────────────────────────────────────────

  /**
   * Send `payload` to `address` over the channel this node initiated,
   * creating it first if needed.
   *
   * @returns The connection id the payload went out on.
   */
  async send(address: PeerAddress, payload: Uint8Array): Promise<ConnectionId> {
    const channel = await this.requireRegistry().getOrCreate(address);
    await this.transmitOn(channel.connectionId, payload);
    return channel.connectionId;
  }

  /**
   * Send `payload` on an existing channel, typically one a peer opened.
   *
   * @throws {ChannelError} code=CHANNEL_NOT_FOUND if the channel is gone.
   */
  async reply(connectionId: ConnectionId, payload: Uint8Array): Promise<void> {
    if (!this.requireRegistry().lookup(connectionId)) {
      throw new ChannelError(`No channel ${connectionId}`, "CHANNEL_NOT_FOUND");
    }
    await this.transmitOn(connectionId, payload);
  }

  /**
   * Register a callback for reassembled inbound payloads.
   * @returns Unsubscribe function.
   */
  onMessage(callback: MessageCallback): () => void {
    this.messageCallbacks.add(callback);
    return () => {
      this.messageCallbacks.delete(callback);
    };
  }

  // ─── Queries ────────────────────────────────────────────────────

  getPublicKey(): CompressedPoint {
    return this.identity.getPublicKey();
  }

  getStatus(): SecureNodeStatus {
    return {
      booted: this.booted,
      address: this.transport.getLocalAddress(),
      publicKey: bytesToHex(this.identity.getPublicKey()),
      channels: (this.registry?.listChannels() ?? []).map(toChannelInfo),
      pendingMessages: this.reassembler?.pendingCount() ?? 0,
    };
  }

  // ─── Internal: Outbound ─────────────────────────────────────────

  private async transmitOn(connectionId: ConnectionId, payload: Uint8Array): Promise<void> {
    const registry = this.requireRegistry();
    const chunks = chunkPayload(payload, this.config.maxChunkSize);
    let bytesSent = 0;

    for (const chunk of chunks) {
      const channel = registry.lookup(connectionId);
      if (!channel) {
        throw new ChannelError(
          `Channel ${connectionId} closed after ${bytesSent} bytes`,
          "SEND_FAILED"
        );
      }
      const fragment = this.cipher.seal(channel.sharedKey, encodeChunk(chunk));
      const frame = encodeTraffic({ kind: "TRAFFIC", connectionId, fragment });
      await this.transport.transmit(channel.peerAddress, frame);
      registry.touch(connectionId, "SENT");
      bytesSent += frame.length;
    }

    log.node("sent %d bytes in %d fragments on %s", payload.length, chunks.length, connectionId);
    this.emit({
      type: "TRANSMIT_COMPLETE",
      connectionId,
      bytesSent,
      fragmentCount: chunks.length,
      timestamp: Date.now() as EpochMillis,
    });
  }

  // ─── Internal: Inbound ──────────────────────────────────────────

  private handleFragment(channel: Channel, fragment: Fragment): void {
    const { connectionId } = channel;
    const seen = this.seenSeqs.get(connectionId);

    if (this.config.replayProtection && seen?.has(fragment.seq)) {
      log.node("replayed seq on %s dropped", connectionId);
      this.rejectFragment(connectionId, "REPLAY");
      return;
    }

    let plaintext: Uint8Array;
    try {
      plaintext = this.cipher.decrypt(channel.sharedKey, fragment);
    } catch (err) {
      if (!(err instanceof AuthenticationError)) {
        log.node("undecryptable fragment on %s: %s", connectionId, describe(err));
        this.rejectFragment(connectionId, "MALFORMED");
        return;
      }
      log.node("unauthenticated fragment on %s dropped", connectionId);
      this.rejectFragment(connectionId, "AUTHENTICATION");
      const registry = this.registry;
      if (this.config.authFailurePolicy === "teardown" && registry?.lookup(connectionId)) {
        registry.closeWithReason(connectionId, "AUTH_FAILURE");
      }
      return;
    }

    if (this.config.replayProtection) {
      const replayWindow = seen ?? new ReplayWindow(this.config.replayWindowSize);
      replayWindow.add(fragment.seq);
      this.seenSeqs.set(connectionId, replayWindow);
    }
    this.registry?.touch(connectionId, "RECEIVED");

    let payload: Uint8Array | null;
    try {
      payload = this.reassembler?.accept(connectionId, decodeChunk(plaintext)) ?? null;
    } catch (err) {
      log.node("bad chunk on %s: %s", connectionId, describe(err));
      this.rejectFragment(connectionId, "MALFORMED");
      return;
    }
    if (!payload) return;

    this.emit({
      type: "MESSAGE_RECEIVED",
      connectionId,
      peerAddress: channel.peerAddress,
      sizeBytes: payload.length,
      timestamp: Date.now() as EpochMillis,
    });
    const message = { connectionId, peerAddress: channel.peerAddress, role: channel.role, payload };
    for (const callback of [...this.messageCallbacks]) {
      try {
        callback(message);
      } catch (err) {
        log.node("message callback failed on %s: %s", connectionId, describe(err));
      }
    }
  }

  private rejectFragment(connectionId: ConnectionId, reason: FragmentRejectReason): void {
    this.emit({
      type: "FRAGMENT_REJECTED",
      connectionId,
      reason,
      timestamp: Date.now() as EpochMillis,
    });
  }

  private forget(connectionId: ConnectionId): void {
    this.seenSeqs.delete(connectionId);
    this.reassembler?.discard(connectionId);
  }

  private requireRegistry(): ChannelRegistry {
    if (!this.registry) {
      throw new ChannelError("Node is not booted. Call boot() first.", "NOT_BOOTED");
    }
    return this.registry;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
