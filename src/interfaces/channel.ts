/**
 * @module interfaces/channel
 * @description IChannelRegistry: maps remote addresses to live channels.
 *
 * The registry runs the client side of the handshake on first use of an
 * address, answers handshakes from peers, demultiplexes traffic by
 * connection id, and erases channels that sit idle. At most one handshake
 * per address is in flight at any time: concurrent callers share it.
 */

import type { ConnectionId, PeerAddress } from "../types/branded.js";
import type { Channel, Fragment, TrafficDirection } from "../types/channel.js";

/**
 * Default idle period after which a channel's key is erased.
 */
export const DEFAULT_IDLE_TIMEOUT_MS = 20_000;

/**
 * Default time to wait for a handshake reply.
 */
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;

/**
 * Default number of recent seqs remembered per channel for replay rejection.
 */
export const DEFAULT_REPLAY_WINDOW_SIZE = 1024;

/**
 * Registry settings. Anything left out takes the default.
 */
export interface ChannelRegistryConfig {
  /** Idle period before teardown. Default: 20000 (20s) */
  idleTimeoutMs?: number;
  /** How long an initiator waits for a reply. Default: 30000 (30s) */
  handshakeTimeoutMs?: number;
}

/**
 * Errors that may be thrown by IChannelRegistry operations.
 */
export class ChannelError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "HANDSHAKE_TIMEOUT"
      | "HANDSHAKE_REJECTED"
      | "CHANNEL_NOT_FOUND"
      | "DESTROYED"
      | "SEND_FAILED"
      | "NOT_BOOTED"
  ) {
    super(message);
    this.name = "ChannelError";
  }
}

/**
 * Called for every inbound traffic frame whose connection id matches a
 * live channel. The channel is the record at the time of arrival.
 */
export type TrafficListener = (channel: Channel, fragment: Fragment) => void;

/**
 * @interface IChannelRegistry
 */
export interface IChannelRegistry {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Returns the live channel to `peerAddress`, or runs a
   * handshake to create one. Concurrent calls for the same address while
   * a handshake is running all resolve to its result.
   *
   * @postcondition Emits CHANNEL_ESTABLISHED when a new channel is made.
   * @throws {IdentificationError | AuthorizationError | ProtocolViolationError}
   *   if the handshake fails; other channels are unaffected.
   * @throws {ChannelError} code=HANDSHAKE_TIMEOUT if no reply arrives in time.
   * @throws {ChannelError} code=DESTROYED if the registry was shut down.
   */
  getOrCreate(peerAddress: PeerAddress): Promise<Channel>;

  /**
   * @command
   * @description Records traffic on a channel and pushes its expiry out.
   * @returns The updated record, or undefined if the channel is gone.
   */
  touch(connectionId: ConnectionId, direction: TrafficDirection): Channel | undefined;

  /**
   * @command
   * @description Tears a channel down now: erases its key and emits CHANNEL_CLOSED.
   * @throws {ChannelError} code=CHANNEL_NOT_FOUND
   */
  close(connectionId: ConnectionId): void;

  /**
   * @command
   * @description Registers a listener for demultiplexed traffic.
   * @returns Unsubscribe function.
   */
  onTraffic(listener: TrafficListener): () => void;

  /**
   * @command
   * @description Closes every channel, fails every pending handshake and
   * detaches from the transport.
   */
  destroy(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description The live channel this process initiated to `peerAddress`.
   */
  get(peerAddress: PeerAddress): Channel | undefined;

  /**
   * @query
   * @description Any live channel, initiated or accepted, by connection id.
   */
  lookup(connectionId: ConnectionId): Channel | undefined;

  /**
   * @query
   * @description All live channels.
   */
  listChannels(): readonly Channel[];
}
