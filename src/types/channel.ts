/**
 * @module types/channel
 * @description Channel: one live secure session between two peers.
 *
 * A channel is created by a successful handshake, touched by every
 * fragment that passes through it, and destroyed after a period of
 * silence. Destruction zeroes the shared key, which makes all traffic
 * that crossed the channel permanently undecryptable, including to the
 * two endpoints that produced it.
 *
 * | Field          | Set by            | Changes on          |
 * |----------------|-------------------|---------------------|
 * | connectionId   | responder         | never               |
 * | sharedKey      | both, independently | zeroed at teardown |
 * | lastActivity   | registry          | every fragment      |
 */

import type {
  AuthTag,
  ConnectionId,
  EpochMillis,
  Nonce,
  PeerAddress,
  SharedKey,
} from "./branded.js";

/**
 * Which half of the handshake produced this end of the channel.
 */
export type ChannelRole = "INITIATOR" | "RESPONDER";

/**
 * `ACTIVE` until the registry expires or closes the channel.
 */
export type ChannelStatus = "ACTIVE" | "CLOSED";

/**
 * Direction of a traffic event, for the per-channel counters.
 */
export type TrafficDirection = "SENT" | "RECEIVED";

/**
 * The full channel record. Never leaves the process.
 */
export interface Channel {
  readonly connectionId: ConnectionId;
  /** EKey. The same buffer for the whole life of the channel. */
  readonly sharedKey: SharedKey;
  readonly peerAddress: PeerAddress;
  readonly role: ChannelRole;
  readonly status: ChannelStatus;
  readonly establishedAt: EpochMillis;
  readonly lastActivity: EpochMillis;
  readonly fragmentsSent: number;
  readonly fragmentsReceived: number;
}

/**
 * Channel metadata without key material, safe to put in events and logs.
 */
export type ChannelInfo = Omit<Channel, "sharedKey">;

/**
 * The smallest independently encrypted and authenticated unit.
 */
export interface Fragment {
  readonly seq: Nonce;
  readonly ciphertext: Uint8Array;
  readonly authTag: AuthTag;
}

/**
 * A fully reassembled, decrypted payload handed to the application.
 */
export interface InboundMessage {
  readonly connectionId: ConnectionId;
  readonly peerAddress: PeerAddress;
  /** Which end of the channel this process is. Replies go through `reply(connectionId)`. */
  readonly role: ChannelRole;
  readonly payload: Uint8Array;
}

export type MessageCallback = (message: InboundMessage) => void;

/**
 * Why the teardown happened.
 */
export type ChannelCloseReason = "IDLE" | "AUTH_FAILURE" | "LOCAL" | "SHUTDOWN";

/**
 * Strip the key from a channel record.
 */
export function toChannelInfo(channel: Channel): ChannelInfo {
  const { sharedKey: _key, ...info } = channel;
  return info;
}
