/**
 * @module types/events
 * @description Event catalog for channel lifecycle and traffic.
 *
 * The registry and the node emit typed events so that applications can
 * observe channels without reaching into them. No event carries key
 * material: channels appear as `ChannelInfo`.
 */

import type { ConnectionId, EpochMillis, MessageId, PeerAddress } from "./branded.js";
import type { ChannelCloseReason, ChannelInfo } from "./channel.js";

// ─── Channel Events ─────────────────────────────────────────────────

/** Emitted on both ends when a handshake produces a channel. */
export interface ChannelEstablishedEvent {
  readonly type: "CHANNEL_ESTABLISHED";
  readonly channel: ChannelInfo;
  readonly timestamp: EpochMillis;
}

/** Emitted when a channel sat idle past the timeout and its key was erased. */
export interface ChannelExpiredEvent {
  readonly type: "CHANNEL_EXPIRED";
  readonly channel: ChannelInfo;
  readonly idleMs: number;
  readonly timestamp: EpochMillis;
}

/** Emitted when a channel is torn down for any reason other than idleness. */
export interface ChannelClosedEvent {
  readonly type: "CHANNEL_CLOSED";
  readonly channel: ChannelInfo;
  readonly reason: ChannelCloseReason;
  readonly timestamp: EpochMillis;
}

/** Emitted when a handshake attempt ends in an error, on either side. */
export interface HandshakeFailedEvent {
  readonly type: "HANDSHAKE_FAILED";
  readonly peerAddress: PeerAddress;
  readonly role: "INITIATOR" | "RESPONDER";
  readonly errorName: string;
  readonly message: string;
  readonly timestamp: EpochMillis;
}

// ─── Traffic Events ─────────────────────────────────────────────────

/** Why an inbound fragment was dropped. */
export type FragmentRejectReason =
  | "AUTHENTICATION"
  | "REPLAY"
  | "UNKNOWN_CONNECTION"
  | "MALFORMED";

/** Emitted for every inbound fragment that is dropped. */
export interface FragmentRejectedEvent {
  readonly type: "FRAGMENT_REJECTED";
  readonly connectionId: ConnectionId | null;
  readonly reason: FragmentRejectReason;
  readonly timestamp: EpochMillis;
}

/** Emitted when a full payload has been reassembled and delivered. */
export interface MessageReceivedEvent {
  readonly type: "MESSAGE_RECEIVED";
  readonly connectionId: ConnectionId;
  readonly peerAddress: PeerAddress;
  readonly sizeBytes: number;
  readonly timestamp: EpochMillis;
}

/** Emitted after every fragment of a payload has been handed to the transport. */
export interface TransmitCompleteEvent {
  readonly type: "TRANSMIT_COMPLETE";
  readonly connectionId: ConnectionId;
  readonly bytesSent: number;
  readonly fragmentCount: number;
  readonly timestamp: EpochMillis;
}

/** Emitted when chunked data is fully reassembled. */
export interface ReassemblyCompleteEvent {
  readonly type: "REASSEMBLY_COMPLETE";
  readonly messageId: MessageId;
  readonly totalBytes: number;
  readonly fragmentCount: number;
  readonly timestamp: EpochMillis;
}

/** Emitted when an incomplete message is abandoned. */
export interface ReassemblyTimeoutEvent {
  readonly type: "REASSEMBLY_TIMEOUT";
  readonly messageId: MessageId;
  readonly received: number;
  readonly expected: number;
  readonly timestamp: EpochMillis;
}

// ─── Union Types ────────────────────────────────────────────────────

/** All channel lifecycle events. */
export type ChannelEvent =
  | ChannelEstablishedEvent
  | ChannelExpiredEvent
  | ChannelClosedEvent
  | HandshakeFailedEvent;

/** All traffic events. */
export type TrafficEvent =
  | FragmentRejectedEvent
  | MessageReceivedEvent
  | TransmitCompleteEvent
  | ReassemblyCompleteEvent
  | ReassemblyTimeoutEvent;

/** Union of all events. */
export type SecureChannelEvent = ChannelEvent | TrafficEvent;

/**
 * Extract the event type string literal from a SecureChannelEvent.
 */
export type SecureChannelEventType = SecureChannelEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type SecureChannelEventMap = {
  CHANNEL_ESTABLISHED: ChannelEstablishedEvent;
  CHANNEL_EXPIRED: ChannelExpiredEvent;
  CHANNEL_CLOSED: ChannelClosedEvent;
  HANDSHAKE_FAILED: HandshakeFailedEvent;
  FRAGMENT_REJECTED: FragmentRejectedEvent;
  MESSAGE_RECEIVED: MessageReceivedEvent;
  TRANSMIT_COMPLETE: TransmitCompleteEvent;
  REASSEMBLY_COMPLETE: ReassemblyCompleteEvent;
  REASSEMBLY_TIMEOUT: ReassemblyTimeoutEvent;
};
