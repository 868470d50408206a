/**
 * @module types/transport
 * @description Transport abstraction for the message-passing substrate.
 *
 * The core only needs two things from a transport: send bytes to an
 * address, and be told when bytes arrive from one. Delivery order is not
 * guaranteed, and nothing above this layer assumes it.
 */

import type { MessageId, PeerAddress } from "./branded.js";

/**
 * Callback for inbound frames. `from` is the sender's transport address.
 */
export type TransportReceiveCallback = (data: Uint8Array, from: PeerAddress) => void;

/**
 * One piece of a chunked payload, as produced by the chunker.
 */
export interface MessageChunk {
  /** Shared by every chunk of the same payload. */
  readonly messageId: MessageId;
  /** Chunk index (0-based). */
  readonly index: number;
  /** Total number of chunks. */
  readonly total: number;
  /** Chunk payload bytes. */
  readonly data: Uint8Array;
}
