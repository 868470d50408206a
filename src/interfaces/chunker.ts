/**
 * @module interfaces/chunker
 * @description Splitting payloads into fragment-sized pieces and putting them back.
 *
 * The cipher treats each piece as an opaque blob. Ordering lives here:
 * pieces may be authenticated and handed over in any order.
 */

import type { MessageChunk } from "../types/transport.js";

/**
 * Default upper bound on the data bytes carried by one chunk.
 */
export const DEFAULT_MAX_CHUNK_SIZE = 1024;

/**
 * Default time an incomplete message is kept before it is dropped.
 */
export const DEFAULT_REASSEMBLY_TIMEOUT_MS = 30_000;

/**
 * Most chunks a single payload may be split into (16-bit index).
 */
export const MAX_CHUNKS_PER_MESSAGE = 0xffff;

/**
 * @interface IReassembler
 */
export interface IReassembler {
  /**
   * @command
   * @description Add one chunk received on `streamKey` (usually the
   * connection id). Returns the full payload once the last missing chunk
   * arrives, otherwise null. Duplicate chunks are ignored.
   */
  accept(streamKey: string, chunk: MessageChunk): Uint8Array | null;

  /**
   * @command
   * @description Drop every partial message for `streamKey`.
   */
  discard(streamKey: string): void;

  /**
   * @query
   * @description Number of messages waiting for more chunks.
   */
  pendingCount(): number;
}
