/**
 * @module codec/chunker
 * @description Payload chunking and reassembly.
 *
 * Chunk layout (the plaintext of one fragment):
 *   messageId(8) ‖ index(u16be) ‖ total(u16be) ‖ data
 *
 * A payload of zero bytes still produces one chunk, so the receiver has
 * something to deliver.
 */

import { ChannelEmitter } from "../primitives/base-emitter.js";
import type { IReassembler } from "../interfaces/chunker.js";
import {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_REASSEMBLY_TIMEOUT_MS,
  MAX_CHUNKS_PER_MESSAGE,
} from "../interfaces/chunker.js";
import { ProtocolViolationError } from "../interfaces/errors.js";
import type { EpochMillis, MessageId } from "../types/branded.js";
import type { MessageChunk } from "../types/transport.js";
import { bytesToHex, hexToBytes, randomMessageId } from "../backends/crypto-utils.js";
import { log } from "../logger.js";

const MESSAGE_ID_LENGTH = 8;

/** Bytes in front of every chunk's data. */
export const CHUNK_HEADER_LENGTH = MESSAGE_ID_LENGTH + 2 + 2;

// ─── Splitting ──────────────────────────────────────────────────────

/**
 * Split `payload` into chunks of at most `maxChunkSize` data bytes.
 *
 * @throws {RangeError} if `maxChunkSize` is not positive, or the payload
 *   would need more than 65535 chunks.
 */
export function chunkPayload(
  payload: Uint8Array,
  maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE,
  messageId: MessageId = randomMessageId()
): MessageChunk[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
  }
  const total = Math.max(1, Math.ceil(payload.length / maxChunkSize));
  if (total > MAX_CHUNKS_PER_MESSAGE) {
    throw new RangeError(
      `Payload of ${payload.length} bytes needs ${total} chunks (max ${MAX_CHUNKS_PER_MESSAGE})`
    );
  }

  const chunks: MessageChunk[] = [];
  for (let index = 0; index < total; index++) {
    const start = index * maxChunkSize;
    chunks.push({
      messageId,
      index,
      total,
      data: payload.slice(start, start + maxChunkSize),
    });
  }
  return chunks;
}

export function encodeChunk(chunk: MessageChunk): Uint8Array {
  const buffer = new Uint8Array(CHUNK_HEADER_LENGTH + chunk.data.length);
  const view = new DataView(buffer.buffer);
  buffer.set(hexToBytes(chunk.messageId), 0);
  view.setUint16(MESSAGE_ID_LENGTH, chunk.index, false);
  view.setUint16(MESSAGE_ID_LENGTH + 2, chunk.total, false);
  buffer.set(chunk.data, CHUNK_HEADER_LENGTH);
  return buffer;
}

/**
 * @throws {ProtocolViolationError} code=MALFORMED_FRAME if the header is
 *   short or the index is out of range.
 */
export function decodeChunk(bytes: Uint8Array): MessageChunk {
  if (bytes.length < CHUNK_HEADER_LENGTH) {
    throw new ProtocolViolationError(
      `Chunk too short (${bytes.length} bytes)`,
      "MALFORMED_FRAME"
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const index = view.getUint16(MESSAGE_ID_LENGTH, false);
  const total = view.getUint16(MESSAGE_ID_LENGTH + 2, false);
  if (total === 0 || index >= total) {
    throw new ProtocolViolationError(
      `Chunk index ${index} out of range for total ${total}`,
      "MALFORMED_FRAME"
    );
  }
  return {
    messageId: bytesToHex(bytes.subarray(0, MESSAGE_ID_LENGTH)) as MessageId,
    index,
    total,
    data: bytes.slice(CHUNK_HEADER_LENGTH),
  };
}

// ─── Reassembly ─────────────────────────────────────────────────────

interface PartialMessage {
  readonly streamKey: string;
  readonly messageId: MessageId;
  readonly parts: (Uint8Array | undefined)[];
  received: number;
  timer: ReturnType<typeof setTimeout>;
}

export interface ReassemblerConfig {
  /** How long a partial message may wait for its missing chunks. Default: 30000 */
  timeoutMs?: number;
}

/**
 * Reassembler: collects chunks per (stream, messageId) in any order.
 *
 * Emits REASSEMBLY_COMPLETE when a message is whole and REASSEMBLY_TIMEOUT
 * when one is abandoned.
 */
export class Reassembler extends ChannelEmitter implements IReassembler {
  private readonly partials = new Map<string, PartialMessage>();
  private readonly timeoutMs: number;

  constructor(config: ReassemblerConfig = {}) {
    super();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REASSEMBLY_TIMEOUT_MS;
  }

  accept(streamKey: string, chunk: MessageChunk): Uint8Array | null {
    if (chunk.total === 1) {
      this.emitComplete(chunk.messageId, chunk.data.length, 1);
      return chunk.data;
    }

    const key = `${streamKey}:${chunk.messageId}`;
    let partial = this.partials.get(key);
    if (!partial) {
      partial = {
        streamKey,
        messageId: chunk.messageId,
        parts: new Array<Uint8Array | undefined>(chunk.total).fill(undefined),
        received: 0,
        timer: setTimeout(() => this.expire(key), this.timeoutMs),
      };
      this.partials.set(key, partial);
    } else if (partial.parts.length !== chunk.total) {
      log.reassembly(
        "chunk of %s claims %d parts, expected %d; dropped",
        chunk.messageId,
        chunk.total,
        partial.parts.length
      );
      return null;
    }

    if (partial.parts[chunk.index] !== undefined) return null;
    partial.parts[chunk.index] = chunk.data;
    partial.received++;

    if (partial.received < partial.parts.length) return null;

    clearTimeout(partial.timer);
    this.partials.delete(key);

    let totalBytes = 0;
    for (const part of partial.parts) totalBytes += part?.length ?? 0;
    const payload = new Uint8Array(totalBytes);
    let offset = 0;
    for (const part of partial.parts) {
      if (!part) continue;
      payload.set(part, offset);
      offset += part.length;
    }

    this.emitComplete(chunk.messageId, totalBytes, partial.parts.length);
    return payload;
  }

  discard(streamKey: string): void {
    for (const [key, partial] of this.partials) {
      if (partial.streamKey === streamKey) {
        clearTimeout(partial.timer);
        this.partials.delete(key);
      }
    }
  }

  pendingCount(): number {
    return this.partials.size;
  }

  /**
   * Drop every partial message and cancel its timer.
   */
  clear(): void {
    for (const partial of this.partials.values()) {
      clearTimeout(partial.timer);
    }
    this.partials.clear();
  }

  // ─── Internal ───────────────────────────────────────────────────

  private expire(key: string): void {
    const partial = this.partials.get(key);
    if (!partial) return;
    this.partials.delete(key);
    log.reassembly(
      "message %s timed out with %d/%d chunks",
      partial.messageId,
      partial.received,
      partial.parts.length
    );
    this.emit({
      type: "REASSEMBLY_TIMEOUT",
      messageId: partial.messageId,
      received: partial.received,
      expected: partial.parts.length,
      timestamp: Date.now() as EpochMillis,
    });
  }

  private emitComplete(messageId: MessageId, totalBytes: number, fragmentCount: number): void {
    this.emit({
      type: "REASSEMBLY_COMPLETE",
      messageId,
      totalBytes,
      fragmentCount,
      timestamp: Date.now() as EpochMillis,
    });
  }
}
