/**
 * @module types/branded
 * @description Branded types for compile-time safety across the channel protocol.
 *
 * Branded types keep raw primitives (strings, bigints, Uint8Arrays) from
 * being passed where a protocol-level value is expected. A raw string can
 * never be used as a ConnectionId, and a raw Uint8Array can never be used
 * as a SharedKey without going through the code that produces one.
 *
 * @example
 * ```ts
 * const raw = "9f2c...";
 * // Type error: string is not assignable to ConnectionId
 * const id: ConnectionId = raw;
 * // Correct:
 * const id = randomConnectionId();
 * ```
 */

/** Unique symbol for branding. Not exported: internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Addressing Brands ──────────────────────────────────────────────

/**
 * Transport-level address of a remote endpoint (e.g. "alice", "10.0.0.4:7000").
 * Opaque to the core; only the transport interprets it.
 */
export type PeerAddress = Brand<string, "PeerAddress">;

/**
 * 16 random bytes, hex-encoded. Identifies one channel on the wire.
 * Travels in clear and carries no authentication weight.
 */
export type ConnectionId = Brand<string, "ConnectionId">;

/**
 * 16 random bytes, hex-encoded. The client's ephemeral id, used to match
 * a handshake reply to the attempt that asked for it.
 */
export type HandshakeId = Brand<string, "HandshakeId">;

/**
 * 8 random bytes, hex-encoded. Tags the chunks of one outbound message.
 */
export type MessageId = Brand<string, "MessageId">;

// ─── Cryptographic Brands ───────────────────────────────────────────

/**
 * A 33-byte SEC1 compressed P-256 point (0x02 or 0x03 prefix).
 */
export type CompressedPoint = Brand<Uint8Array, "CompressedPoint">;

/**
 * A 32-byte P-256 secret scalar, big-endian.
 */
export type SecretScalar = Brand<Uint8Array, "SecretScalar">;

/**
 * The 32-byte symmetric key shared by both ends of a channel (EKey).
 * Lives only in memory and is zeroed when the channel is torn down.
 */
export type SharedKey = Brand<Uint8Array, "SharedKey">;

/**
 * A fragment sequence number drawn from the NonceSource.
 * Wider than 256 bits; never reused within a process.
 */
export type Nonce = Brand<bigint, "Nonce">;

/**
 * A 32-byte SHA-256 fragment authentication tag.
 */
export type AuthTag = Brand<Uint8Array, "AuthTag">;

// ─── Time Brands ────────────────────────────────────────────────────

/**
 * Milliseconds since the Unix epoch (Date.now()).
 */
export type EpochMillis = Brand<number, "EpochMillis">;
