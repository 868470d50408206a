/**
 * @module ephemeral-channel
 * @description Ephemeral secure channels over an unordered message transport.
 *
 * Exports the channel primitives (nonce source, key agreement,
 * authorization, fragment cipher, channel registry), their interfaces,
 * all type definitions, the event system, the wire codec and chunker,
 * the P-256 backend, the in-memory transport, and the SecureNode
 * orchestrator.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Wire Codec ─────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Crypto Backends ────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { SecureNode } from "./node.js";
export type { AuthFailurePolicy, SecureNodeConfig, SecureNodeStatus } from "./node.js";
