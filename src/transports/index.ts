/**
 * @module transports
 * @description Transport implementations.
 */

export { InMemoryBus, InMemoryTransport } from "./in-memory.js";
export type { InMemoryTransportOptions } from "./in-memory.js";
