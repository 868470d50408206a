/**
 * @module types
 * @description Public type exports for the channel protocol.
 */

export * from "./branded.js";
export * from "./channel.js";
export * from "./handshake.js";
export * from "./identity.js";
export * from "./transport.js";
export * from "./events.js";
