/**
 * @module interfaces
 * @description Public interface exports for the channel protocol.
 */

export * from "./errors.js";
export * from "./event-emitter.js";
export * from "./identity-provider.js";
export * from "./nonce-source.js";
export * from "./authorization.js";
export * from "./key-agreement.js";
export * from "./fragment-cipher.js";
export * from "./channel.js";
export * from "./chunker.js";
export * from "./transport.js";
