/**
 * @module primitives
 * @description Channel primitives plus the base event emitter.
 */

export { ChannelEmitter } from "./base-emitter.js";
export { NonceSource } from "./nonce-source.js";
export { AuthorizationPolicy } from "./authorization-policy.js";
export type { AuthorizationPolicyOptions } from "./authorization-policy.js";
export { KeyAgreement, deriveSharedKey } from "./key-agreement.js";
export { FragmentCipher } from "./fragment-cipher.js";
export { ChannelRegistry } from "./channel-registry.js";
export { ReplayWindow } from "./replay-window.js";
