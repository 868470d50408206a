/**
 * @module backends
 * @description Crypto backend implementations.
 */

export { StaticIdentityProvider } from "./static-identity.js";
export * from "./crypto-utils.js";
