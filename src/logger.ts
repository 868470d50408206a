/**
 * @module logger
 * @description Namespaced debug loggers, one per component.
 *
 * Silent unless enabled, e.g. `DEBUG=ephemeral-channel:*`. Key material
 * is never passed to a logger; connection ids and addresses are.
 */

import debug from "debug";

const ROOT = "ephemeral-channel";

export const log = {
  nonce: debug(`${ROOT}:nonce`),
  handshake: debug(`${ROOT}:handshake`),
  registry: debug(`${ROOT}:registry`),
  cipher: debug(`${ROOT}:cipher`),
  transport: debug(`${ROOT}:transport`),
  reassembly: debug(`${ROOT}:reassembly`),
  node: debug(`${ROOT}:node`),
  events: debug(`${ROOT}:events`),
};
