/**
 * @module interfaces/transport
 * @description ITransport: the asynchronous message-passing substrate.
 *
 * Sockets, relays and radio links live behind this interface. The core
 * hands it fully framed bytes and expects nothing about delivery order.
 */

import type { PeerAddress } from "../types/branded.js";
import type { TransportReceiveCallback } from "../types/transport.js";

/**
 * Errors that may be thrown by ITransport operations.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "MEDIUM_UNAVAILABLE"
      | "MTU_EXCEEDED"
      | "ADDRESS_UNREACHABLE"
      | "REASSEMBLY_TIMEOUT"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * @interface ITransport
 */
export interface ITransport {
  /**
   * @command
   * @description Hands a frame to the substrate for delivery to `address`.
   * Resolves once the frame is accepted, not once it arrives.
   *
   * @throws {TransportError} code=MEDIUM_UNAVAILABLE if the transport is closed.
   * @throws {TransportError} code=ADDRESS_UNREACHABLE if nothing listens at `address`.
   */
  transmit(address: PeerAddress, data: Uint8Array): Promise<void>;

  /**
   * @command
   * @description Registers a callback for inbound frames.
   * @returns Unsubscribe function.
   */
  onReceive(callback: TransportReceiveCallback): () => void;

  /**
   * @query
   * @description The address peers use to reach this transport.
   */
  getLocalAddress(): PeerAddress;

  /**
   * @command
   * @description Detaches from the substrate and drops all listeners.
   */
  close(): void;
}
