/**
 * @module transports/in-memory
 * @description Addressed in-process transport for tests and single-process setups.
 *
 * Every InMemoryTransport registers its address on a shared static bus.
 * `transmit` copies the frame and delivers it to the target in a
 * microtask, so sending never re-enters the receiver synchronously.
 */

import type { ITransport } from "../interfaces/transport.js";
import { TransportError } from "../interfaces/transport.js";
import type { PeerAddress } from "../types/branded.js";
import type { TransportReceiveCallback } from "../types/transport.js";
import { log } from "../logger.js";

type Deliver = (data: Uint8Array, from: PeerAddress) => void;

/**
 * Static address → receiver table shared by every InMemoryTransport.
 */
export class InMemoryBus {
  private static endpoints = new Map<string, Deliver>();

  static attach(address: PeerAddress, deliver: Deliver): void {
    if (this.endpoints.has(address)) {
      throw new TransportError(`Address ${address} is already attached`, "MEDIUM_UNAVAILABLE");
    }
    this.endpoints.set(address, deliver);
  }

  static detach(address: PeerAddress): void {
    this.endpoints.delete(address);
  }

  static send(from: PeerAddress, to: PeerAddress, data: Uint8Array): void {
    const deliver = this.endpoints.get(to);
    if (!deliver) {
      throw new TransportError(`No endpoint at ${to}`, "ADDRESS_UNREACHABLE");
    }
    const copy = Uint8Array.from(data);
    queueMicrotask(() => deliver(copy, from));
  }

  /**
   * Detach every endpoint (useful for tests).
   */
  static reset(): void {
    this.endpoints.clear();
  }
}

export interface InMemoryTransportOptions {
  /** Largest frame accepted by `transmit`. Default: 65535 */
  mtu?: number;
}

/**
 * InMemoryTransport: one endpoint on the InMemoryBus.
 *
 * @example
 * ```ts
 * const alice = new InMemoryTransport("alice" as PeerAddress);
 * const bob = new InMemoryTransport("bob" as PeerAddress);
 * bob.onReceive((data, from) => console.log(from, data));
 * await alice.transmit(bob.getLocalAddress(), frame);
 * ```
 */
export class InMemoryTransport implements ITransport {
  private readonly receiveListeners = new Set<TransportReceiveCallback>();
  private readonly mtu: number;
  private closed = false;

  constructor(
    private readonly address: PeerAddress,
    options: InMemoryTransportOptions = {}
  ) {
    this.mtu = options.mtu ?? 65535;
    InMemoryBus.attach(address, (data, from) => this.handleMessage(data, from));
  }

  // ─── Commands ───────────────────────────────────────────────────

  async transmit(address: PeerAddress, data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new TransportError("Transport is closed", "MEDIUM_UNAVAILABLE");
    }
    if (data.length > this.mtu) {
      throw new TransportError(
        `Frame of ${data.length} bytes exceeds MTU ${this.mtu}`,
        "MTU_EXCEEDED"
      );
    }
    InMemoryBus.send(this.address, address, data);
  }

  onReceive(callback: TransportReceiveCallback): () => void {
    this.receiveListeners.add(callback);
    return () => {
      this.receiveListeners.delete(callback);
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.receiveListeners.clear();
    InMemoryBus.detach(this.address);
  }

  // ─── Queries ────────────────────────────────────────────────────

  getLocalAddress(): PeerAddress {
    return this.address;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private handleMessage(data: Uint8Array, from: PeerAddress): void {
    if (this.closed) return;
    log.transport("%s <- %s (%d bytes)", this.address, from, data.length);
    for (const listener of [...this.receiveListeners]) {
      listener(data, from);
    }
  }
}
