/**
 * @module primitives/base-emitter
 * @description Typed emitter shared by the registry, the reassembler and the node.
 *
 * The registry reports channel lifecycle and handshake failures, the
 * reassembler reports completed and abandoned messages, and the node
 * re-emits both alongside its own traffic events. Most of these fire while
 * an inbound frame is being handled, so a listener that throws is logged
 * and the remaining listeners still run.
 */

import type { IChannelEmitter, EventListener } from "../interfaces/event-emitter.js";
import type { SecureChannelEventMap, SecureChannelEventType } from "../types/events.js";
import { log } from "../logger.js";

type AnyListener = EventListener<SecureChannelEventType>;

export class ChannelEmitter implements IChannelEmitter {
  private readonly listeners = new Map<SecureChannelEventType, Set<AnyListener>>();

  on<T extends SecureChannelEventType>(eventType: T, listener: EventListener<T>): void {
    const set = this.listeners.get(eventType) ?? new Set<AnyListener>();
    set.add(listener as AnyListener);
    this.listeners.set(eventType, set);
  }

  once<T extends SecureChannelEventType>(eventType: T, listener: EventListener<T>): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends SecureChannelEventType>(eventType: T, listener: EventListener<T>): void {
    const set = this.listeners.get(eventType);
    if (!set) return;
    set.delete(listener as AnyListener);
    if (set.size === 0) this.listeners.delete(eventType);
  }

  emit<T extends SecureChannelEventType>(event: SecureChannelEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (err) {
        log.events(
          "%s listener failed: %s",
          event.type,
          err instanceof Error ? err.message : String(err)
        );
      }
    }
  }

  listenerCount(eventType: SecureChannelEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }

  /** Drop every listener, or only those for `eventType`. */
  removeAllListeners(eventType?: SecureChannelEventType): void {
    if (eventType === undefined) this.listeners.clear();
    else this.listeners.delete(eventType);
  }
}
