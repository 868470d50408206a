/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for channel and traffic events.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type { SecureChannelEventMap, SecureChannelEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends SecureChannelEventType> = (
  event: SecureChannelEventMap[T]
) => void;

/**
 * @interface IChannelEmitter
 * @description Typed event emitter for protocol events.
 */
export interface IChannelEmitter {
  /**
   * Register a listener for a specific event type.
   * @param eventType - The event type to listen for.
   * @param listener - Callback receiving the typed event payload.
   */
  on<T extends SecureChannelEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends SecureChannelEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends SecureChannelEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   * A listener that throws does not stop the others.
   */
  emit<T extends SecureChannelEventType>(event: SecureChannelEventMap[T]): void;

  /** Number of listeners registered for `eventType`. */
  listenerCount(eventType: SecureChannelEventType): number;

  /** Drop every listener, or only those for `eventType`. */
  removeAllListeners(eventType?: SecureChannelEventType): void;
}
