/**
 * TypedEventBus — typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 *  - The bus depends on no module.
 */

import { EventEmitter } from 'node:events'
import type { EngineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `EngineEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof EngineEvents>(event: K, handler: (payload: EngineEvents[K]) => void): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof EngineEvents>(event: K, handler: (payload: EngineEvents[K]) => void): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * A handler that throws is reported to `onHandlerError` and delivery continues
 * with the next handler.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('job:terminal', ({ jobId, status }) => {
 *   console.log(`Job ${jobId} finished as ${status}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter
  private readonly _onHandlerError: (err: unknown, event: string) => void

  constructor(onHandlerError?: (err: unknown, event: string) => void) {
    this._emitter = new EventEmitter()
    // Live subscriptions attach through the broadcaster's single listener;
    // transports and CLI renderers add a few of their own
    this._emitter.setMaxListeners(100)
    this._onHandlerError = onHandlerError ?? (() => undefined)
  }

  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void {
    for (const listener of this._emitter.listeners(event)) {
      try {
        ;(listener as (arg: EngineEvents[K]) => void)(payload)
      } catch (err) {
        this._onHandlerError(err, event)
      }
    }
  }

  on<K extends keyof EngineEvents>(event: K, handler: (payload: EngineEvents[K]) => void): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof EngineEvents>(event: K, handler: (payload: EngineEvents[K]) => void): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus((err, event) => logger.warn({ err, event }, 'Event handler threw'))
 */
export function createEventBus(onHandlerError?: (err: unknown, event: string) => void): TypedEventBus {
  return new TypedEventBusImpl(onHandlerError)
}
