/**
 * TypedEventBus: typed internal pub/sub between the supervisor's modules.
 *
 * Built on top of Node.js EventEmitter.
 *
 *  - Event dispatch is SYNCHRONOUS: handlers run before emit() returns.
 *  - Handlers must not throw; a throwing handler is logged and skipped so that
 *    a broken subscriber cannot interrupt a state transition.
 *  - EventBus depends on no module.
 */

import { EventEmitter } from 'node:events'
import type { SupervisorEvents } from './event-bus.types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('event-bus')

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `SupervisorEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof SupervisorEvents>(event: K, payload: SupervisorEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof SupervisorEvents>(
    event: K,
    handler: (payload: SupervisorEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof SupervisorEvents>(
    event: K,
    handler: (payload: SupervisorEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('service:state-changed', ({ service, to }) => {
 *   console.log(`${service} is now ${to}`)
 * })
 * bus.emit('service:state-changed', { service: 'storage', from: 'starting', to: 'running' })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // One monitor loop and one recorder per service may subscribe
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof SupervisorEvents>(event: K, payload: SupervisorEvents[K]): void {
    for (const listener of this._emitter.listeners(event)) {
      try {
        Reflect.apply(listener, undefined, [payload])
      } catch (err) {
        logger.error({ err, event }, 'Event handler threw; continuing')
      }
    }
  }

  on<K extends keyof SupervisorEvents>(
    event: K,
    handler: (payload: SupervisorEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof SupervisorEvents>(
    event: K,
    handler: (payload: SupervisorEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }

  /** Number of handlers registered for an event */
  listenerCount<K extends keyof SupervisorEvents>(event: K): number {
    return this._emitter.listenerCount(event)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
