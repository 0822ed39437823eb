/**
 * TypedEventBus: typed internal pub/sub for progress reporting.
 *
 * Built on top of Node.js EventEmitter.
 *
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - The bus depends on no module other than the event map.
 */

import { EventEmitter } from 'node:events'
import type { PhasewrightEvents } from './event-bus.types.js'

export type EventName = keyof PhasewrightEvents

export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * All registered handlers run before emit() returns.
   */
  emit<K extends EventName>(event: K, payload: PhasewrightEvents[K]): void

  on<K extends EventName>(event: K, handler: (payload: PhasewrightEvents[K]) => void): void

  /** Unsubscribe a handler; a no-op if it was never registered */
  off<K extends EventName>(event: K, handler: (payload: PhasewrightEvents[K]) => void): void
}

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('item:completed', ({ itemId }) => {
 *   console.log(`Item ${itemId} finished`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  emit<K extends EventName>(event: K, payload: PhasewrightEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends EventName>(event: K, handler: (payload: PhasewrightEvents[K]) => void): void {
    // EventEmitter passes arguments as rest params; cast to satisfy TypeScript
    this._emitter.on(event, handler as (arg: unknown) => void)
  }

  off<K extends EventName>(event: K, handler: (payload: PhasewrightEvents[K]) => void): void {
    this._emitter.off(event, handler as (arg: unknown) => void)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
