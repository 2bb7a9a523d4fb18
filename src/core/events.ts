/**
 * Typed Event System
 *
 * EventEmitter wrapper checking event names and payloads against a map.
 */

import { EventEmitter } from 'events';

type Listener<T> = (payload: T) => void;

/**
 * Strongly typed EventEmitter
 */
export class TypedEventEmitter<TEventMap extends object> {
  private emitter = new EventEmitter();

  /**
   * Registers an event listener with proper typing
   */
  on<K extends keyof TEventMap & string>(event: K, listener: Listener<TEventMap[K]>): this {
    this.emitter.on(event, listener);
    return this;
  }

  /**
   * Registers a one-time event listener
   */
  once<K extends keyof TEventMap & string>(event: K, listener: Listener<TEventMap[K]>): this {
    this.emitter.once(event, listener);
    return this;
  }

  /**
   * Emits an event with payload
   */
  emit<K extends keyof TEventMap & string>(event: K, payload: TEventMap[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEventMap & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
