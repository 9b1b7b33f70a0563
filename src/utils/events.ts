/**
 * Typed EventEmitter
 *
 * Sessions, the server and the client all publish their lifecycle through
 * this emitter so listeners get checked argument tuples per event name.
 */

interface ListenerEntry<Args extends unknown[]> {
  listener: (...args: Args) => void;
  once: boolean;
}

type ListenerTable<EventMap extends { [K in keyof EventMap]: unknown[] }> = {
  [K in keyof EventMap]?: ListenerEntry<EventMap[K]>[];
};

/**
 * A typed EventEmitter that provides type-safe event handling.
 *
 * Usage:
 * ```ts
 * interface MyEvents {
 *   data: [Uint8Array];
 *   error: [Error];
 *   close: [];
 * }
 *
 * class MyClass extends EventEmitter<MyEvents> {}
 * ```
 *
 * Unlike Node's emitter, emitting `error` without a listener is not fatal;
 * `emit` just reports that nobody was listening.
 */
export class EventEmitter<EventMap extends { [K in keyof EventMap]: unknown[] }> {
  private _events: ListenerTable<EventMap> = {};

  /**
   * Add a listener for the given event
   */
  on<K extends keyof EventMap>(event: K, listener: (...args: EventMap[K]) => void): this {
    return this._add(event, listener, false);
  }

  /**
   * Add a one-time listener for the given event
   */
  once<K extends keyof EventMap>(event: K, listener: (...args: EventMap[K]) => void): this {
    return this._add(event, listener, true);
  }

  /**
   * Remove a listener for the given event
   */
  off<K extends keyof EventMap>(event: K, listener: (...args: EventMap[K]) => void): this {
    const listeners = this._events[event];
    if (!listeners) return this;

    const index = listeners.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      listeners.splice(index, 1);
      if (listeners.length === 0) {
        delete this._events[event];
      }
    }
    return this;
  }

  /**
   * Remove all listeners for the given event, or all events if no event specified
   */
  removeAllListeners<K extends keyof EventMap>(event?: K): this {
    if (event !== undefined) {
      delete this._events[event];
    } else {
      this._events = {};
    }
    return this;
  }

  /**
   * Emit an event with the given arguments
   */
  emit<K extends keyof EventMap>(event: K, ...args: EventMap[K]): boolean {
    const listeners = this._events[event];
    if (!listeners || listeners.length === 0) return false;

    // Listeners may subscribe or unsubscribe while we iterate
    const entries = [...listeners];

    const remaining = listeners.filter((entry) => !entry.once);
    if (remaining.length === 0) {
      delete this._events[event];
    } else if (remaining.length !== listeners.length) {
      this._events[event] = remaining;
    }

    for (const entry of entries) {
      entry.listener(...args);
    }

    return true;
  }

  /**
   * Get the number of listeners for the given event
   */
  listenerCount<K extends keyof EventMap>(event: K): number {
    return this._events[event]?.length ?? 0;
  }

  private _add<K extends keyof EventMap>(
    event: K,
    listener: (...args: EventMap[K]) => void,
    once: boolean,
  ): this {
    const listeners = this._events[event] ?? [];
    listeners.push({ listener, once });
    this._events[event] = listeners;
    return this;
  }
}
