type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * A minimal typed event emitter. `Events` maps each event name to the tuple
 * of arguments its listeners receive.
 */
export class EventEmitter<Events extends Record<string, unknown[]>> {
  #events: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, callback: Listener<Events[K]>): void {
    let callbacks = this.#events[event];
    if (!callbacks) {
      callbacks = new Set();
      this.#events[event] = callbacks;
    }
    callbacks.add(callback);
  }

  off<K extends keyof Events>(event: K, callback: Listener<Events[K]>): void {
    this.#events[event]?.delete(callback);
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const callbacks = this.#events[event];
    if (!callbacks) {
      return;
    }
    // Listeners may unsubscribe themselves while being called.
    for (const callback of [...callbacks]) {
      callback(...args);
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.#events[event]?.size ?? 0;
  }
}
