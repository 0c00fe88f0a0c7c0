/**
 * Minimal typed event emitter. `Events` maps each event name to the tuple of
 * arguments its listeners receive.
 */
export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerTable<Events extends EventMap> = {
  [K in keyof Events]?: Array<Listener<Events[K]>>;
};

export class EventEmitter<Events extends EventMap> {
  private listeners: ListenerTable<Events> = {};

  public on<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const existing = this.listeners[event];
    if (existing) {
      existing.push(listener);
    } else {
      this.listeners[event] = [listener];
    }
    return this;
  }

  public off<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const listeners = this.listeners[event];
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  public once<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const onceWrapper = (...args: Events[K]) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const listeners = this.listeners[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }

  public removeAllListeners(event?: keyof Events): this {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
    return this;
  }

  public listenerCount(event: keyof Events): number {
    return this.listeners[event]?.length ?? 0;
  }
}
