/**
 * Map of event name to the argument tuple its listeners receive
 */
export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Minimal typed event emitter. Listeners run synchronously in registration
 * order; a throwing listener is reported to onListenerError and does not
 * stop the others.
 */
export class TypedEventEmitter<Events extends EventMap> {
  private listeners: { [E in keyof Events]?: Array<{ listener: Listener<Events[E]>; once: boolean }> } = {};

  constructor(private readonly onListenerError?: (error: unknown, event: keyof Events) => void) {}

  on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const list = this.listeners[event] || (this.listeners[event] = []);
    list.push({ listener, once: false });
    return this;
  }

  once<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const list = this.listeners[event] || (this.listeners[event] = []);
    list.push({ listener, once: true });
    return this;
  }

  off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const list = this.listeners[event];
    if (!list) return this;

    const index = list.findIndex((l) => l.listener === listener);
    if (index >= 0) {
      list.splice(index, 1);
    }
    return this;
  }

  emit<E extends keyof Events>(event: E, ...args: Events[E]): void {
    const list = this.listeners[event];
    if (!list) return;

    // Drop once-listeners before calling so re-entrant emits don't fire them twice
    this.listeners[event] = list.filter((l) => !l.once);
    for (const { listener } of list) {
      try {
        listener(...args);
      } catch (error) {
        this.onListenerError?.(error, event);
      }
    }
  }

  /**
   * Subscribe and get back an unsubscribe function
   */
  subscribe<E extends keyof Events>(event: E, listener: Listener<Events[E]>): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  listenerCount<E extends keyof Events>(event: E): number {
    return this.listeners[event]?.length ?? 0;
  }

  removeAllListeners(): void {
    this.listeners = {};
  }
}
