type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerTable<Events extends { [K in keyof Events]: unknown[] }> = {
  [K in keyof Events]?: Set<Listener<Events[K]>>;
};

/** Minimal typed event hub; listeners run synchronously in subscription order. */
export class Emitter<Events extends { [K in keyof Events]: unknown[] }> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(type: K, listener: Listener<Events[K]>): () => void {
    const set = this.listeners[type] ?? new Set<Listener<Events[K]>>();
    this.listeners[type] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof Events>(type: K, ...args: Events[K]): void {
    const set = this.listeners[type];
    if (!set) return;
    for (const listener of [...set]) listener(...args);
  }

  clear(): void {
    this.listeners = {};
  }
}
