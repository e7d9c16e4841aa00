// ─────────────────────────────────────────────
//  Typed Event Bus
//  Generic listener registry keyed by an event map.
//  The shared `EventBus` instance carries process-wide
//  notifications (log fan-out); sessions own their own buses.
// ─────────────────────────────────────────────

type Listener<T> = (payload: T) => void;

type ListenerTable<TMap> = {
  [K in keyof TMap]?: Listener<TMap[K]>[];
};

export class TypedEventBus<TMap> {
  private listeners: ListenerTable<TMap> = {};

  on<K extends keyof TMap>(event: K, listener: Listener<TMap[K]>): void {
    const arr = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
  }

  off<K extends keyof TMap>(event: K, listener: Listener<TMap[K]>): void {
    const arr = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof TMap>(event: K, payload: TMap[K]): void {
    const arr = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Number of listeners currently registered for an event. */
  listenerCount<K extends keyof TMap>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  /** Remove all listeners (useful for session teardown) */
  clear(): void {
    this.listeners = {};
  }
}

/** Process-wide notifications, independent of any session */
export interface GlobalEventMap {
  logMessage: { text: string; cls: string };
}

/** Singleton bus for log fan-out — import this directly */
export const EventBus = new TypedEventBus<GlobalEventMap>();
