/**
 * Typed listener registry for node events
 */

import { describeError } from './errors';

type Listener<T> = (payload: T) => void;
type AnyListener<Events> = (type: keyof Events, payload: Events[keyof Events]) => void;

export class EventHub<Events> {
  private listeners: { [K in keyof Events]?: Listener<Events[K]>[] } = {};
  private anyListeners: AnyListener<Events>[] = [];

  on<K extends keyof Events>(type: K, listener: Listener<Events[K]>): () => void {
    const current = this.listeners[type] ?? [];
    this.listeners[type] = [...current, listener];
    return () => {
      this.listeners[type] = (this.listeners[type] ?? []).filter(l => l !== listener);
    };
  }

  /** Subscribe to every event type */
  onAny(listener: AnyListener<Events>): () => void {
    this.anyListeners.push(listener);
    return () => {
      this.anyListeners = this.anyListeners.filter(l => l !== listener);
    };
  }

  emit<K extends keyof Events>(type: K, payload: Events[K]): void {
    for (const listener of this.listeners[type] ?? []) {
      this.invoke(() => listener(payload));
    }
    for (const listener of this.anyListeners) {
      this.invoke(() => listener(type, payload));
    }
  }

  private invoke(call: () => void): void {
    try {
      call();
    } catch (e) {
      console.error('[Events] Listener error:', describeError(e));
    }
  }
}
