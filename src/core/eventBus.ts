/**
 * Typed event bus for chunk lifecycle events.
 * Zero-dependency pub/sub with type safety.
 */

import type { ChunkCoord } from '../types';

type Listener<T> = (payload: T) => void;

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners = new Map<keyof EventMap, Set<Listener<never>>>();

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    const listeners = set;
    listeners.add(listener);

    // Return unsubscribe function
    return () => {
      listeners.delete(listener);
      if (listeners.size === 0) this.listeners.delete(event);
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    for (const listener of [...set]) {
      (listener as Listener<EventMap[K]>)(payload);
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    this.listeners.delete(event);
  }

  listenerCount<K extends keyof EventMap>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  clear(): void {
    this.listeners.clear();
  }
}

// ── World Event Map ─────────────────────────────────────────────

export interface WorldEventMap {
  chunk_loaded: ChunkCoord & { quads: number };
  chunk_unloaded: ChunkCoord;
  chunk_load_failed: ChunkCoord & { reason: string };
}

/** Singleton world event bus. */
export const worldEvents = new EventBus<WorldEventMap>();
