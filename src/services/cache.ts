/**
 * Simple in-memory cache with TTL
 *
 * One instance per app. Entries are dropped on read once expired, and a
 * background sweep clears the rest. The sweep timer never keeps the process
 * alive on its own.
 */

import type { WorldEvent, WorldEventSink } from '../realtime/events.js';

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export class MemoryCache<V> {
  private cache = new Map<string, CacheEntry<V>>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(cleanupMs = 30000) {
    this.cleanupInterval = setInterval(() => this.cleanup(), cleanupMs);
    this.cleanupInterval.unref();
  }

  /**
   * Get cached value or null if expired/missing
   */
  get(key: string): V | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    return entry.data;
  }

  /**
   * Set value with TTL in seconds
   */
  set(key: string, data: V, ttlSeconds: number): void {
    this.cache.set(key, {
      data,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  /**
   * Returns the cached value, or calls the getter and caches its result
   */
  getOrSet(key: string, ttlSeconds: number, getter: () => V): V {
    const cached = this.get(key);
    if (cached !== null) {
      return cached;
    }

    const data = getter();
    this.set(key, data, ttlSeconds);
    return data;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache.entries()) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}

// Cache key helpers
export const CACHE_KEYS = {
  stats: () => 'world:stats',
} as const;

/** Drops derived views whenever the world changes. */
export function invalidateOnEvents<V>(cache: MemoryCache<V>): WorldEventSink {
  return {
    emit(event: WorldEvent) {
      // Live locations never feed the stats view.
      if (event.type === 'user_location_updated') return;
      cache.delete(CACHE_KEYS.stats());
    },
  };
}
