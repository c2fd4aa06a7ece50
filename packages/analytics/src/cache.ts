/**
 * Result Cache
 * Time-bounded memoization of (channel, count) -> recent items.
 * Expired entries read as absent and are dropped on read; capacity is
 * bounded with least-recently-used eviction.
 */

import type { ContentItem } from "./items.js";

export const DEFAULT_CACHE_TTL_MS = 60_000;
export const DEFAULT_CACHE_MAX_ENTRIES = 256;

export interface ResultCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

interface CacheEntry {
  storedAt: number;
  items: readonly ContentItem[];
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
  }

  private key(channelId: string, count: number): string {
    return `${channelId}\u0000${count}`;
  }

  get(channelId: string, count: number): readonly ContentItem[] | undefined {
    const key = this.key(channelId, count);
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.items;
  }

  put(channelId: string, count: number, items: readonly ContentItem[]): void {
    const key = this.key(channelId, count);
    this.entries.delete(key);
    this.entries.set(key, { storedAt: this.now(), items });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
