/**
 * Result Cache
 *
 * TTL memoisation of provider responses keyed by (asset, kind).
 * Each kind has its own time-to-live; expired entries are dropped on lookup
 * or by `clearExpired()`. No size bound: the asset universe is fixed.
 */

import { debug, info } from "../utils/logger.js";
import type { MarketMetrics, PricePoint } from "../utils/types.js";

export interface CacheValueMap {
  ohlc: readonly PricePoint[];
  marketMetrics: MarketMetrics;
  price: number;
  volume: number;
}

export type CacheKind = keyof CacheValueMap;

export type CacheTtls = Record<CacheKind, number>;

export const DEFAULT_CACHE_TTLS: CacheTtls = {
  ohlc: 30 * 60 * 1000,
  marketMetrics: 15 * 60 * 1000,
  price: 2 * 60 * 1000,
  volume: 5 * 60 * 1000,
};

const CACHE_KINDS: readonly CacheKind[] = ["ohlc", "marketMetrics", "price", "volume"];

interface CacheEntry<K extends CacheKind> {
  value: CacheValueMap[K];
  storedAt: number;
}

type CacheStores = { [K in CacheKind]: Map<string, CacheEntry<K>> };

export interface CacheStatistics {
  totalRequests: number;
  hits: number;
  misses: number;
  hitRatio: number;
  sizes: Record<CacheKind, number>;
}

export interface ResultCacheOptions {
  ttls?: Partial<CacheTtls>;
  now?: () => number;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

function formatAge(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  return `${Math.floor(minutes / 60)}h ago`;
}

export class ResultCache {
  private readonly ttls: CacheTtls;
  private readonly now: () => number;
  private readonly stores: CacheStores = {
    ohlc: new Map(),
    marketMetrics: new Map(),
    price: new Map(),
    volume: new Map(),
  };

  private hits = 0;
  private misses = 0;

  constructor(options: ResultCacheOptions = {}) {
    this.ttls = { ...DEFAULT_CACHE_TTLS, ...options.ttls };
    this.now = options.now ?? Date.now;
  }

  get<K extends CacheKind>(key: string, kind: K): CacheValueMap[K] | undefined {
    const normalized = normalizeKey(key);
    if (!normalized) return undefined;

    const store: Map<string, CacheEntry<K>> = this.stores[kind];
    const entry = store.get(normalized);

    if (!entry) {
      this.misses++;
      debug("ResultCache", `${kind} cache miss for ${normalized}`);
      return undefined;
    }

    const age = this.now() - entry.storedAt;
    if (age > this.ttls[kind]) {
      this.misses++;
      store.delete(normalized);
      debug("ResultCache", `${kind} cache expired for ${normalized} (age: ${formatAge(age)})`);
      return undefined;
    }

    this.hits++;
    debug("ResultCache", `${kind} cache hit for ${normalized} (cached ${formatAge(age)})`);
    return entry.value;
  }

  put<K extends CacheKind>(key: string, kind: K, value: CacheValueMap[K]): void {
    const normalized = normalizeKey(key);
    if (!normalized || !isCacheable(kind, value)) {
      return;
    }

    const store: Map<string, CacheEntry<K>> = this.stores[kind];
    store.set(normalized, { value, storedAt: this.now() });
  }

  /**
   * Remove every kind of entry for one asset
   */
  clear(key: string): void {
    const normalized = normalizeKey(key);
    for (const kind of CACHE_KINDS) {
      this.stores[kind].delete(normalized);
    }
    info("ResultCache", `Cleared all cached data for ${normalized}`);
  }

  /**
   * Sweep expired entries of every kind. Returns the number removed.
   */
  clearExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const kind of CACHE_KINDS) {
      const store: Map<string, { storedAt: number }> = this.stores[kind];
      for (const [key, entry] of store) {
        if (now - entry.storedAt > this.ttls[kind]) {
          store.delete(key);
          removed++;
        }
      }
    }

    if (removed > 0) {
      debug("ResultCache", `Cleared ${removed} expired cache entries`);
    }
    return removed;
  }

  stats(): CacheStatistics {
    const totalRequests = this.hits + this.misses;
    return {
      totalRequests,
      hits: this.hits,
      misses: this.misses,
      hitRatio: totalRequests > 0 ? this.hits / totalRequests : 0,
      sizes: {
        ohlc: this.stores.ohlc.size,
        marketMetrics: this.stores.marketMetrics.size,
        price: this.stores.price.size,
        volume: this.stores.volume.size,
      },
    };
  }
}

function isCacheable<K extends CacheKind>(kind: K, value: CacheValueMap[K]): boolean {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0;
  }
  if (kind === "ohlc" && Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
}
