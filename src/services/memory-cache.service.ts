/**
 * Memory Cache Service
 *
 * In-process L1 cache layer. Holds serialized entries so that every reader
 * gets its own copy and an entry is only ever replaced whole.
 *
 * Key features:
 * - TTL-based expiration (an entry at exactly storedAt + ttl is expired)
 * - Prefix-based invalidation
 * - Statistics tracking
 * - LRU eviction with configurable size limit
 */

import { createServiceLogger } from './logger.service.js';
import { entryExpiresAt, type StoredEntry } from './cache/cache.types.js';

const logger = createServiceLogger('memory-cache');

// =============================================================================
// Types
// =============================================================================

interface CacheEntry extends StoredEntry {
  expiresAt: number;
  sizeBytes: number;
}

export interface MemoryCacheStats {
  hits: number;
  misses: number;
  size: number;
  invalidations: number;
  totalBytes: number;
  evictions: number;
}

export interface MemoryCacheOptions {
  /** Maximum cache size in bytes (default 75MB) */
  maxSizeBytes?: number;
}

// =============================================================================
// Memory Cache Class
// =============================================================================

export class MemoryCacheService {
  /** Map iteration order doubles as the LRU order: oldest access first */
  private cache: Map<string, CacheEntry> = new Map();
  private stats: MemoryCacheStats = {
    hits: 0,
    misses: 0,
    size: 0,
    invalidations: 0,
    totalBytes: 0,
    evictions: 0,
  };
  private readonly maxSizeBytes: number;
  private cleanupIntervalId: NodeJS.Timeout | null = null;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxSizeBytes = options.maxSizeBytes ?? 75 * 1024 * 1024;
  }

  /**
   * Payloads are JS strings: two bytes per code unit.
   */
  private estimateSize(key: string, payload: string): number {
    return (key.length + payload.length) * 2 + 64;
  }

  /**
   * Evict least recently used entries until the new entry fits
   */
  private evictIfNeeded(newEntrySize: number): void {
    for (const [key, entry] of this.cache) {
      if (this.stats.totalBytes + newEntrySize <= this.maxSizeBytes) {
        break;
      }
      this.removeEntry(key, entry);
      this.stats.evictions++;
      logger.debug({ key }, 'Memory cache LRU eviction');
    }
  }

  private removeEntry(key: string, entry: CacheEntry): void {
    this.cache.delete(key);
    this.stats.totalBytes -= entry.sizeBytes;
    this.stats.size = this.cache.size;
  }

  /**
   * Get an entry from the cache.
   * Returns null if not found or expired.
   */
  get(key: string): StoredEntry | null {
    const entry = this.cache.get(key);

    if (!entry) {
      this.stats.misses++;
      return null;
    }

    if (Date.now() >= entry.expiresAt) {
      this.removeEntry(key, entry);
      this.stats.misses++;
      return null;
    }

    // Move to the most-recently-used end
    this.cache.delete(key);
    this.cache.set(key, entry);
    this.stats.hits++;
    return { payload: entry.payload, storedAt: entry.storedAt, ttlSeconds: entry.ttlSeconds };
  }

  /**
   * Store an entry, replacing any previous one under the key.
   */
  set(key: string, stored: StoredEntry): void {
    const sizeBytes = this.estimateSize(key, stored.payload);
    if (sizeBytes > this.maxSizeBytes) {
      logger.debug({ key, sizeBytes }, 'Memory cache entry larger than cache, skipped');
      this.delete(key);
      return;
    }

    const existing = this.cache.get(key);
    if (existing) {
      this.removeEntry(key, existing);
    }

    this.evictIfNeeded(sizeBytes);

    this.cache.set(key, {
      payload: stored.payload,
      storedAt: stored.storedAt,
      ttlSeconds: stored.ttlSeconds,
      expiresAt: entryExpiresAt(stored),
      sizeBytes,
    });
    this.stats.totalBytes += sizeBytes;
    this.stats.size = this.cache.size;
  }

  /**
   * Delete a specific key
   */
  delete(key: string): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;
    this.removeEntry(key, entry);
    this.stats.invalidations++;
    return true;
  }

  /**
   * Invalidate all keys starting with the prefix
   */
  invalidate(prefix: string): number {
    let count = 0;
    for (const [key, entry] of this.cache) {
      if (key.startsWith(prefix)) {
        this.removeEntry(key, entry);
        count++;
      }
    }
    if (count > 0) {
      this.stats.invalidations += count;
      logger.debug({ prefix, count }, 'Memory cache invalidated keys');
    }
    return count;
  }

  /**
   * Clear all cached data
   */
  invalidateAll(): void {
    const size = this.cache.size;
    this.cache.clear();
    this.stats.size = 0;
    this.stats.totalBytes = 0;
    this.stats.invalidations += size;
    logger.debug({ size }, 'Memory cache cleared');
  }

  /**
   * Get cache statistics
   */
  getStats(): MemoryCacheStats & { hitRate: number; maxSizeBytes: number; utilizationPercent: number } {
    const total = this.stats.hits + this.stats.misses;
    return {
      ...this.stats,
      hitRate: total > 0 ? this.stats.hits / total : 0,
      maxSizeBytes: this.maxSizeBytes,
      utilizationPercent: Math.round((this.stats.totalBytes / this.maxSizeBytes) * 100),
    };
  }

  /**
   * Remove expired entries
   */
  cleanup(): number {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) {
        this.removeEntry(key, entry);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug({ cleaned }, 'Memory cache cleanup');
    }

    return cleaned;
  }

  /**
   * Start periodic cleanup. The timer does not keep the process alive.
   */
  startCleanup(intervalMs: number = 300_000): void {
    if (this.cleanupIntervalId) return;
    this.cleanupIntervalId = setInterval(() => {
      this.cleanup();
    }, intervalMs);
    this.cleanupIntervalId.unref();
  }

  /**
   * Stop the cleanup interval. Call during graceful shutdown.
   */
  stopCleanup(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
  }
}
