/**
 * Unified Cache Service
 *
 * Coordinates L1 (memory cache) and an optional L2 (Redis) behind the
 * get / set / invalidate / invalidatePrefix contract used by the read path.
 *
 * Data flow:
 * - GET: L1 -> L2 (backfilling L1 with the entry's remaining TTL)
 * - SET: serialize once, write both layers
 * - INVALIDATE: clear both layers, record the invalidation for fill fences
 *
 * Failures in either layer are absorbed: a failed get is a miss, a failed
 * set is a logged no-op. Callers always fall back to the store.
 *
 * An invalidation that could not reach L2 (unavailable or erroring) is
 * remembered. Until it ages out, any L2 entry it covers that was stored
 * at or before it is treated as a miss, so a recovered L2 cannot serve a
 * value older than a completed write.
 */

import { MemoryCacheService } from '../memory-cache.service.js';
import { createServiceLogger } from '../logger.service.js';
import {
  isEntryLive,
  type AggregatedCacheStats,
  type CacheHealth,
  type CacheLayer,
  type CacheSetOptions,
  type FillFence,
  type StoredEntry,
} from './cache.types.js';

const logger = createServiceLogger('cache-service');

interface InvalidationRecord {
  generation: number;
  at: number;
  key?: string;
  prefix?: string;
}

export interface CacheServiceOptions {
  l1?: MemoryCacheService;
  l2?: CacheLayer | null;
  /**
   * How long invalidations are remembered for fence checks. A fence older
   * than this is treated as broken.
   */
  fenceWindowMs?: number;
}

function covers(record: InvalidationRecord, key: string): boolean {
  return record.key === key || (record.prefix !== undefined && key.startsWith(record.prefix));
}

// =============================================================================
// Unified Cache Service Class
// =============================================================================

export class CacheService {
  private readonly l1Cache: MemoryCacheService;
  private readonly l2Cache: CacheLayer | null;
  private readonly fenceWindowMs: number;

  private generation = 0;
  private invalidations: InvalidationRecord[] = [];
  private missedL2Invalidations: InvalidationRecord[] = [];
  /** Longest TTL written or read through L2; bounds how long missed invalidations matter */
  private longestTtlMs = 0;

  private unifiedStats = {
    l1Hits: 0,
    l2Hits: 0,
    totalMisses: 0,
    fencedWrites: 0,
    staleL2Rejections: 0,
    errors: 0,
  };

  constructor(options: CacheServiceOptions = {}) {
    this.l1Cache = options.l1 ?? new MemoryCacheService();
    this.l2Cache = options.l2 ?? null;
    this.fenceWindowMs = options.fenceWindowMs ?? 120_000;
  }

  get memory(): MemoryCacheService {
    return this.l1Cache;
  }

  // =============================================================================
  // Core Operations
  // =============================================================================

  /**
   * Get a value. Expired and missing keys both return null.
   */
  async get<T>(key: string): Promise<T | null> {
    try {
      const l1Entry = this.l1Cache.get(key);
      if (l1Entry) {
        const value = this.decode<T>(key, l1Entry);
        if (value !== null) {
          this.unifiedStats.l1Hits++;
          return value;
        }
      }

      const l2 = this.availableL2();
      if (l2) {
        const l2Entry = await l2.get(key);
        if (l2Entry && isEntryLive(l2Entry) && !this.isStaleInL2(key, l2Entry)) {
          const value = this.decode<T>(key, l2Entry);
          if (value !== null) {
            this.unifiedStats.l2Hits++;
            // Backfill keeps the original deadline
            this.l1Cache.set(key, l2Entry);
            return value;
          }
        }
      }
    } catch (error) {
      this.unifiedStats.errors++;
      logger.debug({ error, key }, 'Cache get failed, treating as miss');
    }

    this.unifiedStats.totalMisses++;
    return null;
  }

  /**
   * Set a value in both layers (last writer wins).
   *
   * @returns false when the write was skipped (fenced or failed)
   */
  async set<T>(key: string, value: T, ttlSeconds: number, options: CacheSetOptions = {}): Promise<boolean> {
    if (ttlSeconds <= 0) {
      return false;
    }

    if (options.fence && this.isFenceBroken(options.fence, key)) {
      this.unifiedStats.fencedWrites++;
      logger.debug({ key }, 'Cache set dropped: key invalidated during fill');
      return false;
    }

    this.longestTtlMs = Math.max(this.longestTtlMs, ttlSeconds * 1000);

    let entry: StoredEntry;
    try {
      entry = {
        payload: JSON.stringify(value),
        storedAt: Date.now(),
        ttlSeconds,
      };
    } catch (error) {
      this.unifiedStats.errors++;
      logger.debug({ error, key }, 'Cache value not serializable, skipped');
      return false;
    }

    try {
      this.l1Cache.set(key, entry);
    } catch (error) {
      this.unifiedStats.errors++;
      logger.debug({ error, key }, 'L1 cache set failed (non-critical)');
      return false;
    }

    const l2 = this.availableL2();
    if (l2) {
      try {
        await l2.set(key, entry);
      } catch (error) {
        this.unifiedStats.errors++;
        logger.debug({ error, key }, 'L2 cache set failed (non-critical)');
      }
    }

    return true;
  }

  /**
   * Remove a key from all layers.
   */
  async invalidate(key: string): Promise<void> {
    const record = this.recordInvalidation({ key });

    try {
      this.l1Cache.delete(key);
    } catch (error) {
      this.unifiedStats.errors++;
      logger.debug({ error, key }, 'L1 cache delete failed');
    }

    if (!this.l2Cache) return;
    const l2 = this.availableL2();
    if (!l2) {
      this.missedL2Invalidations.push(record);
      return;
    }
    try {
      await l2.delete(key);
    } catch (error) {
      this.unifiedStats.errors++;
      this.missedL2Invalidations.push(record);
      logger.warn({ error, key }, 'L2 cache delete failed, older L2 entry will be ignored');
    }
  }

  /**
   * Remove every key starting with the prefix from all layers.
   */
  async invalidatePrefix(prefix: string): Promise<number> {
    const record = this.recordInvalidation({ prefix });

    let count = 0;
    try {
      count += this.l1Cache.invalidate(prefix);
    } catch (error) {
      this.unifiedStats.errors++;
      logger.debug({ error, prefix }, 'L1 prefix invalidation failed');
    }

    if (!this.l2Cache) return count;
    const l2 = this.availableL2();
    if (!l2) {
      this.missedL2Invalidations.push(record);
      return count;
    }
    try {
      count += await l2.invalidatePattern(prefix);
      if (prefix === '') {
        // L2 is empty: nothing older can resurface
        this.missedL2Invalidations = [];
      }
    } catch (error) {
      this.unifiedStats.errors++;
      this.missedL2Invalidations.push(record);
      logger.warn({ error, prefix }, 'L2 prefix invalidation failed, older L2 entries will be ignored');
    }

    return count;
  }

  /**
   * Clear everything (benchmark initialize, maintenance).
   */
  async invalidateAll(): Promise<void> {
    await this.invalidatePrefix('');
    this.l1Cache.invalidateAll();
  }

  // =============================================================================
  // Fill Fences
  // =============================================================================

  /**
   * Capture the invalidation generation before reading the store.
   */
  openFence(): FillFence {
    return { generation: this.generation, openedAt: Date.now() };
  }

  /**
   * True when an invalidation covering `key` happened after the fence opened,
   * or the fence is too old to be checked.
   */
  isFenceBroken(fence: FillFence, key: string): boolean {
    if (Date.now() - fence.openedAt > this.fenceWindowMs) {
      return true;
    }
    if (fence.generation === this.generation) {
      return false;
    }
    return this.invalidations.some((record) => record.generation > fence.generation && covers(record, key));
  }

  private recordInvalidation(target: { key: string } | { prefix: string }): InvalidationRecord {
    const now = Date.now();
    this.generation++;
    const record: InvalidationRecord = { generation: this.generation, at: now, ...target };
    this.invalidations.push(record);

    const cutoff = now - this.fenceWindowMs;
    const firstLive = this.invalidations.findIndex((entry) => entry.at >= cutoff);
    if (firstLive > 0) {
      this.invalidations.splice(0, firstLive);
    }

    // Anything stored before now - longestTtl has expired on its own
    const staleCutoff = now - this.longestTtlMs;
    this.missedL2Invalidations = this.missedL2Invalidations.filter((entry) => entry.at >= staleCutoff);

    return record;
  }

  /**
   * True when an invalidation that never reached L2 covers this entry.
   */
  private isStaleInL2(key: string, entry: StoredEntry): boolean {
    this.longestTtlMs = Math.max(this.longestTtlMs, entry.ttlSeconds * 1000);
    const stale = this.missedL2Invalidations.some(
      (record) => entry.storedAt <= record.at && covers(record, key)
    );
    if (stale) {
      this.unifiedStats.staleL2Rejections++;
      logger.debug({ key, storedAt: entry.storedAt }, 'L2 entry predates a missed invalidation, ignored');
    }
    return stale;
  }

  // =============================================================================
  // Stats & Health
  // =============================================================================

  getStats(): AggregatedCacheStats {
    const l1Stats = this.l1Cache.getStats();
    const totalHits = this.unifiedStats.l1Hits + this.unifiedStats.l2Hits;
    const totalRequests = totalHits + this.unifiedStats.totalMisses;

    return {
      l1: {
        hits: l1Stats.hits,
        misses: l1Stats.misses,
        size: l1Stats.size,
        evictions: l1Stats.evictions,
        maxSizeBytes: l1Stats.maxSizeBytes,
        utilizationPercent: l1Stats.utilizationPercent,
      },
      l2: this.l2Cache
        ? { ...this.l2Cache.getStats(), name: this.l2Cache.name, connected: this.l2Cache.isAvailable() }
        : null,
      combined: {
        hitRate: totalRequests > 0 ? totalHits / totalRequests : 0,
        totalHits,
        totalMisses: this.unifiedStats.totalMisses,
        fencedWrites: this.unifiedStats.fencedWrites,
        staleL2Rejections: this.unifiedStats.staleL2Rejections,
      },
    };
  }

  getHealth(): CacheHealth {
    if (!this.l2Cache) {
      return { status: 'healthy', l1Available: true, l2Available: false, message: 'L1 only' };
    }
    const l2Available = this.l2Cache.isAvailable();
    return l2Available
      ? { status: 'healthy', l1Available: true, l2Available }
      : { status: 'degraded', l1Available: true, l2Available, message: 'L2 unavailable, serving from L1' };
  }

  // =============================================================================
  // Private Helpers
  // =============================================================================

  private availableL2(): CacheLayer | null {
    return this.l2Cache && this.l2Cache.isAvailable() ? this.l2Cache : null;
  }

  private decode<T>(key: string, entry: StoredEntry): T | null {
    try {
      return JSON.parse(entry.payload) as T;
    } catch (error) {
      this.unifiedStats.errors++;
      logger.debug({ error, key }, 'Cache payload unreadable, treating as miss');
      return null;
    }
  }
}
