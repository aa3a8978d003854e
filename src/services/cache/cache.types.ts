/**
 * Cache Types
 *
 * Shared interfaces for the two-layer read-path cache.
 * Defines contracts for cache layers, the unified cache service
 * and the key layout used for targeted invalidation.
 */

import type { ImageMimeType } from '../../types/feed.types.js';

// =============================================================================
// Stored Entry
// =============================================================================

/**
 * What a cache layer physically holds for one key.
 * The value is serialized once on write, so readers always get a fresh copy
 * and an entry is only ever replaced whole.
 */
export interface StoredEntry {
  /** JSON-serialized value */
  payload: string;
  /** Epoch milliseconds when the entry was written */
  storedAt: number;
  ttlSeconds: number;
}

/**
 * Epoch milliseconds at which an entry stops being visible.
 */
export function entryExpiresAt(entry: StoredEntry): number {
  return entry.storedAt + entry.ttlSeconds * 1000;
}

/**
 * An entry is visible only while now < storedAt + ttl.
 */
export function isEntryLive(entry: StoredEntry, now: number = Date.now()): boolean {
  return now < entryExpiresAt(entry);
}

// =============================================================================
// Core Cache Layer Interface
// =============================================================================

/**
 * Interface that shared cache backends implement (Redis in production,
 * in-process fakes in tests).
 */
export interface CacheLayer {
  /** Unique identifier for this cache layer */
  readonly name: string;

  get(key: string): Promise<StoredEntry | null>;
  set(key: string, entry: StoredEntry): Promise<void>;
  delete(key: string): Promise<boolean>;

  /** Delete every key starting with the prefix */
  invalidatePattern(prefix: string): Promise<number>;

  isAvailable(): boolean;
  getStats(): CacheLayerStats;
}

// =============================================================================
// Cache Statistics
// =============================================================================

export interface CacheLayerStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  errors: number;
}

export interface AggregatedCacheStats {
  l1: {
    hits: number;
    misses: number;
    size: number;
    evictions: number;
    maxSizeBytes: number;
    utilizationPercent: number;
  };
  l2: (CacheLayerStats & { name: string; connected: boolean }) | null;
  combined: {
    hitRate: number;
    totalHits: number;
    totalMisses: number;
    /** Writes dropped because an invalidation overlapped the fill */
    fencedWrites: number;
    /** L2 entries ignored because an invalidation never reached L2 */
    staleL2Rejections: number;
  };
}

export interface CacheHealth {
  status: 'healthy' | 'degraded';
  l1Available: boolean;
  l2Available: boolean;
  message?: string;
}

// =============================================================================
// Fill Fence
// =============================================================================

/**
 * Captured before a reader goes to the store. A cache write carrying a fence
 * is dropped when an invalidation matching its key happened after the fence
 * was opened, so pre-write data cannot be re-cached after its invalidation.
 */
export interface FillFence {
  readonly generation: number;
  readonly openedAt: number;
}

export interface CacheSetOptions {
  fence?: FillFence;
}

// =============================================================================
// Cache Key Patterns
// =============================================================================

/**
 * Cache key prefixes for different data types.
 * Used for prefix-based invalidation.
 */
export const CACHE_KEY_PREFIX = {
  /** Session token -> identity */
  IDENTITY_SESSION: 'identity:session',

  /** Credential digest -> identity */
  IDENTITY_LOGIN: 'identity:login',

  /** Enriched post */
  POST: 'post',

  /** Separately cached comment count (reserved) */
  COMMENT_COUNT: 'post:comment-count',

  /** Global feed pages */
  FEED_PAGE: 'feed:page',

  /** Global feed first pages */
  FEED_PAGE_HEAD: 'feed:page:head',

  /** Per-user feed pages */
  USER_FEED: 'feed:user',

  /** Image bytes and negative markers */
  IMAGE: 'image',

  /** User page stats */
  PROFILE: 'profile',

  /** Account name -> user id */
  ACCOUNT: 'account',
} as const;

/**
 * Generate cache keys for the read path.
 */
export const CacheKeys = {
  /**
   * Format: identity:session:{sha256(token)}
   */
  sessionIdentity: (tokenDigest: string): string => {
    return `${CACHE_KEY_PREFIX.IDENTITY_SESSION}:${tokenDigest}`;
  },

  /**
   * Format: identity:login:{sha256(account:password)}
   */
  loginIdentity: (credentialDigest: string): string => {
    return `${CACHE_KEY_PREFIX.IDENTITY_LOGIN}:${credentialDigest}`;
  },

  /**
   * Format: post:{postId}
   */
  post: (postId: number): string => {
    return `${CACHE_KEY_PREFIX.POST}:${postId}`;
  },

  /**
   * Format: post:comment-count:{postId}
   */
  commentCount: (postId: number): string => {
    return `${CACHE_KEY_PREFIX.COMMENT_COUNT}:${postId}`;
  },

  /**
   * Format: feed:page:head:{size} or feed:page:after:{cursor}:{size}
   */
  feedPage: (cursor: string | null, pageSize: number): string => {
    return cursor === null
      ? `${CACHE_KEY_PREFIX.FEED_PAGE_HEAD}:${pageSize}`
      : `${CACHE_KEY_PREFIX.FEED_PAGE}:after:${cursor}:${pageSize}`;
  },

  /**
   * Format: feed:user:{userId}:head:{size} or feed:user:{userId}:after:{cursor}:{size}
   */
  userFeedPage: (userId: number, cursor: string | null, pageSize: number): string => {
    return cursor === null
      ? `${CACHE_KEY_PREFIX.USER_FEED}:${userId}:head:${pageSize}`
      : `${CACHE_KEY_PREFIX.USER_FEED}:${userId}:after:${cursor}:${pageSize}`;
  },

  /**
   * Prefix covering every feed page of one user.
   */
  userFeedPrefix: (userId: number): string => {
    return `${CACHE_KEY_PREFIX.USER_FEED}:${userId}:`;
  },

  /**
   * Format: image:{imageId}
   */
  image: (imageId: number): string => {
    return `${CACHE_KEY_PREFIX.IMAGE}:${imageId}`;
  },

  /**
   * Format: profile:{userId}
   */
  profile: (userId: number): string => {
    return `${CACHE_KEY_PREFIX.PROFILE}:${userId}`;
  },

  /**
   * Format: account:{accountName}
   */
  account: (accountName: string): string => {
    return `${CACHE_KEY_PREFIX.ACCOUNT}:${accountName}`;
  },
};

// =============================================================================
// Image Cache Types
// =============================================================================

/**
 * Cached image value. A `found: false` entry is a short-lived negative marker.
 */
export type CachedImageEntry =
  | {
      found: true;
      mimeType: ImageMimeType;
      /** Base64 encoded bytes */
      data: string;
    }
  | { found: false };

export interface CachedImage {
  mimeType: ImageMimeType;
  data: Buffer;
}
