/**
 * Redis Adapter Service
 *
 * Implements the CacheLayer interface for Redis (the shared L2 layer).
 *
 * Key features:
 * - Auto-reconnect with bounded backoff
 * - Graceful degradation for reads and writes (null / no-op on errors)
 * - Deletes reject on failure, so the caller knows the key may still be live
 * - Entries stored as JSON envelopes carrying their write time and TTL
 * - SCAN-based prefix invalidation (non-blocking)
 */

import { createClient } from 'redis';
import { createServiceLogger } from '../logger.service.js';
import {
  entryExpiresAt,
  isEntryLive,
  type CacheLayer,
  type CacheLayerStats,
  type StoredEntry,
} from './cache.types.js';

const logger = createServiceLogger('redis-adapter');

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis connection configuration.
 */
export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  /** Maximum reconnection attempts (default: 10) */
  maxRetries: number;
  /** Delay step between reconnection attempts in ms (default: 1000) */
  retryDelayMs: number;
  /** Connection timeout in ms (default: 5000) */
  connectTimeoutMs: number;
}

export const DEFAULT_REDIS_CONFIG: RedisConfig = {
  host: '127.0.0.1',
  port: 6379,
  db: 0,
  maxRetries: 10,
  retryDelayMs: 1000,
  connectTimeoutMs: 5000,
};

function isStoredEntry(value: unknown): value is StoredEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'payload' in value && typeof value.payload === 'string' &&
    'storedAt' in value && typeof value.storedAt === 'number' &&
    'ttlSeconds' in value && typeof value.ttlSeconds === 'number'
  );
}

// =============================================================================
// Redis Adapter Class
// =============================================================================

export class RedisAdapterService implements CacheLayer {
  readonly name = 'redis-l2';

  private client: RedisClient | null = null;
  private connected = false;
  private connecting = false;
  private config: RedisConfig;

  private stats: CacheLayerStats = {
    hits: 0,
    misses: 0,
    sets: 0,
    deletes: 0,
    errors: 0,
  };

  constructor(config: Partial<RedisConfig> = {}) {
    this.config = { ...DEFAULT_REDIS_CONFIG, ...config };
  }

  // =============================================================================
  // Connection Management
  // =============================================================================

  /**
   * Initialize Redis connection.
   * Non-blocking: logs a warning and continues with L1 only if connection fails.
   */
  async connect(): Promise<void> {
    if (this.connected || this.connecting) {
      return;
    }

    this.connecting = true;

    try {
      const client = createClient({
        url: this.buildConnectionUrl(),
        database: this.config.db,
        socket: {
          connectTimeout: this.config.connectTimeoutMs,
          reconnectStrategy: (retries) => {
            if (retries >= this.config.maxRetries) {
              logger.error({ retries }, 'Redis max reconnection attempts reached');
              return new Error('Max retries reached');
            }
            const delay = Math.min(retries * this.config.retryDelayMs, 10000);
            logger.debug({ retries, delay }, 'Redis reconnecting');
            return delay;
          },
        },
      });

      client.on('ready', () => {
        this.connected = true;
        logger.debug('Redis ready');
      });

      client.on('error', (err) => {
        this.stats.errors++;
        // Only log once per disconnect event
        if (this.connected) {
          logger.error({ err }, 'Redis error');
        }
        this.connected = false;
      });

      client.on('end', () => {
        this.connected = false;
        logger.info('Redis connection closed');
      });

      await client.connect();

      this.client = client;
      this.connected = true;
      logger.info({ host: this.config.host, port: this.config.port }, 'Redis initialized');
    } catch (error) {
      logger.warn({ error }, 'Redis connection failed - caching degraded to L1 only');
      this.connected = false;
      this.client = null;
    } finally {
      this.connecting = false;
    }
  }

  /**
   * Gracefully disconnect from Redis.
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connected = false;

    if (client) {
      try {
        await client.quit();
      } catch (error) {
        logger.debug({ error }, 'Redis QUIT failed, forcing disconnect');
        await client.disconnect();
      }
    }

    logger.info('Redis disconnected');
  }

  /**
   * Check if Redis is currently available.
   */
  isAvailable(): boolean {
    return this.connected && this.client !== null;
  }

  getStats(): CacheLayerStats {
    return { ...this.stats };
  }

  // =============================================================================
  // Core Key-Value Operations
  // =============================================================================

  /**
   * Get an entry from Redis.
   * Returns null if not found, expired, malformed or on error.
   */
  async get(key: string): Promise<StoredEntry | null> {
    const client = this.availableClient();
    if (!client) {
      this.stats.misses++;
      return null;
    }

    try {
      const raw = await client.get(key);

      if (raw === null) {
        this.stats.misses++;
        return null;
      }

      const parsed: unknown = JSON.parse(raw);
      if (!isStoredEntry(parsed) || !isEntryLive(parsed)) {
        this.stats.misses++;
        return null;
      }

      this.stats.hits++;
      return parsed;
    } catch (error) {
      this.stats.errors++;
      logger.debug({ error, key }, 'Redis GET failed');
      this.handleConnectionError(error);
      return null;
    }
  }

  /**
   * Store an entry, expiring at the entry's own deadline.
   * Fails silently on error.
   */
  async set(key: string, entry: StoredEntry): Promise<void> {
    const client = this.availableClient();
    if (!client) return;

    const remainingMs = entryExpiresAt(entry) - Date.now();
    if (remainingMs <= 0) return;

    try {
      await client.set(key, JSON.stringify(entry), { PX: remainingMs });
      this.stats.sets++;
    } catch (error) {
      this.stats.errors++;
      logger.debug({ error, key }, 'Redis SET failed');
      this.handleConnectionError(error);
    }
  }

  /**
   * Delete a key from Redis.
   * @throws When Redis is unreachable or the command fails
   */
  async delete(key: string): Promise<boolean> {
    const client = this.requireClient();

    try {
      const result = await client.del(key);
      if (result > 0) {
        this.stats.deletes++;
        return true;
      }
      return false;
    } catch (error) {
      this.stats.errors++;
      logger.debug({ error, key }, 'Redis DEL failed');
      this.handleConnectionError(error);
      throw error;
    }
  }

  /**
   * Invalidate all keys starting with a prefix.
   * Uses SCAN for production safety (non-blocking).
   * @throws When Redis is unreachable or the scan fails part way
   */
  async invalidatePattern(prefix: string): Promise<number> {
    const client = this.requireClient();

    try {
      let deletedCount = 0;
      const scanPattern = `${prefix.replace(/[*?[\]\\]/g, '\\$&')}*`;

      for await (const key of client.scanIterator({ MATCH: scanPattern, COUNT: 100 })) {
        deletedCount += await client.del(key);
      }

      if (deletedCount > 0) {
        this.stats.deletes += deletedCount;
        logger.debug({ prefix, deletedCount }, 'Redis prefix invalidation complete');
      }

      return deletedCount;
    } catch (error) {
      this.stats.errors++;
      logger.debug({ error, prefix }, 'Redis prefix invalidation failed');
      this.handleConnectionError(error);
      throw error;
    }
  }

  // =============================================================================
  // Private Helpers
  // =============================================================================

  private availableClient(): RedisClient | null {
    return this.connected ? this.client : null;
  }

  private requireClient(): RedisClient {
    const client = this.availableClient();
    if (!client) {
      throw new Error('Redis is not connected');
    }
    return client;
  }

  private buildConnectionUrl(): string {
    const { host, port, password } = this.config;
    if (password) {
      return `redis://:${encodeURIComponent(password)}@${host}:${port}`;
    }
    return `redis://${host}:${port}`;
  }

  private handleConnectionError(error: unknown): void {
    const isConnectionError =
      error instanceof Error &&
      (error.message.includes('ECONNREFUSED') ||
        error.message.includes('ECONNRESET') ||
        error.message.includes('ETIMEDOUT') ||
        error.message.includes('Socket closed unexpectedly') ||
        error.message.includes('The client is closed'));

    if (isConnectionError && this.connected) {
      this.connected = false;
      logger.warn('Redis connection lost, operations will fall back to L1 cache');
    }
  }
}
