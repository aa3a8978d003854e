/**
 * Photofeed read path
 *
 * createReadPathLayer() wires one instance of every component for the
 * lifetime of the application. Nothing here is a module singleton, so tests
 * and multiple layers in one process stay independent.
 */

import { createServiceLogger } from './services/logger.service.js';
import { CacheService } from './services/cache/cache.service.js';
import { MemoryCacheService } from './services/memory-cache.service.js';
import { RedisAdapterService } from './services/cache/redis-adapter.service.js';
import { ConnectionManager, type ConnectionFactory } from './services/database.service.js';
import { PgFeedStore, type FeedStore } from './services/feed-store.service.js';
import { IdentityService, type CredentialVerifier } from './services/identity.service.js';
import { FeedService } from './services/feed.service.js';
import { ProfileService } from './services/profile.service.js';
import { ImageCacheService } from './services/cache/image-cache.service.js';
import { CacheInvalidationService } from './services/cache/cache-invalidation.service.js';
import { PostWriteService } from './services/post-write.service.js';
import type { AppConfig } from './services/config.service.js';
import type { CacheLayer } from './services/cache/cache.types.js';

const logger = createServiceLogger('read-path');

export interface ReadPathLayerOptions {
  credentialVerifier: CredentialVerifier;
  /** Replaces pg.Client as the way connections are opened */
  connectionFactory?: ConnectionFactory;
  /** Replaces the PostgreSQL store entirely */
  store?: FeedStore;
  /** Shared L2 layer; defaults to Redis when enabled in config, null disables it */
  l2?: CacheLayer | null;
  /** L1 expired-entry sweep interval */
  cleanupIntervalMs?: number;
}

export interface ReadPathLayer {
  readonly config: AppConfig;
  readonly cache: CacheService;
  readonly connections: ConnectionManager;
  readonly store: FeedStore;
  readonly identity: IdentityService;
  readonly feed: FeedService;
  readonly profiles: ProfileService;
  readonly images: ImageCacheService;
  readonly invalidation: CacheInvalidationService;
  readonly writes: PostWriteService;
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

export function createReadPathLayer(config: AppConfig, options: ReadPathLayerOptions): ReadPathLayer {
  const redis =
    options.l2 === undefined && config.redis.enabled
      ? new RedisAdapterService({
          host: config.redis.host,
          port: config.redis.port,
          password: config.redis.password,
          db: config.redis.db,
          connectTimeoutMs: config.database.connectTimeoutMs,
        })
      : null;

  const memory = new MemoryCacheService({ maxSizeBytes: config.memory.maxSizeBytes });
  const cache = new CacheService({ l1: memory, l2: options.l2 ?? redis });
  const connections = new ConnectionManager(config.database, options.connectionFactory);
  const store = options.store ?? new PgFeedStore(connections);
  const invalidation = new CacheInvalidationService(cache);

  return {
    config,
    cache,
    connections,
    store,
    identity: new IdentityService(cache, store, options.credentialVerifier, config.ttl),
    feed: new FeedService(cache, store, config.feed, config.ttl),
    profiles: new ProfileService(cache, store, config.ttl),
    images: new ImageCacheService(cache, store, config.ttl),
    invalidation,
    writes: new PostWriteService(store, invalidation),

    async initialize(): Promise<void> {
      if (redis) {
        await redis.connect();
      }
      if (!options.store) {
        await connections.initialize();
      }
      memory.startCleanup(options.cleanupIntervalMs);
      logger.info({ l2: cache.getHealth().l2Available }, 'Read path initialized');
    },

    async shutdown(): Promise<void> {
      memory.stopCleanup();
      if (redis) {
        await redis.disconnect();
      }
      await connections.close();
      logger.info('Read path shut down');
    },
  };
}

export { loadConfig, type AppConfig } from './services/config.service.js';
export {
  StoreUnavailableError,
  UnauthenticatedError,
  NotFoundError,
  ValidationError,
  ConfigError,
} from './services/errors.js';
export { encodeCursor, decodeCursor } from './services/feed-cursor.js';
export { imageExtension, imagePath } from './services/cache/image-cache.service.js';
export type { CredentialVerifier } from './services/identity.service.js';
export type { FeedStore } from './services/feed-store.service.js';
export type { CacheLayer, CachedImage } from './services/cache/cache.types.js';
export type * from './types/feed.types.js';
