/**
 * Configuration Service
 *
 * Builds the read-path configuration from environment variables.
 * Every option has a default, so an empty environment yields a working
 * development setup against a local PostgreSQL.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// =============================================================================
// Schema
// =============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((val) => val === 'true' || val === '1');

export const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).default('postgres://localhost:5432/photofeed'),
  DB_CONNECT_TIMEOUT_MS: positiveInt(5000),
  DB_QUERY_TIMEOUT_MS: positiveInt(30000),
  DB_MAX_CONNECTIONS: positiveInt(10),
  DB_MAX_RETRIES: nonNegativeInt(3),
  DB_RETRY_BASE_DELAY_MS: nonNegativeInt(100),

  REDIS_ENABLED: booleanFlag,
  REDIS_HOST: z.string().min(1).default('127.0.0.1'),
  REDIS_PORT: positiveInt(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: nonNegativeInt(0),

  CACHE_TTL_IDENTITY: positiveInt(60),
  CACHE_TTL_LOGIN: positiveInt(300),
  CACHE_TTL_POST: positiveInt(60),
  CACHE_TTL_FEED_PAGE: positiveInt(60),
  CACHE_TTL_IMAGE: positiveInt(3600),
  CACHE_TTL_IMAGE_MISS: positiveInt(5),
  CACHE_TTL_PROFILE: positiveInt(60),
  CACHE_L1_MAX_BYTES: positiveInt(75 * 1024 * 1024),

  FEED_DEFAULT_PAGE_SIZE: positiveInt(20),
  FEED_MAX_PAGE_SIZE: positiveInt(100),
  FEED_RECENT_COMMENTS: positiveInt(3),
});

// =============================================================================
// Type Definitions
// =============================================================================

export interface DatabaseConfig {
  url: string;
  /** Time allowed to open a connection or wait for a free one */
  connectTimeoutMs: number;
  /** Read/write timeout applied to every statement */
  queryTimeoutMs: number;
  maxConnections: number;
  /** Retries after the first failed connection attempt */
  maxRetries: number;
  /** Backoff base; attempt n waits base * 2^(n-1) */
  retryBaseDelayMs: number;
}

export interface RedisSettings {
  enabled: boolean;
  host: string;
  port: number;
  password?: string;
  db: number;
}

/**
 * Cache TTL classes, in seconds.
 */
export interface TtlSettings {
  /** Session token -> identity */
  identity: number;
  /** Credential -> identity (login attempts) */
  login: number;
  /** Per-post enriched entry */
  post: number;
  /** Ordered post ids of one feed page */
  feedPage: number;
  /** Image bytes (immutable) */
  image: number;
  /** Negative marker for an image id with no row */
  imageMiss: number;
  /** User page stats and account-name lookups */
  profile: number;
}

export interface FeedSettings {
  defaultPageSize: number;
  maxPageSize: number;
  /** Recent comments previewed per post */
  recentComments: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  redis: RedisSettings;
  ttl: TtlSettings;
  feed: FeedSettings;
  memory: { maxSizeBytes: number };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse and validate configuration from an environment map.
 * @throws {ConfigError} When any variable fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  if (e.FEED_DEFAULT_PAGE_SIZE > e.FEED_MAX_PAGE_SIZE) {
    throw new ConfigError([
      `FEED_DEFAULT_PAGE_SIZE (${e.FEED_DEFAULT_PAGE_SIZE}) exceeds FEED_MAX_PAGE_SIZE (${e.FEED_MAX_PAGE_SIZE})`,
    ]);
  }

  return {
    database: {
      url: e.DATABASE_URL,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
      queryTimeoutMs: e.DB_QUERY_TIMEOUT_MS,
      maxConnections: e.DB_MAX_CONNECTIONS,
      maxRetries: e.DB_MAX_RETRIES,
      retryBaseDelayMs: e.DB_RETRY_BASE_DELAY_MS,
    },
    redis: {
      enabled: e.REDIS_ENABLED,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
      db: e.REDIS_DB,
    },
    ttl: {
      identity: e.CACHE_TTL_IDENTITY,
      login: e.CACHE_TTL_LOGIN,
      post: e.CACHE_TTL_POST,
      feedPage: e.CACHE_TTL_FEED_PAGE,
      image: e.CACHE_TTL_IMAGE,
      imageMiss: e.CACHE_TTL_IMAGE_MISS,
      profile: e.CACHE_TTL_PROFILE,
    },
    feed: {
      defaultPageSize: e.FEED_DEFAULT_PAGE_SIZE,
      maxPageSize: e.FEED_MAX_PAGE_SIZE,
      recentComments: e.FEED_RECENT_COMMENTS,
    },
    memory: {
      maxSizeBytes: e.CACHE_L1_MAX_BYTES,
    },
  };
}
