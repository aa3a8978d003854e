/**
 * Database Service
 *
 * Owns every connection to the relational store. Connections are pooled,
 * liveness-checked before each hand-out and replaced when dead. Opening a
 * connection is retried a bounded number of times with exponential backoff;
 * after that the failure surfaces as StoreUnavailableError.
 *
 * Other services borrow connections through withConnection() (or the query()
 * shorthand), which releases on every exit path.
 */

import pg from 'pg';
import { createServiceLogger } from './logger.service.js';
import { StoreUnavailableError } from './errors.js';
import type { DatabaseConfig } from './config.service.js';

const logger = createServiceLogger('database');

// =============================================================================
// Connection Abstraction
// =============================================================================

export type QueryParam = string | number | boolean | null | Date | Buffer | number[] | string[];

export interface QueryRows<R> {
  rows: R[];
}

/**
 * One open connection to the store. The default implementation wraps pg.Client.
 */
export interface StoreConnection {
  query<R extends object>(sql: string, params?: QueryParam[]): Promise<QueryRows<R>>;
  end(): Promise<void>;
}

export type ConnectionFactory = (config: DatabaseConfig) => Promise<StoreConnection>;

/**
 * Open a pg.Client with the configured connect and read/write timeouts.
 */
export const pgConnectionFactory: ConnectionFactory = async (config) => {
  const client = new pg.Client({
    connectionString: config.url,
    connectionTimeoutMillis: config.connectTimeoutMs,
    query_timeout: config.queryTimeoutMs,
    statement_timeout: config.queryTimeoutMs,
  });

  // An idle client that loses its socket emits 'error'; without a listener
  // the process would crash. The next liveness check replaces it.
  client.on('error', (err) => {
    logger.warn({ err }, 'Idle store connection error');
  });

  await client.connect();

  return {
    query: async <R extends object>(sql: string, params: QueryParam[] = []) => {
      const result = await client.query(sql, params);
      const rows: R[] = result.rows;
      return { rows };
    },
    end: () => client.end(),
  };
};

// =============================================================================
// Pool Types
// =============================================================================

export interface PooledConnection {
  readonly id: number;
  readonly connection: StoreConnection;
  readonly createdAt: number;
  lastUsedAt: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface ConnectionManagerStats {
  total: number;
  idle: number;
  busy: number;
  waiting: number;
  created: number;
  destroyed: number;
  failedAttempts: number;
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '08000', // connection_exception
  '08003', // connection_does_not_exist
  '08006', // connection_failure
]);

/**
 * Whether an error means the connection (not the statement) failed.
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof StoreUnavailableError) return true;
  if (!(error instanceof Error)) return false;

  if ('code' in error && typeof error.code === 'string' && CONNECTION_ERROR_CODES.has(error.code)) {
    return true;
  }

  const message = error.message;
  return (
    message.includes('Connection terminated') ||
    message.includes('Query read timeout') ||
    message.includes('timeout exceeded when trying to connect') ||
    message.includes('Client has encountered a connection error') ||
    message.includes('canceling statement due to statement timeout')
  );
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Connection Manager
// =============================================================================

export class ConnectionManager {
  private readonly config: DatabaseConfig;
  private readonly factory: ConnectionFactory;

  private idle: PooledConnection[] = [];
  private busy = new Set<PooledConnection>();
  private opening = 0;
  private waiters: Waiter[] = [];
  private nextId = 1;
  private closed = false;

  private counters = {
    created: 0,
    destroyed: 0,
    failedAttempts: 0,
  };

  constructor(config: DatabaseConfig, factory: ConnectionFactory = pgConnectionFactory) {
    this.config = config;
    this.factory = factory;
  }

  /**
   * Open one connection up front so a misconfigured store fails at startup.
   */
  async initialize(): Promise<void> {
    const conn = await this.acquire();
    this.release(conn);
    logger.info({ maxConnections: this.config.maxConnections }, 'Store connection pool ready');
  }

  // =============================================================================
  // Acquire / Release
  // =============================================================================

  /**
   * Hand out a live connection, waiting up to connectTimeoutMs for a free slot.
   * @throws {StoreUnavailableError} When no connection can be established
   */
  async acquire(): Promise<PooledConnection> {
    const deadline = Date.now() + this.config.connectTimeoutMs;

    for (;;) {
      if (this.closed) {
        throw new StoreUnavailableError('Connection manager is closed');
      }

      const candidate = this.idle.pop();
      if (candidate) {
        this.busy.add(candidate);
        if (await this.isAlive(candidate)) {
          candidate.lastUsedAt = Date.now();
          return candidate;
        }
        logger.warn({ connectionId: candidate.id }, 'Dead store connection replaced');
        await this.destroy(candidate);
        continue;
      }

      if (this.size < this.config.maxConnections) {
        return this.open();
      }

      await this.waitForSlot(deadline);
    }
  }

  /**
   * Return a connection to the pool. A broken connection is destroyed instead.
   */
  release(conn: PooledConnection, broken: boolean = false): void {
    if (!this.busy.has(conn)) {
      return;
    }

    if (broken || this.closed) {
      void this.destroy(conn);
      return;
    }

    this.busy.delete(conn);
    conn.lastUsedAt = Date.now();
    this.idle.push(conn);
    this.wakeWaiter();
  }

  /**
   * Run `fn` with a borrowed connection, releasing it on every exit path.
   * Connection-level failures are rethrown as StoreUnavailableError.
   */
  async withConnection<T>(fn: (connection: StoreConnection) => Promise<T>): Promise<T> {
    const conn = await this.acquire();
    let broken = false;

    try {
      return await fn(conn.connection);
    } catch (error) {
      if (isConnectionError(error)) {
        broken = true;
        if (error instanceof StoreUnavailableError) throw error;
        logger.error({ err: error, connectionId: conn.id }, 'Store connection failed during query');
        throw new StoreUnavailableError('Store connection failed during query', 1, { cause: error });
      }
      throw error;
    } finally {
      this.release(conn, broken);
    }
  }

  /**
   * Single-statement shorthand for withConnection().
   */
  async query<R extends object>(sql: string, params: QueryParam[] = []): Promise<R[]> {
    const result = await this.withConnection((connection) => connection.query<R>(sql, params));
    return result.rows;
  }

  // =============================================================================
  // Lifecycle
  // =============================================================================

  /**
   * Close idle connections and reject waiters. Busy connections close on release.
   */
  async close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new StoreUnavailableError('Connection manager is closed'));
    }

    const idle = this.idle.splice(0);
    await Promise.allSettled(idle.map((conn) => this.endQuietly(conn)));
    logger.info('Store connection pool closed');
  }

  getStats(): ConnectionManagerStats {
    return {
      total: this.size,
      idle: this.idle.length,
      busy: this.busy.size,
      waiting: this.waiters.length,
      ...this.counters,
    };
  }

  // =============================================================================
  // Private Helpers
  // =============================================================================

  private get size(): number {
    return this.idle.length + this.busy.size + this.opening;
  }

  /**
   * Open a new connection, retrying with exponential backoff.
   */
  private async open(): Promise<PooledConnection> {
    const maxAttempts = this.config.maxRetries + 1;
    let lastError: unknown = null;
    this.opening++;

    try {
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
          const connection = await this.connectWithTimeout();
          const conn: PooledConnection = {
            id: this.nextId++,
            connection,
            createdAt: Date.now(),
            lastUsedAt: Date.now(),
          };
          this.counters.created++;
          this.busy.add(conn);
          logger.debug({ connectionId: conn.id, attempt }, 'Store connection opened');
          return conn;
        } catch (error) {
          lastError = error;
          this.counters.failedAttempts++;

          if (attempt < maxAttempts && !this.closed) {
            const backoffMs = this.config.retryBaseDelayMs * 2 ** (attempt - 1);
            logger.warn({ attempt, maxAttempts, backoffMs, err: error }, 'Store connection attempt failed, retrying');
            await delay(backoffMs);
          }
        }
      }
    } finally {
      this.opening--;
    }

    // The slot we held is free again
    this.wakeWaiter();
    logger.error({ attempts: maxAttempts, err: lastError }, 'Store unavailable');
    throw new StoreUnavailableError(
      `Could not connect to store after ${maxAttempts} attempt(s)`,
      maxAttempts,
      { cause: lastError }
    );
  }

  private connectWithTimeout(): Promise<StoreConnection> {
    return new Promise<StoreConnection>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        reject(new StoreUnavailableError(`Connect timed out after ${this.config.connectTimeoutMs}ms`));
      }, this.config.connectTimeoutMs);

      this.factory(this.config).then(
        (connection) => {
          clearTimeout(timer);
          if (settled) {
            // Arrived after the timeout fired; nobody owns it
            connection.end().catch((err: unknown) => {
              logger.debug({ err }, 'Failed to close late store connection');
            });
            return;
          }
          settled = true;
          resolve(connection);
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (!settled) {
            settled = true;
            reject(error);
          }
        }
      );
    });
  }

  private async isAlive(conn: PooledConnection): Promise<boolean> {
    try {
      await conn.connection.query('SELECT 1');
      return true;
    } catch (error) {
      logger.debug({ err: error, connectionId: conn.id }, 'Store liveness check failed');
      return false;
    }
  }

  private async destroy(conn: PooledConnection): Promise<void> {
    this.busy.delete(conn);
    this.counters.destroyed++;
    this.wakeWaiter();
    await this.endQuietly(conn);
  }

  private async endQuietly(conn: PooledConnection): Promise<void> {
    try {
      await conn.connection.end();
    } catch (error) {
      logger.debug({ err: error, connectionId: conn.id }, 'Error closing store connection');
    }
  }

  private waitForSlot(deadline: number): Promise<void> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return Promise.reject(
        new StoreUnavailableError(`Timed out after ${this.config.connectTimeoutMs}ms waiting for a store connection`)
      );
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(
            new StoreUnavailableError(`Timed out after ${this.config.connectTimeoutMs}ms waiting for a store connection`)
          );
        }, remaining),
      };
      this.waiters.push(waiter);
    });
  }

  private wakeWaiter(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve();
    }
  }
}
