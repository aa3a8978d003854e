/**
 * Read-path error taxonomy.
 *
 * Store-of-record failures propagate to the request boundary as these errors.
 * Cache failures never do: the cache service absorbs them as misses.
 * Degraded results are returned, not thrown (see `degraded` on feed types).
 */

/**
 * The relational store could not be reached within the configured timeouts
 * and retry budget.
 */
export class StoreUnavailableError extends Error {
  readonly attempts: number;

  constructor(message: string = 'Store unavailable', attempts: number = 0, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
    this.attempts = attempts;
  }
}

/**
 * No valid session or credential. Never cached.
 */
export class UnauthenticatedError extends Error {
  constructor(message: string = 'Not authenticated') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

export type NotFoundEntity = 'post' | 'image' | 'user' | 'comment';

/**
 * Referenced entity does not exist.
 */
export class NotFoundError extends Error {
  readonly entity: NotFoundEntity;
  readonly id: string | number;

  constructor(entity: NotFoundEntity, id: string | number) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Write input rejected before it reached the store.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
