/**
 * Identity Service
 *
 * Resolves session tokens and login attempts to a user identity, caching
 * only successful resolutions. Cache keys carry a SHA-256 digest of the
 * secret, never the secret itself.
 */

import { createHash } from 'crypto';
import { createServiceLogger } from './logger.service.js';
import { UnauthenticatedError } from './errors.js';
import { CacheKeys } from './cache/cache.types.js';
import type { CacheService } from './cache/cache.service.js';
import type { TtlSettings } from './config.service.js';
import type { FeedStore } from './feed-store.service.js';
import type { UserIdentity, UserRecord } from '../types/feed.types.js';

const logger = createServiceLogger('identity');

/**
 * Checks an account name and password. The hashing scheme lives behind
 * this interface.
 */
export interface CredentialVerifier {
  verify(accountName: string, password: string): Promise<UserIdentity | null>;
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

function toIdentity(user: UserRecord): UserIdentity {
  return { id: user.id, accountName: user.accountName, authority: user.authority };
}

export class IdentityService {
  constructor(
    private readonly cache: CacheService,
    private readonly store: FeedStore,
    private readonly verifier: CredentialVerifier,
    private readonly ttl: Pick<TtlSettings, 'identity' | 'login'>
  ) {}

  /**
   * Resolve a session token. Unknown tokens, expired sessions and inactive
   * users all resolve to null and are not cached.
   */
  async resolve(sessionToken: string): Promise<UserIdentity | null> {
    if (!sessionToken) return null;

    const key = CacheKeys.sessionIdentity(sha256(sessionToken));
    const cached = await this.cache.get<UserIdentity>(key);
    if (cached) {
      logger.debug('Session identity cache hit');
      return cached;
    }

    const fence = this.cache.openFence();
    const session = await this.store.findSession(sessionToken);
    if (!session) return null;

    const expiresInMs = Date.parse(session.expiresAt) - Date.now();
    if (expiresInMs <= 0) return null;

    const user = await this.store.findUserById(session.userId);
    if (!user || !user.active) return null;

    const identity = toIdentity(user);
    const ttlSeconds = Math.min(this.ttl.identity, Math.floor(expiresInMs / 1000));
    await this.cache.set(key, identity, ttlSeconds, { fence });
    return identity;
  }

  /**
   * @throws {UnauthenticatedError} When the token does not resolve
   */
  async requireIdentity(sessionToken: string): Promise<UserIdentity> {
    const identity = await this.resolve(sessionToken);
    if (!identity) {
      throw new UnauthenticatedError();
    }
    return identity;
  }

  /**
   * Verify credentials, caching an accepted result.
   * @throws {UnauthenticatedError} When the verifier rejects the credentials
   */
  async login(accountName: string, password: string): Promise<UserIdentity> {
    const key = CacheKeys.loginIdentity(sha256(`${accountName}:${password}`));
    const cached = await this.cache.get<UserIdentity>(key);
    if (cached) {
      logger.debug({ accountName }, 'Login cache hit');
      return cached;
    }

    const fence = this.cache.openFence();
    const identity = await this.verifier.verify(accountName, password);
    if (!identity) {
      logger.info({ accountName }, 'Login rejected');
      throw new UnauthenticatedError('Account name or password is incorrect');
    }

    await this.cache.set(key, identity, this.ttl.login, { fence });
    return identity;
  }

  /**
   * Drop the cached identity for a session (logout).
   */
  async forgetSession(sessionToken: string): Promise<void> {
    await this.cache.invalidate(CacheKeys.sessionIdentity(sha256(sessionToken)));
  }
}
