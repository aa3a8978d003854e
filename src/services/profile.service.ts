/**
 * Profile Service
 *
 * User page header: the account plus its post, comment and
 * comments-received counts.
 */

import { createServiceLogger } from './logger.service.js';
import { CacheKeys } from './cache/cache.types.js';
import type { CacheService } from './cache/cache.service.js';
import type { TtlSettings } from './config.service.js';
import type { FeedStore } from './feed-store.service.js';
import type { AuthorSummary, UserProfile } from '../types/feed.types.js';

const logger = createServiceLogger('profile');

export class ProfileService {
  constructor(
    private readonly cache: CacheService,
    private readonly store: FeedStore,
    private readonly ttl: Pick<TtlSettings, 'profile'>
  ) {}

  /**
   * Profile of an active account, or null when the account is unknown or banned.
   */
  async getUserProfile(accountName: string): Promise<UserProfile | null> {
    const user = await this.findAccount(accountName);
    if (!user) {
      return null;
    }

    const key = CacheKeys.profile(user.id);
    const cached = await this.cache.get<UserProfile>(key);
    if (cached) {
      return cached;
    }

    const fence = this.cache.openFence();
    const stats = await this.store.fetchUserStats(user.id);
    const profile: UserProfile = { user, ...stats };
    await this.cache.set(key, profile, this.ttl.profile, { fence });
    logger.debug({ userId: user.id }, 'Profile cached');
    return profile;
  }

  private async findAccount(accountName: string): Promise<AuthorSummary | null> {
    const key = CacheKeys.account(accountName);
    const cached = await this.cache.get<AuthorSummary>(key);
    if (cached) {
      return cached;
    }

    const fence = this.cache.openFence();
    const user = await this.store.findUserByAccountName(accountName);
    if (!user || !user.active) {
      return null;
    }

    const summary: AuthorSummary = { id: user.id, accountName: user.accountName };
    await this.cache.set(key, summary, this.ttl.profile, { fence });
    return summary;
  }
}
