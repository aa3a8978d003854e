/**
 * Cache Invalidation Service
 *
 * Maps each kind of committed write to the cache entries it makes stale.
 * Callers run these strictly after the store write commits and await them
 * before acknowledging the write.
 *
 * Entry dependencies:
 * - New post:     feed pages, author's pages, author's profile, image marker
 * - New comment:  the post entry, its count, commenter and owner profiles
 * - Post deleted: the post and image entries, feed pages, owner's pages and profile
 * - User banned:  feed pages, the user's pages and posts, profile, account and identities
 */

import { createServiceLogger } from '../logger.service.js';
import { CACHE_KEY_PREFIX, CacheKeys } from './cache.types.js';
import type { CacheService } from './cache.service.js';
import type { Comment, Post } from '../../types/feed.types.js';

const logger = createServiceLogger('cache-invalidation');

export class CacheInvalidationService {
  constructor(private readonly cache: CacheService) {}

  async onPostCreated(post: Pick<Post, 'id' | 'userId'>): Promise<void> {
    // Head pages first: they are what the author reads next
    await this.cache.invalidatePrefix(`${CACHE_KEY_PREFIX.FEED_PAGE_HEAD}:`);
    await this.cache.invalidatePrefix(`${CACHE_KEY_PREFIX.FEED_PAGE}:`);
    await this.cache.invalidatePrefix(CacheKeys.userFeedPrefix(post.userId));
    await this.cache.invalidate(CacheKeys.profile(post.userId));
    await this.cache.invalidate(CacheKeys.image(post.id));

    logger.debug({ postId: post.id, userId: post.userId }, 'Invalidated caches for new post');
  }

  /**
   * @param postOwnerId owner of the commented post, when the caller knows it
   */
  async onCommentCreated(comment: Pick<Comment, 'postId' | 'userId'>, postOwnerId?: number): Promise<void> {
    await this.cache.invalidate(CacheKeys.post(comment.postId));
    await this.cache.invalidate(CacheKeys.commentCount(comment.postId));
    await this.cache.invalidate(CacheKeys.profile(comment.userId));
    if (postOwnerId !== undefined && postOwnerId !== comment.userId) {
      await this.cache.invalidate(CacheKeys.profile(postOwnerId));
    }

    logger.debug({ postId: comment.postId }, 'Invalidated caches for new comment');
  }

  async onPostDeleted(post: Pick<Post, 'id' | 'userId'>): Promise<void> {
    await this.cache.invalidate(CacheKeys.post(post.id));
    await this.cache.invalidate(CacheKeys.commentCount(post.id));
    await this.cache.invalidate(CacheKeys.image(post.id));
    await this.cache.invalidatePrefix(`${CACHE_KEY_PREFIX.FEED_PAGE}:`);
    await this.cache.invalidatePrefix(CacheKeys.userFeedPrefix(post.userId));
    await this.cache.invalidate(CacheKeys.profile(post.userId));

    logger.debug({ postId: post.id }, 'Invalidated caches for deleted post');
  }

  /**
   * @param postIds every post the user authored
   */
  async onUserDeactivated(user: { id: number; accountName: string }, postIds: number[]): Promise<void> {
    await this.cache.invalidatePrefix(`${CACHE_KEY_PREFIX.FEED_PAGE}:`);
    await this.cache.invalidatePrefix(CacheKeys.userFeedPrefix(user.id));
    for (const postId of postIds) {
      await this.cache.invalidate(CacheKeys.post(postId));
    }
    await this.cache.invalidate(CacheKeys.profile(user.id));
    await this.cache.invalidate(CacheKeys.account(user.accountName));
    // Identity keys are token digests, so they cannot be targeted per user
    await this.cache.invalidatePrefix(`${CACHE_KEY_PREFIX.IDENTITY_SESSION}:`);
    await this.cache.invalidatePrefix(`${CACHE_KEY_PREFIX.IDENTITY_LOGIN}:`);

    logger.info({ userId: user.id, posts: postIds.length }, 'Invalidated caches for deactivated user');
  }

  async invalidateAll(): Promise<void> {
    await this.cache.invalidateAll();
    logger.info('All read-path caches cleared');
  }
}
