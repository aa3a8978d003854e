/**
 * Feed Service
 *
 * Assembles paginated feeds with a constant number of store round trips:
 * one window query, then one bulk fetch each for authors, comment counts
 * and recent comments, whatever the page size.
 *
 * Cache layout:
 * - post:{id}                  complete enriched post
 * - feed:page:head:{size}      ordered post ids + next cursor
 * - feed:page:after:{c}:{size}
 * - feed:user:{userId}:...     same, for one author's page
 *
 * A page entry is written only after every post on it was written, all under
 * the fence opened before the store was read. Degraded posts are never cached.
 */

import { createServiceLogger } from './logger.service.js';
import { QueryCoalescer } from './cache/query-coalescer.js';
import { CacheKeys, type FillFence } from './cache/cache.types.js';
import { cursorAfter, decodeCursor } from './feed-cursor.js';
import type { CacheService } from './cache/cache.service.js';
import type { FeedSettings, TtlSettings } from './config.service.js';
import type { FeedStore } from './feed-store.service.js';
import type {
  AuthorSummary,
  CommentWithAuthor,
  CursorPosition,
  EnrichedPost,
  FeedPage,
  Post,
} from '../types/feed.types.js';

const logger = createServiceLogger('feed');

// =============================================================================
// Types
// =============================================================================

/**
 * What a feed page key holds: the page's shape, not its content.
 */
export interface CachedFeedPage {
  postIds: number[];
  nextCursor: string | null;
}

interface EnrichmentResult {
  posts: EnrichedPost[];
  degraded: boolean;
}

interface PageRequest {
  key: string;
  after: CursorPosition | null;
  pageSize: number;
  userId?: number;
}

// =============================================================================
// Feed Service Class
// =============================================================================

export class FeedService {
  private readonly pageBuilds: QueryCoalescer<FeedPage>;
  private readonly postBuilds: QueryCoalescer<EnrichedPost | null>;

  constructor(
    private readonly cache: CacheService,
    private readonly store: FeedStore,
    private readonly settings: FeedSettings,
    private readonly ttl: Pick<TtlSettings, 'post' | 'feedPage'>
  ) {
    this.pageBuilds = new QueryCoalescer<FeedPage>(cache);
    this.postBuilds = new QueryCoalescer<EnrichedPost | null>(cache);
  }

  /**
   * Clamp a requested page size into [1, maxPageSize].
   */
  clampPageSize(pageSize?: number): number {
    if (pageSize === undefined || !Number.isFinite(pageSize)) {
      return this.settings.defaultPageSize;
    }
    return Math.min(Math.max(Math.trunc(pageSize), 1), this.settings.maxPageSize);
  }

  /**
   * One page of the global feed, newest first.
   * @throws {ValidationError} When the cursor is malformed
   */
  async getFeedPage(cursor: string | null, pageSize?: number): Promise<FeedPage> {
    const size = this.clampPageSize(pageSize);
    const after = cursor === null ? null : decodeCursor(cursor);
    return this.getPage({ key: CacheKeys.feedPage(cursor, size), after, pageSize: size });
  }

  /**
   * One page of a single author's posts, newest first.
   * @throws {ValidationError} When the cursor is malformed
   */
  async getUserFeedPage(userId: number, cursor: string | null, pageSize?: number): Promise<FeedPage> {
    const size = this.clampPageSize(pageSize);
    const after = cursor === null ? null : decodeCursor(cursor);
    return this.getPage({ key: CacheKeys.userFeedPage(userId, cursor, size), after, pageSize: size, userId });
  }

  /**
   * A single enriched post. Unknown posts (and posts by inactive authors)
   * return null and are not cached.
   */
  async getPost(postId: number): Promise<EnrichedPost | null> {
    const key = CacheKeys.post(postId);
    const cached = await this.cache.get<EnrichedPost>(key);
    if (cached) {
      return cached;
    }

    return this.postBuilds.run(key, async (fence) => {
      const posts = await this.store.fetchPostsByIds([postId]);
      if (posts.length === 0) {
        return null;
      }
      const result = await this.enrich(posts);
      await this.cachePosts(result, fence);
      return result.posts[0] ?? null;
    });
  }

  // =============================================================================
  // Page Assembly
  // =============================================================================

  private async getPage(request: PageRequest): Promise<FeedPage> {
    const cached = await this.cache.get<CachedFeedPage>(request.key);
    if (cached) {
      const result = await this.loadPosts(cached.postIds);
      if (result) {
        logger.debug({ key: request.key }, 'Feed page cache hit');
        return { posts: result.posts, nextCursor: cached.nextCursor, degraded: result.degraded };
      }
      logger.debug({ key: request.key }, 'Cached feed page references missing posts, rebuilding');
    }

    return this.pageBuilds.run(request.key, (fence) => this.buildPage(request, fence));
  }

  private async buildPage(request: PageRequest, fence: FillFence): Promise<FeedPage> {
    // One extra row tells us whether a next page exists
    const window = await this.store.fetchPostWindow({
      after: request.after,
      limit: request.pageSize + 1,
      userId: request.userId,
    });

    const pagePosts = window.slice(0, request.pageSize);
    const last = pagePosts[pagePosts.length - 1];
    const nextCursor = window.length > request.pageSize && last ? cursorAfter(last) : null;

    const result = await this.enrich(pagePosts);
    const page: FeedPage = { posts: result.posts, nextCursor, degraded: result.degraded };

    if (result.degraded) {
      return page;
    }

    const allPostsCached = await this.cachePosts(result, fence);
    if (allPostsCached) {
      const entry: CachedFeedPage = { postIds: result.posts.map((post) => post.id), nextCursor };
      await this.cache.set(request.key, entry, this.ttl.feedPage, { fence });
    }

    return page;
  }

  /**
   * Read posts from their per-post entries and bulk-enrich only the missing
   * ones. Returns null when a listed post no longer exists.
   */
  private async loadPosts(postIds: number[]): Promise<EnrichmentResult | null> {
    const cachedPosts = await Promise.all(postIds.map((id) => this.cache.get<EnrichedPost>(CacheKeys.post(id))));

    const byId = new Map<number, EnrichedPost>();
    const missing: number[] = [];
    postIds.forEach((id, index) => {
      const post = cachedPosts[index];
      if (post) {
        byId.set(id, post);
      } else {
        missing.push(id);
      }
    });

    let degraded = false;
    if (missing.length > 0) {
      const fence = this.cache.openFence();
      const fetched = await this.store.fetchPostsByIds(missing);
      if (fetched.length !== missing.length) {
        return null;
      }

      const result = await this.enrich(fetched);
      degraded = result.degraded;
      if (!degraded) {
        await this.cachePosts(result, fence);
      }
      for (const post of result.posts) {
        byId.set(post.id, post);
      }
    }

    const posts: EnrichedPost[] = [];
    for (const id of postIds) {
      const post = byId.get(id);
      if (!post) return null;
      posts.push(post);
    }
    return { posts, degraded };
  }

  // =============================================================================
  // Enrichment
  // =============================================================================

  /**
   * Attach authors, comment counts and recent comments with one bulk fetch
   * each. Author failures propagate; comment failures degrade.
   */
  private async enrich(posts: Post[]): Promise<EnrichmentResult> {
    if (posts.length === 0) {
      return { posts: [], degraded: false };
    }

    const postIds = posts.map((post) => post.id);
    const userIds = [...new Set(posts.map((post) => post.userId))];

    const [authors, counts, comments] = await Promise.allSettled([
      this.store.fetchAuthors(userIds),
      this.store.fetchCommentCounts(postIds),
      this.store.fetchRecentComments(postIds, this.settings.recentComments),
    ]);

    if (authors.status === 'rejected') {
      throw authors.reason;
    }

    const failedFetches: string[] = [];
    if (counts.status === 'rejected') failedFetches.push('commentCounts');
    if (comments.status === 'rejected') failedFetches.push('recentComments');
    const degraded = failedFetches.length > 0;

    if (degraded) {
      logger.warn(
        {
          failedFetches,
          postIds,
          err: counts.status === 'rejected' ? counts.reason : comments.status === 'rejected' ? comments.reason : undefined,
        },
        'Feed enrichment degraded'
      );
    }

    // A degraded post shows no comment data at all rather than half of it
    const authorsById = new Map<number, AuthorSummary>(authors.value.map((author) => [author.id, author]));
    const countsById = !degraded && counts.status === 'fulfilled' ? counts.value : new Map<number, number>();
    const commentsByPost = new Map<number, CommentWithAuthor[]>();
    if (!degraded && comments.status === 'fulfilled') {
      for (const comment of comments.value) {
        const list = commentsByPost.get(comment.postId) ?? [];
        list.push(comment);
        commentsByPost.set(comment.postId, list);
      }
    }

    const enriched: EnrichedPost[] = [];
    for (const post of posts) {
      const author = authorsById.get(post.userId);
      if (!author) {
        logger.debug({ postId: post.id, userId: post.userId }, 'Post author missing, skipped');
        continue;
      }
      enriched.push({
        ...post,
        author,
        commentCount: countsById.get(post.id) ?? 0,
        recentComments: commentsByPost.get(post.id) ?? [],
        degraded,
      });
    }

    return { posts: enriched, degraded };
  }

  /**
   * Write every post under its own key.
   * @returns true when all writes landed
   */
  private async cachePosts(result: EnrichmentResult, fence: FillFence): Promise<boolean> {
    if (result.degraded) {
      return false;
    }
    const written = await Promise.all(
      result.posts.map((post) => this.cache.set(CacheKeys.post(post.id), post, this.ttl.post, { fence }))
    );
    return written.every(Boolean);
  }
}
