/**
 * Post Write Service
 *
 * The write side of the read path: commit to the store, then await cache
 * invalidation, then return. A caller that reads after one of these
 * resolves sees its own write.
 */

import { createServiceLogger } from './logger.service.js';
import { NotFoundError, ValidationError } from './errors.js';
import { toImageMime, type FeedStore } from './feed-store.service.js';
import type { CacheInvalidationService } from './cache/cache-invalidation.service.js';
import type {
  Comment,
  NewCommentInput,
  NewPostInput,
  Post,
  UserIdentity,
} from '../types/feed.types.js';

const logger = createServiceLogger('post-write');

/** Upload limit for a single image */
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export class PostWriteService {
  constructor(
    private readonly store: FeedStore,
    private readonly invalidation: CacheInvalidationService
  ) {}

  /**
   * @throws {ValidationError} On an unsupported MIME type, an empty or oversized image
   */
  async createPost(author: UserIdentity, input: NewPostInput): Promise<Post> {
    const mime = toImageMime(input.mime);
    if (!mime) {
      throw new ValidationError(`Unsupported image type: ${input.mime}`);
    }
    if (input.data.length === 0) {
      throw new ValidationError('Image is empty');
    }
    if (input.data.length > MAX_IMAGE_BYTES) {
      throw new ValidationError(`Image exceeds ${MAX_IMAGE_BYTES} bytes`);
    }

    const post = await this.store.insertPost({
      userId: author.id,
      mime,
      data: input.data,
      body: input.body ?? null,
    });

    await this.invalidation.onPostCreated(post);
    logger.info({ postId: post.id, userId: author.id }, 'Post created');
    return post;
  }

  /**
   * @throws {NotFoundError} When the post does not exist
   * @throws {ValidationError} When the comment is blank
   */
  async createComment(author: UserIdentity, input: NewCommentInput): Promise<Comment> {
    if (input.body.trim().length === 0) {
      throw new ValidationError('Comment is empty');
    }

    const post = await this.store.findPost(input.postId);
    if (!post) {
      throw new NotFoundError('post', input.postId);
    }

    const comment = await this.store.insertComment({
      postId: post.id,
      userId: author.id,
      body: input.body,
    });

    await this.invalidation.onCommentCreated(comment, post.userId);
    logger.info({ commentId: comment.id, postId: post.id }, 'Comment created');
    return comment;
  }

  /**
   * Remove a post and its comments.
   * @throws {NotFoundError} When the post does not exist
   */
  async deletePost(postId: number): Promise<Post> {
    const post = await this.store.deletePost(postId);
    if (!post) {
      throw new NotFoundError('post', postId);
    }

    await this.invalidation.onPostDeleted(post);
    logger.info({ postId }, 'Post deleted');
    return post;
  }

  /**
   * Ban a user. Their posts drop out of every feed and single-post read.
   * @throws {NotFoundError} When the user does not exist
   */
  async deactivateUser(userId: number): Promise<void> {
    const user = await this.store.findUserById(userId);
    if (!user) {
      throw new NotFoundError('user', userId);
    }

    await this.store.setUserActive(userId, false);
    const postIds = await this.store.findPostIdsByUser(userId);
    await this.invalidation.onUserDeactivated(user, postIds);
    logger.info({ userId }, 'User deactivated');
  }
}
