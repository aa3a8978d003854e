/**
 * Post Write Service Tests
 *
 * Writes go store first, then awaited invalidation; a read issued after a
 * write resolves must see it.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PostWriteService, MAX_IMAGE_BYTES } from '../post-write.service.js';
import { FeedService } from '../feed.service.js';
import { IdentityService } from '../identity.service.js';
import { CacheService } from '../cache/cache.service.js';
import { CacheInvalidationService } from '../cache/cache-invalidation.service.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { InMemoryFeedStore } from './__mocks__/feed-store.mock.js';
import { FakeCacheLayer } from './__mocks__/cache-layer.mock.js';
import type { UserIdentity, UserRecord } from '../../types/feed.types.js';

vi.mock('../logger.service.js', () => ({
  createServiceLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

describe('PostWriteService', () => {
  let store: InMemoryFeedStore;
  let cache: CacheService;
  let feed: FeedService;
  let writes: PostWriteService;
  let alice: UserRecord;
  let bob: UserRecord;
  let aliceIdentity: UserIdentity;
  let bobIdentity: UserIdentity;

  beforeEach(() => {
    store = new InMemoryFeedStore();
    alice = store.addUser('alice');
    bob = store.addUser('bob');
    aliceIdentity = { id: alice.id, accountName: 'alice', authority: 0 };
    bobIdentity = { id: bob.id, accountName: 'bob', authority: 0 };

    cache = new CacheService();
    feed = new FeedService(cache, store, { defaultPageSize: 20, maxPageSize: 100, recentComments: 3 }, { post: 60, feedPage: 60 });
    writes = new PostWriteService(store, new CacheInvalidationService(cache));
  });

  // ==========================================================================
  // createPost
  // ==========================================================================

  describe('createPost', () => {
    it('shows the new post on an already cached first page', async () => {
      store.addPost(bob.id);
      await feed.getFeedPage(null, 10);

      const post = await writes.createPost(aliceIdentity, {
        mime: 'image/jpeg',
        data: Buffer.from('jpeg-bytes'),
        body: 'sunset',
      });
      const page = await feed.getFeedPage(null, 10);

      expect(page.posts.map((p) => p.id)).toEqual([post.id, 1]);
      expect(page.posts[0]?.body).toBe('sunset');
    });

    it('stores a missing body as null', async () => {
      const post = await writes.createPost(aliceIdentity, { mime: 'image/gif', data: Buffer.from('GIF89a') });

      expect(post.body).toBeNull();
      expect(post.imageId).toBe(post.id);
    });

    it('rejects an unsupported MIME type before writing', async () => {
      await expect(
        writes.createPost(aliceIdentity, { mime: 'image/webp', data: Buffer.from('riff') })
      ).rejects.toThrow('Unsupported image type: image/webp');
      expect(store.roundTrips).toBe(0);
    });

    it('rejects an empty image', async () => {
      await expect(
        writes.createPost(aliceIdentity, { mime: 'image/png', data: Buffer.alloc(0) })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an image over the upload limit', async () => {
      await expect(
        writes.createPost(aliceIdentity, { mime: 'image/png', data: Buffer.alloc(MAX_IMAGE_BYTES + 1) })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('accepts an image exactly at the upload limit', async () => {
      const post = await writes.createPost(aliceIdentity, { mime: 'image/png', data: Buffer.alloc(MAX_IMAGE_BYTES) });

      expect(post.mime).toBe('image/png');
    });
  });

  // ==========================================================================
  // createComment
  // ==========================================================================

  describe('createComment', () => {
    it('shows the comment on the cached post right away', async () => {
      store.addPost(alice.id);
      const before = await feed.getPost(1);
      expect(before?.commentCount).toBe(0);

      await writes.createComment(bobIdentity, { postId: 1, body: 'lovely' });
      const after = await feed.getPost(1);

      expect(after?.commentCount).toBe(1);
      expect(after?.recentComments.map((c) => [c.body, c.author.accountName])).toEqual([['lovely', 'bob']]);
    });

    it('shows the comment after the shared cache missed the invalidation', async () => {
      const l2 = new FakeCacheLayer();
      const layered = new CacheService({ l2 });
      const layeredFeed = new FeedService(
        layered,
        store,
        { defaultPageSize: 20, maxPageSize: 100, recentComments: 3 },
        { post: 60, feedPage: 60 }
      );
      const layeredWrites = new PostWriteService(store, new CacheInvalidationService(layered));
      store.addPost(alice.id);
      expect((await layeredFeed.getPost(1))?.commentCount).toBe(0);
      expect(l2.entries.has('post:1')).toBe(true);

      l2.throwing = true;
      await layeredWrites.createComment(bobIdentity, { postId: 1, body: 'lovely' });
      l2.throwing = false;

      expect((await layeredFeed.getPost(1))?.commentCount).toBe(1);
    });

    it('shows the comment when the post is read through a cached page', async () => {
      store.addPost(alice.id);
      await feed.getFeedPage(null, 10);

      await writes.createComment(bobIdentity, { postId: 1, body: 'lovely' });
      const page = await feed.getFeedPage(null, 10);

      expect(page.posts[0]?.commentCount).toBe(1);
    });

    it('throws NotFoundError for an unknown post', async () => {
      await expect(writes.createComment(bobIdentity, { postId: 404, body: 'hello?' })).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(store.calls.insertComment).toBeUndefined();
    });

    it('rejects a blank comment', async () => {
      store.addPost(alice.id);

      await expect(writes.createComment(bobIdentity, { postId: 1, body: '   ' })).rejects.toThrow('Comment is empty');
    });
  });

  // ==========================================================================
  // Moderation
  // ==========================================================================

  describe('deletePost', () => {
    it('removes the post from cached reads', async () => {
      store.addPost(alice.id);
      store.addPost(bob.id);
      await feed.getFeedPage(null, 10);
      await feed.getPost(2);

      await writes.deletePost(2);

      expect((await feed.getFeedPage(null, 10)).posts.map((p) => p.id)).toEqual([1]);
      expect(await feed.getPost(2)).toBeNull();
    });

    it('throws NotFoundError for an unknown post', async () => {
      await expect(writes.deletePost(404)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deactivateUser', () => {
    it('drops the user from cached feeds and sessions', async () => {
      const identity = new IdentityService(cache, store, { verify: () => Promise.resolve(null) }, { identity: 60, login: 300 });
      store.addSession('bob-session', bob.id, new Date(Date.now() + 3_600_000).toISOString());
      store.addPost(alice.id);
      store.addPost(bob.id);
      await feed.getFeedPage(null, 10);
      expect(await identity.resolve('bob-session')).toEqual(bobIdentity);

      await writes.deactivateUser(bob.id);

      expect((await feed.getFeedPage(null, 10)).posts.map((p) => p.id)).toEqual([1]);
      expect(await identity.resolve('bob-session')).toBeNull();
    });

    it('stops serving cached posts of the deactivated user', async () => {
      store.addPost(bob.id);
      expect(await feed.getPost(1)).not.toBeNull();

      await writes.deactivateUser(bob.id);

      expect(await feed.getPost(1)).toBeNull();
    });

    it('throws NotFoundError for an unknown user', async () => {
      await expect(writes.deactivateUser(404)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
