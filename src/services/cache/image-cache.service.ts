/**
 * Image Cache Service
 *
 * Serves post images (MIME type + bytes). Images never change after their
 * post is written, so entries live for the long image TTL. Ids with no image
 * get a short-lived negative marker.
 */

import { createServiceLogger } from '../logger.service.js';
import { NotFoundError } from '../errors.js';
import { CacheKeys, type CachedImage, type CachedImageEntry } from './cache.types.js';
import type { CacheService } from './cache.service.js';
import type { TtlSettings } from '../config.service.js';
import type { FeedStore } from '../feed-store.service.js';
import type { ImageMimeType, Post } from '../../types/feed.types.js';

const logger = createServiceLogger('image-cache');

const EXTENSION_BY_MIME: Record<ImageMimeType, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
};

/**
 * File extension served for a MIME type.
 */
export function imageExtension(mime: ImageMimeType): string {
  return EXTENSION_BY_MIME[mime];
}

/**
 * Public path of a post's image, e.g. `/image/42.png`. Null for posts without one.
 */
export function imagePath(post: Pick<Post, 'imageId' | 'mime'>): string | null {
  if (post.imageId === null || post.mime === null) {
    return null;
  }
  return `/image/${post.imageId}.${imageExtension(post.mime)}`;
}

export class ImageCacheService {
  constructor(
    private readonly cache: CacheService,
    private readonly store: FeedStore,
    private readonly ttl: Pick<TtlSettings, 'image' | 'imageMiss'>
  ) {}

  /**
   * Image bytes for an id. When `ext` is given it must match the stored type.
   */
  async getImage(imageId: number, ext?: string): Promise<CachedImage | null> {
    if (!Number.isInteger(imageId) || imageId <= 0) {
      return null;
    }

    const image = await this.load(imageId);
    if (!image) {
      return null;
    }

    if (ext !== undefined && ext !== imageExtension(image.mimeType)) {
      logger.debug({ imageId, ext, mimeType: image.mimeType }, 'Image extension mismatch');
      return null;
    }

    return image;
  }

  /**
   * @throws {NotFoundError} When there is no such image
   */
  async requireImage(imageId: number, ext?: string): Promise<CachedImage> {
    const image = await this.getImage(imageId, ext);
    if (!image) {
      throw new NotFoundError('image', imageId);
    }
    return image;
  }

  async invalidateImage(imageId: number): Promise<void> {
    await this.cache.invalidate(CacheKeys.image(imageId));
  }

  private async load(imageId: number): Promise<CachedImage | null> {
    const key = CacheKeys.image(imageId);

    const cached = await this.cache.get<CachedImageEntry>(key);
    if (cached) {
      return cached.found ? { mimeType: cached.mimeType, data: Buffer.from(cached.data, 'base64') } : null;
    }

    const fence = this.cache.openFence();
    const record = await this.store.fetchImage(imageId);

    if (!record) {
      const marker: CachedImageEntry = { found: false };
      await this.cache.set(key, marker, this.ttl.imageMiss, { fence });
      return null;
    }

    const entry: CachedImageEntry = { found: true, mimeType: record.mime, data: record.data.toString('base64') };
    await this.cache.set(key, entry, this.ttl.image, { fence });
    logger.debug({ imageId, bytes: record.data.length }, 'Image cached');
    return { mimeType: record.mime, data: record.data };
  }
}
