/**
 * Feed Types
 *
 * Records returned by the relational store and the derived shapes the read
 * path caches. Timestamps are ISO-8601 strings so that every cached value
 * survives a JSON round trip unchanged.
 */

// =============================================================================
// Store Records
// =============================================================================

export const ACCEPTED_IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/gif'] as const;

export type ImageMimeType = (typeof ACCEPTED_IMAGE_MIME_TYPES)[number];

/** 0 = normal user, 1 = administrator */
export type Authority = 0 | 1;

export interface UserRecord {
  id: number;
  accountName: string;
  active: boolean;
  authority: Authority;
}

export interface UserIdentity {
  id: number;
  accountName: string;
  authority: Authority;
}

export interface AuthorSummary {
  id: number;
  accountName: string;
}

export interface Post {
  id: number;
  userId: number;
  createdAt: string;
  /** Images live in the post row, so this equals `id` when present */
  imageId: number | null;
  mime: ImageMimeType | null;
  body: string | null;
}

export interface Comment {
  id: number;
  postId: number;
  userId: number;
  createdAt: string;
  body: string;
}

export interface CommentWithAuthor extends Comment {
  author: AuthorSummary;
}

export interface SessionRecord {
  token: string;
  userId: number;
  expiresAt: string;
}

export interface ImageRecord {
  mime: ImageMimeType;
  data: Buffer;
}

export interface UserStats {
  postCount: number;
  commentCount: number;
  /** Comments other users left on this user's posts */
  commentedCount: number;
}

// =============================================================================
// Derived Read Models
// =============================================================================

export interface EnrichedPost extends Post {
  author: AuthorSummary;
  commentCount: number;
  /** Most recent comments, oldest first */
  recentComments: CommentWithAuthor[];
  /** True when comment enrichment failed and defaults were substituted */
  degraded: boolean;
}

export interface FeedPage {
  posts: EnrichedPost[];
  /** Cursor for the next page, null when this page was the last */
  nextCursor: string | null;
  degraded: boolean;
}

export interface UserProfile {
  user: AuthorSummary;
  postCount: number;
  commentCount: number;
  commentedCount: number;
}

/**
 * Keyset position of the last post on a page.
 */
export interface CursorPosition {
  createdAt: string;
  id: number;
}

// =============================================================================
// Write Inputs
// =============================================================================

export interface NewPostInput {
  mime: string;
  data: Buffer;
  body?: string | null;
}

export interface NewCommentInput {
  postId: number;
  body: string;
}
