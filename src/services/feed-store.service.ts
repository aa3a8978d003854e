/**
 * Feed Store Service
 *
 * Every statement the read path issues against the relational store.
 * Bulk operations take a set of ids and answer in one round trip each
 * (`= ANY($1)` plus a window function for the per-post comment preview).
 *
 * Expected schema and indexes: sql/schema.sql
 */

import type { ConnectionManager, QueryParam } from './database.service.js';
import { createServiceLogger } from './logger.service.js';
import {
  ACCEPTED_IMAGE_MIME_TYPES,
  type Authority,
  type AuthorSummary,
  type Comment,
  type CommentWithAuthor,
  type CursorPosition,
  type ImageMimeType,
  type ImageRecord,
  type Post,
  type SessionRecord,
  type UserRecord,
  type UserStats,
} from '../types/feed.types.js';

const logger = createServiceLogger('feed-store');

// =============================================================================
// Store Contract
// =============================================================================

export interface PostWindowQuery {
  /** Only posts strictly after this keyset position (newest first) */
  after: CursorPosition | null;
  limit: number;
  /** Restrict to one author */
  userId?: number;
}

export interface InsertPostInput {
  userId: number;
  mime: ImageMimeType;
  data: Buffer;
  body: string | null;
}

export interface InsertCommentInput {
  postId: number;
  userId: number;
  body: string;
}

export interface FeedStore {
  /** Next window of posts by active authors, newest first (created_at DESC, id DESC) */
  fetchPostWindow(query: PostWindowQuery): Promise<Post[]>;
  /** Posts by id whose author is active, in no particular order */
  fetchPostsByIds(postIds: number[]): Promise<Post[]>;
  fetchAuthors(userIds: number[]): Promise<AuthorSummary[]>;
  fetchCommentCounts(postIds: number[]): Promise<Map<number, number>>;
  /** The `perPost` most recent comments of each post, oldest first within a post */
  fetchRecentComments(postIds: number[], perPost: number): Promise<CommentWithAuthor[]>;
  /** Minimal image projection: MIME type and bytes only */
  fetchImage(imageId: number): Promise<ImageRecord | null>;

  findSession(token: string): Promise<SessionRecord | null>;
  findUserById(userId: number): Promise<UserRecord | null>;
  findUserByAccountName(accountName: string): Promise<UserRecord | null>;
  fetchUserStats(userId: number): Promise<UserStats>;
  /** Any post regardless of author state */
  findPost(postId: number): Promise<Post | null>;
  findPostIdsByUser(userId: number): Promise<number[]>;

  insertPost(input: InsertPostInput): Promise<Post>;
  insertComment(input: InsertCommentInput): Promise<Comment>;
  deletePost(postId: number): Promise<Post | null>;
  setUserActive(userId: number, active: boolean): Promise<boolean>;
  /** Restore the benchmark baseline data set */
  resetToBaseline(): Promise<void>;
}

// =============================================================================
// Row Types
// =============================================================================

interface PostRow {
  id: number;
  user_id: number;
  body: string | null;
  mime: string | null;
  /** UTC ISO-8601 with microseconds, see POST_COLUMNS */
  created_at: string;
  has_image: boolean;
}

interface UserRow {
  id: number;
  account_name: string;
  authority: number;
  del_flg: number;
}

interface CommentRow {
  id: number;
  post_id: number;
  user_id: number;
  comment: string;
  created_at: Date;
}

interface CommentWithAuthorRow extends CommentRow {
  account_name: string;
}

interface CountRow {
  post_id: number;
  comment_count: number;
}

interface ImageRow {
  mime: string;
  imgdata: Buffer;
}

interface SessionRow {
  token: string;
  user_id: number;
  expires_at: Date;
}

interface StatsRow {
  post_count: number;
  comment_count: number;
  commented_count: number;
}

// =============================================================================
// Row Mapping
// =============================================================================

export function toImageMime(value: string | null): ImageMimeType | null {
  return ACCEPTED_IMAGE_MIME_TYPES.find((mime) => mime === value) ?? null;
}

function toAuthority(value: number): Authority {
  return value === 1 ? 1 : 0;
}

function mapPost(row: PostRow): Post {
  return {
    id: row.id,
    userId: row.user_id,
    createdAt: row.created_at,
    imageId: row.has_image ? row.id : null,
    mime: toImageMime(row.mime),
    body: row.body,
  };
}

function mapUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    accountName: row.account_name,
    active: row.del_flg === 0,
    authority: toAuthority(row.authority),
  };
}

function mapComment(row: CommentRow): Comment {
  return {
    id: row.id,
    postId: row.post_id,
    userId: row.user_id,
    createdAt: row.created_at.toISOString(),
    body: row.comment,
  };
}

// =============================================================================
// SQL
// =============================================================================

// created_at leaves the database as text: a JS Date keeps milliseconds only,
// and a truncated keyset position would skip rows on the next page.
const POST_CREATED_AT = `to_char(p.created_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS created_at`;

const POST_COLUMNS = `p.id, p.user_id, p.body, p.mime, ${POST_CREATED_AT}, (p.imgdata IS NOT NULL) AS has_image`;

const AUTHORS_SQL = `
  SELECT id, account_name
  FROM users
  WHERE id = ANY($1::int[])
`;

const COMMENT_COUNTS_SQL = `
  SELECT post_id, COUNT(*)::int AS comment_count
  FROM comments
  WHERE post_id = ANY($1::int[])
  GROUP BY post_id
`;

const RECENT_COMMENTS_SQL = `
  SELECT id, post_id, user_id, account_name, comment, created_at
  FROM (
    SELECT
      c.id, c.post_id, c.user_id, u.account_name, c.comment, c.created_at,
      ROW_NUMBER() OVER (PARTITION BY c.post_id ORDER BY c.created_at DESC, c.id DESC) AS rn
    FROM comments c
    JOIN users u ON u.id = c.user_id
    WHERE c.post_id = ANY($1::int[])
  ) ranked
  WHERE rn <= $2
  ORDER BY post_id, created_at ASC, id ASC
`;

const USER_STATS_SQL = `
  SELECT
    (SELECT COUNT(*) FROM posts WHERE user_id = $1)::int AS post_count,
    (SELECT COUNT(*) FROM comments WHERE user_id = $1)::int AS comment_count,
    (SELECT COUNT(*) FROM comments WHERE post_id IN (SELECT id FROM posts WHERE user_id = $1))::int AS commented_count
`;

const BASELINE_SQL = [
  'DELETE FROM sessions',
  'DELETE FROM comments WHERE id > 100000',
  'DELETE FROM posts WHERE id > 10000',
  'DELETE FROM users WHERE id > 1000',
  'UPDATE users SET del_flg = 0',
  'UPDATE users SET del_flg = 1 WHERE id % 50 = 0',
];

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

export class PgFeedStore implements FeedStore {
  constructor(private readonly db: ConnectionManager) {}

  async fetchPostWindow(query: PostWindowQuery): Promise<Post[]> {
    const params: QueryParam[] = [];
    const conditions: string[] = [];

    if (query.after) {
      params.push(query.after.createdAt, query.after.id);
      conditions.push(`(p.created_at, p.id) < ($${params.length - 1}::timestamptz, $${params.length}::int)`);
    }
    if (query.userId !== undefined) {
      params.push(query.userId);
      conditions.push(`p.user_id = $${params.length}`);
    }
    params.push(query.limit);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.db.query<PostRow>(
      `SELECT ${POST_COLUMNS}
       FROM posts p
       JOIN users u ON u.id = p.user_id AND u.del_flg = 0
       ${where}
       ORDER BY p.created_at DESC, p.id DESC
       LIMIT $${params.length}`,
      params
    );
    return rows.map(mapPost);
  }

  async fetchPostsByIds(postIds: number[]): Promise<Post[]> {
    if (postIds.length === 0) return [];
    const rows = await this.db.query<PostRow>(
      `SELECT ${POST_COLUMNS}
       FROM posts p
       JOIN users u ON u.id = p.user_id AND u.del_flg = 0
       WHERE p.id = ANY($1::int[])`,
      [postIds]
    );
    return rows.map(mapPost);
  }

  async fetchAuthors(userIds: number[]): Promise<AuthorSummary[]> {
    if (userIds.length === 0) return [];
    const rows = await this.db.query<Pick<UserRow, 'id' | 'account_name'>>(AUTHORS_SQL, [userIds]);
    return rows.map((row) => ({ id: row.id, accountName: row.account_name }));
  }

  async fetchCommentCounts(postIds: number[]): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    if (postIds.length === 0) return counts;
    const rows = await this.db.query<CountRow>(COMMENT_COUNTS_SQL, [postIds]);
    for (const row of rows) {
      counts.set(row.post_id, row.comment_count);
    }
    return counts;
  }

  async fetchRecentComments(postIds: number[], perPost: number): Promise<CommentWithAuthor[]> {
    if (postIds.length === 0) return [];
    const rows = await this.db.query<CommentWithAuthorRow>(RECENT_COMMENTS_SQL, [postIds, perPost]);
    return rows.map((row) => ({
      ...mapComment(row),
      author: { id: row.user_id, accountName: row.account_name },
    }));
  }

  async fetchImage(imageId: number): Promise<ImageRecord | null> {
    const rows = await this.db.query<ImageRow>(
      'SELECT mime, imgdata FROM posts WHERE id = $1 AND imgdata IS NOT NULL',
      [imageId]
    );
    const row = rows[0];
    if (!row) return null;
    const mime = toImageMime(row.mime);
    return mime ? { mime, data: row.imgdata } : null;
  }

  async findSession(token: string): Promise<SessionRecord | null> {
    const rows = await this.db.query<SessionRow>(
      'SELECT token, user_id, expires_at FROM sessions WHERE token = $1 AND expires_at > NOW()',
      [token]
    );
    const row = rows[0];
    return row ? { token: row.token, userId: row.user_id, expiresAt: row.expires_at.toISOString() } : null;
  }

  async findUserById(userId: number): Promise<UserRecord | null> {
    const rows = await this.db.query<UserRow>(
      'SELECT id, account_name, authority, del_flg FROM users WHERE id = $1',
      [userId]
    );
    const row = rows[0];
    return row ? mapUser(row) : null;
  }

  async findUserByAccountName(accountName: string): Promise<UserRecord | null> {
    const rows = await this.db.query<UserRow>(
      'SELECT id, account_name, authority, del_flg FROM users WHERE account_name = $1',
      [accountName]
    );
    const row = rows[0];
    return row ? mapUser(row) : null;
  }

  async fetchUserStats(userId: number): Promise<UserStats> {
    const rows = await this.db.query<StatsRow>(USER_STATS_SQL, [userId]);
    const row = rows[0];
    return {
      postCount: row?.post_count ?? 0,
      commentCount: row?.comment_count ?? 0,
      commentedCount: row?.commented_count ?? 0,
    };
  }

  async findPost(postId: number): Promise<Post | null> {
    const rows = await this.db.query<PostRow>(`SELECT ${POST_COLUMNS} FROM posts p WHERE p.id = $1`, [postId]);
    const row = rows[0];
    return row ? mapPost(row) : null;
  }

  async findPostIdsByUser(userId: number): Promise<number[]> {
    const rows = await this.db.query<{ id: number }>('SELECT id FROM posts WHERE user_id = $1', [userId]);
    return rows.map((row) => row.id);
  }

  async insertPost(input: InsertPostInput): Promise<Post> {
    const rows = await this.db.query<PostRow>(
      `INSERT INTO posts AS p (user_id, mime, imgdata, body)
       VALUES ($1, $2, $3, $4)
       RETURNING ${POST_COLUMNS}`,
      [input.userId, input.mime, input.data, input.body]
    );
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO posts returned no row');
    }
    return mapPost(row);
  }

  async insertComment(input: InsertCommentInput): Promise<Comment> {
    const rows = await this.db.query<CommentRow>(
      `INSERT INTO comments (post_id, user_id, comment)
       VALUES ($1, $2, $3)
       RETURNING id, post_id, user_id, comment, created_at`,
      [input.postId, input.userId, input.body]
    );
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO comments returned no row');
    }
    return mapComment(row);
  }

  async deletePost(postId: number): Promise<Post | null> {
    return this.db.withConnection(async (connection) => {
      await connection.query('BEGIN');
      try {
        await connection.query('DELETE FROM comments WHERE post_id = $1', [postId]);
        const result = await connection.query<PostRow>(
          `DELETE FROM posts AS p WHERE p.id = $1 RETURNING ${POST_COLUMNS}`,
          [postId]
        );
        await connection.query('COMMIT');
        const row = result.rows[0];
        return row ? mapPost(row) : null;
      } catch (error) {
        await connection.query('ROLLBACK').catch((rollbackError: unknown) => {
          logger.warn({ err: rollbackError, postId }, 'Rollback of post deletion failed');
        });
        throw error;
      }
    });
  }

  async setUserActive(userId: number, active: boolean): Promise<boolean> {
    const rows = await this.db.query<{ id: number }>(
      'UPDATE users SET del_flg = $2 WHERE id = $1 RETURNING id',
      [userId, active ? 0 : 1]
    );
    return rows.length > 0;
  }

  async resetToBaseline(): Promise<void> {
    await this.db.withConnection(async (connection) => {
      for (const sql of BASELINE_SQL) {
        await connection.query(sql);
      }
    });
  }
}
