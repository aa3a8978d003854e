/**
 * Feed cursors are the keyset position of the last post on a page,
 * serialized as base64url JSON so clients treat them as opaque.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { CursorPosition, Post } from '../types/feed.types.js';

const CursorSchema = z.object({
  t: z.string().datetime({ offset: true }),
  i: z.number().int().positive(),
});

export function encodeCursor(position: CursorPosition): string {
  return Buffer.from(JSON.stringify({ t: position.createdAt, i: position.id })).toString('base64url');
}

export function cursorAfter(post: Pick<Post, 'createdAt' | 'id'>): string {
  return encodeCursor({ createdAt: post.createdAt, id: post.id });
}

/**
 * @throws {ValidationError} When the cursor was not produced by encodeCursor
 */
export function decodeCursor(cursor: string): CursorPosition {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw new ValidationError('Malformed feed cursor');
  }

  const parsed = CursorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Malformed feed cursor');
  }
  return { createdAt: parsed.data.t, id: parsed.data.i };
}
