/**
 * Scroll cursor codec
 *
 * Cursors are base64url-encoded JSON holding the last returned sort position.
 * Stores decode them to continue strictly after that position; the source
 * iterator encodes a checkpointed position to resume a scroll.
 */

import { z } from 'zod';
import { createInvalidParameterError } from '../errors.js';
import type { SortPosition, StoredDocument } from '../types.js';

const cursorSchema = z.object({
  t: z.number().finite(),
  id: z.string(),
});

export function encodeCursor(position: SortPosition): string {
  const json = JSON.stringify({ t: position.timestamp, id: position.id });
  return Buffer.from(json).toString('base64url');
}

/**
 * Decode a cursor
 *
 * @throws DedupError (E1001) if the cursor is malformed
 */
export function decodeCursor(cursor: string): SortPosition {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw createInvalidParameterError('cursor', 'not base64url-encoded JSON');
  }

  const result = cursorSchema.safeParse(parsed);
  if (!result.success) {
    throw createInvalidParameterError('cursor', 'missing sort position');
  }
  return { timestamp: result.data.t, id: result.data.id };
}

/**
 * Order ids by their UTF-8 bytes, which is how SQLite's BINARY collation
 * orders TEXT. UTF-16 code unit order differs beyond the BMP.
 */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Order two positions by (timestamp, id).
 */
export function compareSortPositions(a: SortPosition, b: SortPosition): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  return compareIds(a.id, b.id);
}

export function positionOf(document: StoredDocument): SortPosition {
  return { timestamp: document.timestamp, id: document.id };
}
