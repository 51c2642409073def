/**
 * Database Schema
 *
 * The SQLite document store keeps one row per document: the ordering
 * timestamp in its own indexed column and the field values as JSON.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { FieldValue } from '../core/types.js';

export const documents = sqliteTable(
  'documents',
  {
    id: text('id').primaryKey(),
    timestamp: integer('ts').notNull(),
    body: text('body', { mode: 'json' }).$type<Record<string, FieldValue>>().notNull(),
  },
  (table) => [
    // Keyset pagination walks (ts, id)
    index('idx_documents_ts_id').on(table.timestamp, table.id),
  ]
);

export type DocumentRow = typeof documents.$inferSelect;
export type NewDocumentRow = typeof documents.$inferInsert;

/**
 * DDL applied on open. Mirrors the table definition above.
 */
export const DOCUMENTS_DDL = `
  CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    ts INTEGER NOT NULL,
    body TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_documents_ts_id ON documents(ts, id);
`;
