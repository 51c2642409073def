/**
 * SQLite Document Store Adapter
 *
 * better-sqlite3 + Drizzle implementation of DocumentStore.
 *
 * Design: keyset pagination on (ts, id) so a cursor never skips or repeats a
 * row even when rows before it are deleted between pages. Sync SQLite calls
 * are wrapped in Promise.resolve() for interface compatibility.
 */

import { and, asc, eq, gt, gte, lt, max, min, or, sql, type SQL } from 'drizzle-orm';
import type { DocumentStore, ScrollPage, ScrollQuery } from '../interfaces/document-store.js';
import type { DocumentId, StoredDocument, TimeRange } from '../types.js';
import { documents, type DocumentRow, type NewDocumentRow } from '../../db/schema.js';
import type { SQLiteConnection } from '../../db/factory.js';
import { decodeCursor, encodeCursor, positionOf } from './cursor.js';

const INSERT_CHUNK_SIZE = 500;

function toDocument(row: DocumentRow): StoredDocument {
  return { id: row.id, timestamp: row.timestamp, fields: row.body };
}

export class SqliteDocumentStore implements DocumentStore {
  constructor(private readonly connection: SQLiteConnection) {}

  async scroll(query: ScrollQuery, cursor: string | null): Promise<ScrollPage> {
    const conditions: SQL[] = [];

    if (query.range?.from !== undefined) {
      conditions.push(gte(documents.timestamp, query.range.from));
    }
    if (query.range?.to !== undefined) {
      conditions.push(lt(documents.timestamp, query.range.to));
    }
    if (cursor !== null) {
      const after = decodeCursor(cursor);
      const afterCondition = or(
        gt(documents.timestamp, after.timestamp),
        and(eq(documents.timestamp, after.timestamp), gt(documents.id, after.id))
      );
      if (afterCondition) conditions.push(afterCondition);
    }

    // One extra row tells us whether another page exists
    const rows = this.connection.db
      .select()
      .from(documents)
      .where(and(...conditions))
      .orderBy(asc(documents.timestamp), asc(documents.id))
      .limit(query.pageSize + 1)
      .all();

    const hasMore = rows.length > query.pageSize;
    const page = rows.slice(0, query.pageSize).map(toDocument);
    const last = page[page.length - 1];

    return Promise.resolve({
      documents: page,
      nextCursor: hasMore && last ? encodeCursor(positionOf(last)) : null,
    });
  }

  async delete(id: DocumentId): Promise<boolean> {
    const result = this.connection.db.delete(documents).where(eq(documents.id, id)).run();
    return Promise.resolve(result.changes > 0);
  }

  async getById(id: DocumentId): Promise<StoredDocument | null> {
    const row = this.connection.db.select().from(documents).where(eq(documents.id, id)).get();
    return Promise.resolve(row ? toDocument(row) : null);
  }

  async getTimeRange(): Promise<Required<TimeRange> | null> {
    const bounds = this.connection.db
      .select({ from: min(documents.timestamp), to: max(documents.timestamp) })
      .from(documents)
      .get();

    if (!bounds || bounds.from === null || bounds.to === null) return Promise.resolve(null);
    return Promise.resolve({ from: bounds.from, to: bounds.to + 1 });
  }

  /**
   * Insert or replace documents in chunked transactions
   *
   * @returns number of rows written
   */
  async insertMany(input: StoredDocument[]): Promise<number> {
    const rows: NewDocumentRow[] = input.map((d) => ({
      id: d.id,
      timestamp: d.timestamp,
      body: d.fields,
    }));

    const writeChunk = this.connection.sqlite.transaction((chunk: NewDocumentRow[]) => {
      this.connection.db
        .insert(documents)
        .values(chunk)
        .onConflictDoUpdate({
          target: documents.id,
          set: { timestamp: sql`excluded.ts`, body: sql`excluded.body` },
        })
        .run();
    });

    for (let offset = 0; offset < rows.length; offset += INSERT_CHUNK_SIZE) {
      writeChunk(rows.slice(offset, offset + INSERT_CHUNK_SIZE));
    }
    return Promise.resolve(rows.length);
  }

  async count(): Promise<number> {
    const row = this.connection.db
      .select({ count: sql<number>`count(*)` })
      .from(documents)
      .get();
    return Promise.resolve(row?.count ?? 0);
  }

  async close(): Promise<void> {
    if (this.connection.sqlite.open) {
      this.connection.sqlite.close();
    }
  }
}
