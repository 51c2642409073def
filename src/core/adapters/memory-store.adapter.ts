/**
 * Memory Document Store Adapter
 *
 * In-process DocumentStore over a sorted array. Used by tests and small
 * fixtures; it follows the same (timestamp, id) ordering and cursor contract
 * as the SQLite adapter.
 */

import type { DocumentStore, ScrollPage, ScrollQuery } from '../interfaces/document-store.js';
import type { DocumentId, StoredDocument, TimeRange } from '../types.js';
import { compareSortPositions, decodeCursor, encodeCursor, positionOf } from './cursor.js';

function inRange(document: StoredDocument, range: TimeRange | undefined): boolean {
  if (!range) return true;
  if (range.from !== undefined && document.timestamp < range.from) return false;
  if (range.to !== undefined && document.timestamp >= range.to) return false;
  return true;
}

export class MemoryDocumentStore implements DocumentStore {
  private documents: StoredDocument[] = [];
  private readonly byId = new Map<DocumentId, StoredDocument>();

  constructor(initial: StoredDocument[] = []) {
    this.insertMany(initial);
  }

  /**
   * Insert or replace documents. Stored copies are detached from the input.
   */
  insertMany(documents: StoredDocument[]): void {
    for (const document of documents) {
      const copy = structuredClone(document);
      if (this.byId.has(copy.id)) {
        this.documents = this.documents.filter((d) => d.id !== copy.id);
      }
      this.byId.set(copy.id, copy);
      this.documents.push(copy);
    }
    this.documents.sort((a, b) => compareSortPositions(positionOf(a), positionOf(b)));
  }

  get size(): number {
    return this.documents.length;
  }

  has(id: DocumentId): boolean {
    return this.byId.has(id);
  }

  ids(): DocumentId[] {
    return this.documents.map((d) => d.id);
  }

  async scroll(query: ScrollQuery, cursor: string | null): Promise<ScrollPage> {
    const after = cursor === null ? null : decodeCursor(cursor);
    const page: StoredDocument[] = [];
    let exhausted = true;

    for (const document of this.documents) {
      if (after && compareSortPositions(positionOf(document), after) <= 0) continue;
      if (!inRange(document, query.range)) continue;
      if (page.length === query.pageSize) {
        exhausted = false;
        break;
      }
      page.push(structuredClone(document));
    }

    const last = page[page.length - 1];
    return Promise.resolve({
      documents: page,
      nextCursor: exhausted || !last ? null : encodeCursor(positionOf(last)),
    });
  }

  async delete(id: DocumentId): Promise<boolean> {
    if (!this.byId.delete(id)) return Promise.resolve(false);
    this.documents = this.documents.filter((d) => d.id !== id);
    return Promise.resolve(true);
  }

  async getById(id: DocumentId): Promise<StoredDocument | null> {
    const document = this.byId.get(id);
    return Promise.resolve(document ? structuredClone(document) : null);
  }

  async getTimeRange(): Promise<Required<TimeRange> | null> {
    const first = this.documents[0];
    const last = this.documents[this.documents.length - 1];
    if (!first || !last) return Promise.resolve(null);
    return Promise.resolve({ from: first.timestamp, to: last.timestamp + 1 });
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
