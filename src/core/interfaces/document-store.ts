/**
 * Document Store Interface
 *
 * The narrow read/delete surface the scanner needs from a document store.
 * Stores sort by the composite key (timestamp, id). Cursors are opaque to the
 * scanner except that a position encoded with encodeCursor() must be accepted,
 * which is how a checkpointed scan resumes.
 */

import type { DocumentId, StoredDocument, TimeRange } from '../types.js';

export interface ScrollQuery {
  /** Half-open [from, to) filter on the document timestamp */
  range?: TimeRange;
  pageSize: number;
}

export interface ScrollPage {
  documents: StoredDocument[];
  /** null once the range is exhausted */
  nextCursor: string | null;
}

export interface DocumentStore {
  /**
   * Read the next page of documents strictly after the cursor position.
   * A null cursor starts at the beginning of the range.
   */
  scroll(query: ScrollQuery, cursor: string | null): Promise<ScrollPage>;

  /**
   * Remove one document.
   * @returns false when the store did not delete it (e.g. already gone)
   */
  delete(id: DocumentId): Promise<boolean>;

  /** Used only in verification mode */
  getById(id: DocumentId): Promise<StoredDocument | null>;

  /** Oldest timestamp and one past the newest, or null when empty */
  getTimeRange?(): Promise<Required<TimeRange> | null>;

  close(): Promise<void>;
}
