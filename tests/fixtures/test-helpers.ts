import type {
  DocumentStore,
  ScrollPage,
  ScrollQuery,
} from '../../src/core/interfaces/document-store.js';
import type { DocumentId, FieldValue, StoredDocument, TimeRange } from '../../src/core/types.js';
import type { ScanOptions } from '../../src/config/scan-options.js';
import type { RetryOptions } from '../../src/utils/retry.js';
import { MemoryDocumentStore } from '../../src/core/adapters/memory-store.adapter.js';

export function doc(
  id: string,
  timestamp: number,
  fields: Record<string, FieldValue>
): StoredDocument {
  return { id, timestamp, fields };
}

/** Complete scan options with small, test-friendly defaults */
export function scanOptions(overrides: Partial<ScanOptions> = {}): ScanOptions {
  return {
    fields: ['title'],
    hashAlgorithm: 'sha256',
    windowLengthMs: undefined,
    overlapMs: undefined,
    range: {},
    mode: 'dryRun',
    verify: false,
    verifyIgnoreFields: [],
    tieBreak: 'smallestId',
    pageSize: 100,
    deleteConcurrency: 2,
    maxIndexEntries: 0,
    storeTimeoutMs: 1000,
    ...overrides,
  };
}

/** Retries without real waiting */
export const FAST_RETRY: RetryOptions = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2 };

/**
 * Corpus where every title appears twice, `skewMs` apart, one pair every
 * `spacingMs`. Ids sort in time order: d00000a, d00000b, d00001a, ...
 */
export function pairedCorpus(pairs: number, spacingMs: number, skewMs: number): StoredDocument[] {
  const documents: StoredDocument[] = [];
  for (let i = 0; i < pairs; i++) {
    const n = String(i).padStart(5, '0');
    const title = `story-${n}`;
    documents.push(doc(`d${n}a`, i * spacingMs, { title, n: i }));
    documents.push(doc(`d${n}b`, i * spacingMs + skewMs, { title, n: i }));
  }
  return documents;
}

/**
 * One document per `spacingMs` sharing a single title, the way a heartbeat or
 * a repeated feed item recurs. Ids sort in time order: h00000, h00001, ...
 */
export function recurringCorpus(count: number, spacingMs: number): StoredDocument[] {
  return Array.from({ length: count }, (_, i) =>
    doc(`h${String(i).padStart(5, '0')}`, i * spacingMs, { title: 'heartbeat' })
  );
}

/**
 * Store wrapper that injects failures and records calls.
 */
export class FlakyStore implements DocumentStore {
  scrollCalls = 0;
  /** Fail this many upcoming scroll calls */
  failNextScrolls = 0;
  /** Fail every scroll call after this many have succeeded */
  failScrollsAfter: number | undefined;
  readonly rejectDeletes = new Set<DocumentId>();
  readonly rejectGetById = new Set<DocumentId>();
  readonly deleteCalls: DocumentId[] = [];
  readonly getByIdCalls: DocumentId[] = [];
  /** Runs before every scroll call */
  onScroll: (() => void) | undefined;
  /** Runs before every delete call */
  onDelete: ((id: DocumentId) => void) | undefined;

  constructor(readonly inner: MemoryDocumentStore) {}

  async scroll(query: ScrollQuery, cursor: string | null): Promise<ScrollPage> {
    this.onScroll?.();
    this.scrollCalls++;
    if (this.failNextScrolls > 0) {
      this.failNextScrolls--;
      throw new Error('ECONNREFUSED store unreachable');
    }
    if (this.failScrollsAfter !== undefined && this.scrollCalls > this.failScrollsAfter) {
      throw new Error('ECONNREFUSED store unreachable');
    }
    return this.inner.scroll(query, cursor);
  }

  async delete(id: DocumentId): Promise<boolean> {
    this.onDelete?.(id);
    this.deleteCalls.push(id);
    if (this.rejectDeletes.has(id)) {
      throw new Error('permission denied');
    }
    return this.inner.delete(id);
  }

  async getById(id: DocumentId): Promise<StoredDocument | null> {
    this.getByIdCalls.push(id);
    if (this.rejectGetById.has(id)) {
      throw new Error('ECONNRESET socket closed');
    }
    return this.inner.getById(id);
  }

  async getTimeRange(): Promise<Required<TimeRange> | null> {
    return this.inner.getTimeRange();
  }

  async close(): Promise<void> {
    await this.inner.close();
  }
}
