/**
 * Document Source Iterator
 *
 * Lazy, strictly ordered stream of the documents in a range. Ordering is the
 * composite key (timestamp, id), so the last consumed position identifies a
 * resume point exactly: a failed page is retried from the same cursor and a
 * new iterator can start right after a checkpointed position.
 */

import type { DocumentStore, ScrollPage } from '../../core/interfaces/document-store.js';
import type { SortPosition, StoredDocument, TimeRange } from '../../core/types.js';
import { DedupError, SourceUnavailableError } from '../../core/errors.js';
import { compareSortPositions, encodeCursor, positionOf } from '../../core/adapters/cursor.js';
import { withRetry, isRetryableStoreError, type RetryOptions } from '../../utils/retry.js';
import { withTimeout } from '../../utils/timeout.js';
import { yieldToEventLoop } from '../../utils/yield.js';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('source');

export interface SourceIteratorOptions {
  range?: TimeRange;
  pageSize: number;
  /** Resume strictly after this position */
  startAfter?: SortPosition | null;
  /** Per page request */
  timeoutMs: number;
  signal?: AbortSignal;
  retry?: RetryOptions;
}

/** Unknown store errors are worth retrying; our own parameter errors are not */
function isRetryableScrollError(error: Error): boolean {
  return !(error instanceof DedupError) || isRetryableStoreError(error);
}

export class DocumentSourceIterator implements AsyncIterable<StoredDocument> {
  private lastPosition: SortPosition | null;
  private pages = 0;
  private consumed = 0;

  constructor(
    private readonly store: DocumentStore,
    private readonly options: SourceIteratorOptions
  ) {
    this.lastPosition = options.startAfter ?? null;
  }

  /** Last consumed sort position, or the start position if nothing was read yet */
  get position(): SortPosition | null {
    return this.lastPosition;
  }

  get pagesRead(): number {
    return this.pages;
  }

  get documentsRead(): number {
    return this.consumed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StoredDocument> {
    const { signal } = this.options;
    let cursor = this.lastPosition ? encodeCursor(this.lastPosition) : null;

    while (signal?.aborted !== true) {
      const page = await this.fetchPage(cursor);
      this.pages++;

      for (const document of page.documents) {
        if (signal?.aborted === true) return;
        const position = positionOf(document);
        // A store that repeats a row across pages must not make us count it twice
        if (this.lastPosition && compareSortPositions(position, this.lastPosition) <= 0) {
          logger.warn(
            { id: document.id, position: this.lastPosition },
            'Store returned a document out of order, skipping'
          );
          continue;
        }
        this.lastPosition = position;
        this.consumed++;
        yield document;
      }

      if (page.nextCursor === null) return;
      cursor = page.nextCursor;

      // Synchronous stores resolve pages without ever reaching the event loop
      await yieldToEventLoop();
    }
  }

  private async fetchPage(cursor: string | null): Promise<ScrollPage> {
    const { range, pageSize, timeoutMs, signal, retry } = this.options;
    try {
      return await withRetry(
        () => withTimeout(this.store.scroll({ range, pageSize }, cursor), timeoutMs, 'scroll'),
        {
          ...retry,
          retryableErrors: isRetryableScrollError,
          signal,
          onRetry: (error, attempt) => {
            logger.debug(
              { error: error.message, attempt, position: this.lastPosition },
              'Scroll failed, retrying from the same cursor'
            );
          },
        }
      );
    } catch (error) {
      if (error instanceof DedupError && !isRetryableStoreError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(`Document store unavailable: ${message}`, this.lastPosition, {
        pagesRead: this.pages,
      });
    }
  }
}
