/**
 * Eliminator
 *
 * Applies elimination records. Dry-run only writes the audit entry; live mode
 * deletes every removed id on its own, so one rejected delete is recorded in
 * the outcome and never stops the rest of the group or other groups.
 */

import type { DocumentStore } from '../../core/interfaces/document-store.js';
import type {
  AuditEntry,
  DeleteFailure,
  DocumentId,
  EliminationOutcome,
  EliminationRecord,
  ScanMode,
} from '../../core/types.js';
import { DedupError, DeleteFailedError } from '../../core/errors.js';
import { withRetry, isRetryableStoreError, type RetryOptions } from '../../utils/retry.js';
import { withTimeout } from '../../utils/timeout.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { AuditSink } from './audit-log.js';

const logger = createComponentLogger('eliminator');

export interface EliminatorOptions {
  mode: ScanMode;
  /** Per delete call */
  timeoutMs: number;
  /** Records applied in parallel */
  concurrency: number;
  retry?: RetryOptions;
}

export interface PendingElimination {
  record: EliminationRecord;
  verified: boolean;
}

export class Eliminator {
  constructor(
    private readonly store: DocumentStore,
    private readonly sink: AuditSink,
    private readonly options: EliminatorOptions
  ) {}

  /**
   * Apply one record and append its audit entry.
   */
  async apply(pending: PendingElimination, windowIndex: number): Promise<AuditEntry> {
    const { record, verified } = pending;
    const outcome = this.options.mode === 'live' ? await this.deleteAll(record.removed) : null;

    const entry: AuditEntry = {
      record,
      mode: this.options.mode,
      windowIndex,
      verified,
      outcome,
      recordedAt: new Date().toISOString(),
    };
    await this.sink.append(entry);

    if (outcome && outcome.failed.length > 0) {
      logger.warn(
        { fingerprint: record.fingerprint, failed: outcome.failed.map((f) => f.id) },
        'Some duplicates could not be deleted'
      );
    }
    return entry;
  }

  /**
   * Apply records in batches of `concurrency`. Every record of a batch runs
   * to completion before a failure (an audit write) is rethrown.
   */
  async applyAll(
    pending: readonly PendingElimination[],
    windowIndex: number
  ): Promise<AuditEntry[]> {
    const entries: AuditEntry[] = [];
    const batchSize = Math.max(1, this.options.concurrency);

    for (let offset = 0; offset < pending.length; offset += batchSize) {
      const batch = pending.slice(offset, offset + batchSize);
      const results = await Promise.allSettled(batch.map((p) => this.apply(p, windowIndex)));

      let firstError: unknown;
      for (const result of results) {
        if (result.status === 'fulfilled') {
          entries.push(result.value);
        } else if (firstError === undefined) {
          firstError = result.reason;
        }
      }
      if (firstError !== undefined) throw firstError;
    }
    return entries;
  }

  private async deleteAll(ids: readonly DocumentId[]): Promise<EliminationOutcome> {
    const deleted: DocumentId[] = [];
    const failed: DeleteFailure[] = [];

    for (const id of ids) {
      const error = await this.deleteOne(id);
      if (error) {
        failed.push({ id, reason: error.message, code: error.code });
      } else {
        deleted.push(id);
      }
    }
    return { deleted, failed };
  }

  private async deleteOne(id: DocumentId): Promise<DeleteFailedError | null> {
    const { timeoutMs, retry } = this.options;
    try {
      const removed = await withRetry(
        () => withTimeout(this.store.delete(id), timeoutMs, 'delete'),
        { ...retry, retryableErrors: isRetryableStoreError }
      );
      return removed ? null : new DeleteFailedError(id, 'store reported nothing deleted');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const code = error instanceof DedupError ? error.code : undefined;
      return new DeleteFailedError(id, reason, { cause: code });
    }
  }
}
