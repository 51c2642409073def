/**
 * Deduplication Scanner
 *
 * Drives the pipeline window by window:
 *
 *   source iterator → fingerprint → duplicate index
 *   window end: settled groups → resolution (→ verification) → eliminator
 *   then evict the index down to the trailing overlap, save a checkpoint
 *
 * A group is settled once its newest member is older than `end − overlap`.
 * Only settled groups are resolved, and a resolved group is evicted right
 * away, so a document is resolved exactly once and the windowed result matches
 * a single unbounded pass whenever the overlap covers the real skew.
 *
 * A group still open at a window end that holds members older than one more
 * overlap (a recurring fingerprint) is compacted: a survivor is chosen over
 * the members known so far and pinned, and the older members are eliminated
 * now. Groups whose duplicates all fall within the overlap never qualify.
 *
 * Within one run the next window continues from the last consumed position,
 * so documents of the overlap are not read twice. A resumed run has lost the
 * index: it restores the pinned survivors from the checkpoint and re-reads one
 * overlap before its first window to rebuild the rest; groups that finished
 * before that window are not resolved a second time.
 */

import type { DocumentStore } from '../../core/interfaces/document-store.js';
import type {
  DocumentId,
  DuplicateGroup,
  GroupMember,
  ScanCheckpoint,
  ScanReport,
  SortPosition,
  TimeRange,
  WindowDescriptor,
} from '../../core/types.js';
import {
  CheckpointMismatchError,
  HashCollisionSuspectedError,
  createConfigurationError,
} from '../../core/errors.js';
import type { ScanOptions } from '../../config/scan-options.js';
import type { RetryOptions } from '../../utils/retry.js';
import { withTimeout } from '../../utils/timeout.js';
import { createComponentLogger } from '../../utils/logger.js';
import { createHasher, type Hasher } from './hashers.js';
import { createFingerprintExtractor, type FingerprintExtractor } from './fingerprint.js';
import { DuplicateIndex } from './duplicate-index.js';
import { WindowScheduler, type WindowResumePoint } from './window-scheduler.js';
import { DocumentSourceIterator } from './source-iterator.js';
import { chooseSurvivor, resolveGroup, verifyGroup } from './resolution-policy.js';
import { Eliminator, type PendingElimination } from './eliminator.js';
import { NullAuditSink, type AuditSink } from './audit-log.js';
import { computeConfigHash, type CheckpointStore } from './checkpoint.js';

const logger = createComponentLogger('scanner');

/** An open group to shrink down to its pinned survivor and recent members */
interface Compaction {
  /** The pin and the stale members, resolved like a settled group */
  group: DuplicateGroup;
  pin: GroupMember;
  stale: DocumentId[];
}

interface Resolution {
  pending: PendingElimination[];
  missing: DocumentId[];
}

export interface ScannerDependencies {
  store: DocumentStore;
  auditSink?: AuditSink;
  checkpointStore?: CheckpointStore;
  /** Defaults to the configured algorithm */
  hasher?: Hasher;
  retry?: RetryOptions;
}

export interface ScanRunOptions {
  /** Stop at the next document; deletes already started still complete */
  signal?: AbortSignal;
  /** Continue from the saved checkpoint, if any */
  resume?: boolean;
}

function emptyReport(options: ScanOptions): ScanReport {
  return {
    mode: options.mode,
    windows: 0,
    documentsScanned: 0,
    duplicateGroups: 0,
    records: 0,
    documentsRemoved: 0,
    deleted: 0,
    deleteFailures: 0,
    collisionsSuspected: 0,
    peakIndexEntries: 0,
    groupsCompacted: 0,
    cancelled: false,
    resumedFromWindow: null,
    durationMs: 0,
  };
}

export class DeduplicationScanner {
  private readonly extractor: FingerprintExtractor;
  private readonly sink: AuditSink;
  private readonly eliminator: Eliminator;
  private readonly configHash: string;

  constructor(
    private readonly deps: ScannerDependencies,
    private readonly options: ScanOptions
  ) {
    const hasher = deps.hasher ?? createHasher(options.hashAlgorithm);
    this.extractor = createFingerprintExtractor(options.fields, hasher);
    this.sink = deps.auditSink ?? new NullAuditSink();
    this.eliminator = new Eliminator(deps.store, this.sink, {
      mode: options.mode,
      timeoutMs: options.storeTimeoutMs,
      concurrency: options.deleteConcurrency,
      retry: deps.retry,
    });
    this.configHash = computeConfigHash(options);
  }

  async run(runOptions: ScanRunOptions = {}): Promise<ScanReport> {
    const startedAt = Date.now();
    const { signal } = runOptions;
    const report = emptyReport(this.options);

    const checkpoint = runOptions.resume ? await this.loadCheckpoint() : null;
    if (checkpoint) report.resumedFromWindow = checkpoint.windowIndex;

    const range = checkpoint?.range ?? (await this.resolveRange());
    if (!range) {
      logger.info('Store is empty, nothing to scan');
      await this.deps.checkpointStore?.clear();
      report.durationMs = Date.now() - startedAt;
      return report;
    }

    const resumeFrom: WindowResumePoint | undefined = checkpoint
      ? {
          index: checkpoint.windowIndex,
          start: checkpoint.windowStart,
          windowLengthMs: checkpoint.windowLengthMs,
        }
      : undefined;

    const scheduler = new WindowScheduler({
      range,
      windowLengthMs: this.options.windowLengthMs,
      overlapMs: this.options.overlapMs,
      maxIndexEntries: this.options.maxIndexEntries,
      resumeFrom,
    });
    const index = new DuplicateIndex();
    for (const survivor of checkpoint?.pinned ?? []) {
      index.restorePinned(survivor);
    }

    logger.info(
      {
        mode: this.options.mode,
        fields: this.options.fields,
        range,
        windowLengthMs: scheduler.currentWindowLengthMs,
        overlapMs: scheduler.overlap,
        resumedFromWindow: report.resumedFromWindow,
      },
      'Scan started'
    );

    let lastPosition: SortPosition | null = null;
    // A resumed windowed scan first re-reads the overlap that fed its window
    let rebuildFrom: number | undefined;
    const resumeStart = checkpoint?.windowStart ?? null;
    if (scheduler.windowed && resumeStart !== null && (checkpoint?.windowIndex ?? 0) > 0) {
      rebuildFrom = Math.max(resumeStart - scheduler.overlap, range.from ?? -Infinity);
    }

    for (const window of scheduler.windows()) {
      const readRange: TimeRange = { from: rebuildFrom ?? window.start, to: window.end };
      const iterator: DocumentSourceIterator = new DocumentSourceIterator(this.deps.store, {
        range: readRange,
        pageSize: this.options.pageSize,
        startAfter: rebuildFrom !== undefined ? null : lastPosition,
        timeoutMs: this.options.storeTimeoutMs,
        signal,
        retry: this.deps.retry,
      });
      rebuildFrom = undefined;

      try {
        for await (const document of iterator) {
          report.documentsScanned++;
          index.insert(this.extractor.fingerprint(document), document.id, document.timestamp);
        }
      } catch (error) {
        const position = iterator.position;
        await this.saveCheckpoint(range, window, window.start ?? null, index, scheduler, position);
        throw error;
      }
      lastPosition = iterator.position ?? lastPosition;
      report.peakIndexEntries = Math.max(report.peakIndexEntries, index.peakSize);

      if (signal?.aborted === true) {
        // The window was not fully read; its groups may be incomplete
        report.cancelled = true;
        await this.saveCheckpoint(
          range,
          window,
          window.start ?? null,
          index,
          scheduler,
          lastPosition
        );
        logger.info(
          { window: window.index },
          'Scan cancelled while reading, window left unresolved'
        );
        break;
      }

      const cutoff = scheduler.retentionCutoff(window);
      const groups = [
        ...index.groupsWithDuplicates({ settledBefore: cutoff, newestAtLeast: window.start }),
      ];
      const compactions = this.planCompactions(index, cutoff, cutoff - window.overlapMs);
      const entriesAtEnd = index.size;
      let compacted: number;
      try {
        compacted = await this.resolveAndEliminate(groups, compactions, index, window, report);
      } catch (error) {
        await this.saveCheckpoint(
          range,
          window,
          window.start ?? null,
          index,
          scheduler,
          lastPosition
        );
        throw error;
      }

      const evicted = index.evict(cutoff);
      scheduler.reportIndexSize(entriesAtEnd);
      report.windows++;

      logger.info(
        {
          window: window.index,
          start: window.start,
          end: window.end,
          documents: iterator.documentsRead,
          groups: groups.length,
          compacted,
          evicted,
          retained: index.size,
        },
        'Window complete'
      );

      const nextStart =
        window.isLast || window.end === undefined ? null : window.end - window.overlapMs;
      await this.saveCheckpoint(
        range,
        { ...window, index: window.index + 1 },
        nextStart,
        index,
        scheduler,
        lastPosition
      );

      if (signal?.aborted === true && !window.isLast) {
        report.cancelled = true;
        logger.info({ window: window.index }, 'Scan cancelled after completing window');
        break;
      }
    }

    if (!report.cancelled) {
      await this.deps.checkpointStore?.clear();
    }
    await this.sink.close();

    report.durationMs = Date.now() - startedAt;
    logger.info({ report }, 'Scan finished');
    return report;
  }

  /**
   * Open groups holding members older than `staleBefore`. The survivor is the
   * pinned one, or the rule applied to the members known now.
   */
  private planCompactions(
    index: DuplicateIndex,
    settledBefore: number,
    staleBefore: number
  ): Compaction[] {
    if (!Number.isFinite(settledBefore)) return [];

    const plans: Compaction[] = [];
    for (const group of index.groupsToCompact(settledBefore, staleBefore)) {
      const pin = chooseSurvivor(group.members, this.options.tieBreak, group.pinned);
      const members = group.members.filter((m) => m.id === pin.id || m.timestamp < staleBefore);
      plans.push({
        group: {
          key: group.key,
          members,
          newestTimestamp: Math.max(...members.map((m) => m.timestamp)),
          pinned: pin.id,
        },
        pin,
        stale: members.filter((m) => m.id !== pin.id).map((m) => m.id),
      });
    }
    return plans;
  }

  /**
   * Resolve settled groups and compactions, apply every record as one batch,
   * then shrink the compacted groups.
   *
   * @returns number of groups compacted
   */
  private async resolveAndEliminate(
    groups: readonly DuplicateGroup[],
    compactions: readonly Compaction[],
    index: DuplicateIndex,
    window: WindowDescriptor,
    report: ScanReport
  ): Promise<number> {
    report.duplicateGroups += groups.length;
    const pending: PendingElimination[] = [];

    for (const group of groups) {
      pending.push(...(await this.resolve(group, window, report)).pending);
    }

    const retirements: Array<{ key: string; retire: DocumentId[]; pinned?: DocumentId }> = [];
    for (const compaction of compactions) {
      const { pending: records, missing } = await this.resolve(compaction.group, window, report);
      pending.push(...records);
      // A pin the store no longer has cannot be kept
      const pinGone = missing.includes(compaction.pin.id);
      retirements.push({
        key: compaction.group.key,
        retire: pinGone ? [...compaction.stale, compaction.pin.id] : compaction.stale,
        pinned: pinGone ? undefined : compaction.pin.id,
      });
    }

    const entries = await this.eliminator.applyAll(pending, window.index);
    for (const entry of entries) {
      report.records++;
      report.documentsRemoved += entry.record.removed.length;
      if (entry.outcome) {
        report.deleted += entry.outcome.deleted.length;
        report.deleteFailures += entry.outcome.failed.length;
      }
    }

    for (const { key, retire, pinned } of retirements) {
      index.compact(key, retire, pinned);
    }
    report.groupsCompacted += retirements.length;
    return retirements.length;
  }

  private async resolve(
    group: DuplicateGroup,
    window: WindowDescriptor,
    report: ScanReport
  ): Promise<Resolution> {
    if (group.members.length < 2) return { pending: [], missing: [] };
    if (!this.options.verify) {
      return {
        pending: [{ record: resolveGroup(group, this.options.tieBreak), verified: false }],
        missing: [],
      };
    }

    const result = await verifyGroup(group, this.deps.store, {
      tieBreak: this.options.tieBreak,
      ignoreFields: this.options.verifyIgnoreFields,
      timeoutMs: this.options.storeTimeoutMs,
      retry: this.deps.retry,
    });
    if (result.missing.length > 0) {
      logger.warn(
        { fingerprint: group.key, missing: result.missing },
        'Group members no longer in store'
      );
    }
    if (result.collision) {
      report.collisionsSuspected++;
      const suspected = new HashCollisionSuspectedError(group.key, result.partitions, {
        window: window.index,
      });
      logger.warn(suspected.toJSON(), 'Group split by verification');
    }
    return {
      pending: result.records.map((record) => ({ record, verified: true })),
      missing: result.missing,
    };
  }

  /**
   * The requested range, completed from the store's own bounds when a
   * windowed scan leaves one open. Null when the store holds nothing.
   */
  private async resolveRange(): Promise<TimeRange | null> {
    const { range, windowLengthMs, overlapMs } = this.options;
    const windowed = windowLengthMs !== undefined && overlapMs !== undefined;
    if (!windowed || (range.from !== undefined && range.to !== undefined)) {
      return { ...range };
    }

    const { store } = this.deps;
    if (!store.getTimeRange) {
      throw createConfigurationError(
        'range',
        'windowed scans need range bounds and this store cannot report its time range',
        'set DEDUP_FROM and DEDUP_TO'
      );
    }
    const bounds = await withTimeout(
      store.getTimeRange(),
      this.options.storeTimeoutMs,
      'getTimeRange'
    );
    if (!bounds) return null;

    const resolved = { from: range.from ?? bounds.from, to: range.to ?? bounds.to };
    return resolved.from < resolved.to ? resolved : null;
  }

  private async loadCheckpoint(): Promise<ScanCheckpoint | null> {
    const checkpoint = (await this.deps.checkpointStore?.load()) ?? null;
    if (!checkpoint) return null;
    if (checkpoint.configHash !== this.configHash) {
      throw new CheckpointMismatchError(checkpoint.configHash, this.configHash);
    }
    logger.info({ windowIndex: checkpoint.windowIndex }, 'Resuming from checkpoint');
    return checkpoint;
  }

  private async saveCheckpoint(
    range: TimeRange,
    window: WindowDescriptor,
    windowStart: number | null,
    index: DuplicateIndex,
    scheduler: WindowScheduler,
    position: SortPosition | null
  ): Promise<void> {
    if (!this.deps.checkpointStore) return;
    await this.deps.checkpointStore.save({
      version: 1,
      configHash: this.configHash,
      range,
      windowIndex: window.index,
      windowStart: scheduler.windowed ? windowStart : null,
      windowLengthMs: scheduler.currentWindowLengthMs,
      position,
      pinned: index.pinnedSurvivors(),
      updatedAt: new Date().toISOString(),
    });
  }
}

/**
 * Run one scan with the given dependencies.
 */
export async function runScan(
  deps: ScannerDependencies,
  options: ScanOptions,
  runOptions: ScanRunOptions = {}
): Promise<ScanReport> {
  return new DeduplicationScanner(deps, options).run(runOptions);
}
