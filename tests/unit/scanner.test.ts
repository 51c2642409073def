import { describe, it, expect } from 'vitest';
import { runScan } from '../../src/services/dedup/scanner.js';
import { MemoryAuditSink } from '../../src/services/dedup/audit-log.js';
import { MemoryCheckpointStore } from '../../src/services/dedup/checkpoint.js';
import { MemoryDocumentStore } from '../../src/core/adapters/memory-store.adapter.js';
import type { DocumentStore } from '../../src/core/interfaces/document-store.js';
import type { AuditEntry, EliminationRecord } from '../../src/core/types.js';
import {
  CheckpointMismatchError,
  ConfigurationInvalidError,
  SourceUnavailableError,
} from '../../src/core/errors.js';
import {
  doc,
  FAST_RETRY,
  FlakyStore,
  pairedCorpus,
  recurringCorpus,
  scanOptions,
} from '../fixtures/test-helpers.js';

function indexStore(): MemoryDocumentStore {
  return new MemoryDocumentStore([
    doc('A', 1000, { title: 'CAC', host: 'one.example' }),
    doc('B', 2000, { title: 'CAC', host: 'two.example' }),
    doc('C', 1500, { title: 'FTSE', host: 'one.example' }),
    doc('D', 2500, { title: 'SMI', host: 'one.example' }),
  ]);
}

function records(sink: MemoryAuditSink): EliminationRecord[] {
  return sink.entries
    .map((e) => e.record)
    .sort((a, b) => (a.fingerprint < b.fingerprint ? -1 : a.fingerprint > b.fingerprint ? 1 : 0));
}

function removedIds(entries: readonly AuditEntry[]): string[] {
  return entries.flatMap((e) => e.record.removed).sort();
}

const ALL_B_IDS = (pairs: number): string[] =>
  Array.from({ length: pairs }, (_, i) => `d${String(i).padStart(5, '0')}b`);

function survivors(entries: readonly AuditEntry[]): string[] {
  return [...new Set(entries.map((e) => e.record.survivor))];
}

describe('runScan', () => {
  describe('unbounded', () => {
    it('should keep one of two documents with the same title', async () => {
      const store = indexStore();
      const sink = new MemoryAuditSink();

      const report = await runScan({ store, auditSink: sink }, scanOptions());

      expect(sink.entries).toHaveLength(1);
      expect(sink.entries[0]?.record).toMatchObject({ survivor: 'A', removed: ['B'] });
      expect(sink.entries[0]?.outcome).toBeNull();
      expect(report).toMatchObject({
        mode: 'dryRun',
        windows: 1,
        documentsScanned: 4,
        duplicateGroups: 1,
        records: 1,
        documentsRemoved: 1,
        deleted: 0,
        cancelled: false,
        resumedFromWindow: null,
      });
      expect(store.size).toBe(4);
    });

    it('should treat documents as distinct when another fingerprint field differs', async () => {
      const sink = new MemoryAuditSink();

      const report = await runScan(
        { store: indexStore(), auditSink: sink },
        scanOptions({ fields: ['title', 'host'] })
      );

      expect(report.records).toBe(0);
      expect(sink.entries).toEqual([]);
    });

    it('should split a group whose full content differs when verifying', async () => {
      const store = new MemoryDocumentStore([
        doc('A', 1000, { title: 'CAC', host: 'one.example' }),
        doc('B', 2000, { title: 'CAC', host: 'two.example' }),
        doc('E', 3000, { title: 'CAC', host: 'one.example' }),
      ]);
      const sink = new MemoryAuditSink();

      const report = await runScan({ store, auditSink: sink }, scanOptions({ verify: true }));

      expect(report.collisionsSuspected).toBe(1);
      expect(report.duplicateGroups).toBe(1);
      expect(sink.entries.map((e) => [e.record.survivor, e.record.removed, e.verified])).toEqual([
        ['A', ['E'], true],
      ]);
    });

    it('should produce the same records on every dry run', async () => {
      const store = new MemoryDocumentStore(pairedCorpus(10, 100, 30));
      const first = new MemoryAuditSink();
      const second = new MemoryAuditSink();

      await runScan({ store, auditSink: first }, scanOptions());
      await runScan({ store, auditSink: second }, scanOptions());

      expect(records(second)).toEqual(records(first));
      expect(store.size).toBe(20);
    });

    it('should never report an id as both kept and removed', async () => {
      const store = new MemoryDocumentStore([
        ...pairedCorpus(5, 100, 30),
        doc('x1', 50, { title: 'story-00001' }),
        doc('x2', 60, { title: 'story-00001' }),
      ]);
      const sink = new MemoryAuditSink();

      await runScan({ store, auditSink: sink }, scanOptions());

      const kept = new Set(sink.entries.map((e) => e.record.survivor));
      const removed = removedIds(sink.entries);
      expect(removed.filter((id) => kept.has(id))).toEqual([]);
      expect(new Set(removed).size).toBe(removed.length);
      expect(removed).toEqual(['d00000b', 'd00001b', 'd00002b', 'd00003b', 'd00004b', 'x1', 'x2']);
    });
  });

  describe('live', () => {
    it('should delete duplicates and find none on the next pass', async () => {
      const store = new MemoryDocumentStore(pairedCorpus(10, 100, 30));

      const report = await runScan({ store }, scanOptions({ mode: 'live' }));
      const again = await runScan({ store }, scanOptions({ mode: 'live' }));

      expect(report).toMatchObject({ records: 10, deleted: 10, deleteFailures: 0 });
      expect(store.ids()).toEqual(ALL_B_IDS(10).map((id) => id.replace(/b$/, 'a')));
      expect(again.records).toBe(0);
    });

    it('should report rejected deletes and keep going', async () => {
      const store = new FlakyStore(new MemoryDocumentStore(pairedCorpus(3, 100, 30)));
      store.rejectDeletes.add('d00001b');
      const sink = new MemoryAuditSink();

      const report = await runScan(
        { store, auditSink: sink, retry: FAST_RETRY },
        scanOptions({ mode: 'live' })
      );

      expect(report).toMatchObject({ records: 3, deleted: 2, deleteFailures: 1 });
      expect(store.inner.ids()).toEqual(['d00000a', 'd00001a', 'd00001b', 'd00002a']);
      const failed = sink.entries.flatMap((e) => e.outcome?.failed ?? []);
      expect(failed).toEqual([
        { id: 'd00001b', reason: 'Delete failed for d00001b: permission denied', code: 'E3000' },
      ]);
    });
  });

  describe('windowed', () => {
    const windowed = { windowLengthMs: 500, overlapMs: 50 };

    it('should find the same duplicates as an unbounded scan', async () => {
      const corpus = pairedCorpus(50, 100, 30);
      const unboundedSink = new MemoryAuditSink();
      const windowedSink = new MemoryAuditSink();

      await runScan(
        { store: new MemoryDocumentStore(corpus), auditSink: unboundedSink },
        scanOptions()
      );
      const report = await runScan(
        { store: new MemoryDocumentStore(corpus), auditSink: windowedSink },
        scanOptions(windowed)
      );

      expect(report.windows).toBeGreaterThan(1);
      expect(report.documentsScanned).toBe(100);
      expect(records(windowedSink)).toEqual(records(unboundedSink));
      expect(removedIds(windowedSink.entries)).toEqual(ALL_B_IDS(50));
    });

    it('should keep the index size independent of corpus size', async () => {
      const small = await runScan(
        { store: new MemoryDocumentStore(pairedCorpus(20, 100, 30)) },
        scanOptions(windowed)
      );
      const large = await runScan(
        { store: new MemoryDocumentStore(pairedCorpus(200, 100, 30)) },
        scanOptions(windowed)
      );

      expect(small.peakIndexEntries).toBe(10);
      expect(large.peakIndexEntries).toBe(10);
      expect(large.records).toBe(200);
    });

    it('should keep the index bounded for a fingerprint recurring in every window', async () => {
      const smallSink = new MemoryAuditSink();
      const largeSink = new MemoryAuditSink();

      // 50 documents in the first window, then 11 retained + 45 read per window
      const small = await runScan(
        { store: new MemoryDocumentStore(recurringCorpus(100, 10)), auditSink: smallSink },
        scanOptions(windowed)
      );
      const large = await runScan(
        { store: new MemoryDocumentStore(recurringCorpus(2000, 10)), auditSink: largeSink },
        scanOptions(windowed)
      );

      expect(small).toMatchObject({
        windows: 3,
        documentsScanned: 100,
        records: 3,
        documentsRemoved: 99,
        groupsCompacted: 2,
        peakIndexEntries: 56,
      });
      expect(large).toMatchObject({ documentsRemoved: 1999, peakIndexEntries: 56 });
      expect(smallSink.entries.map((e) => e.record.removed.length)).toEqual([39, 45, 15]);
      expect(survivors(smallSink.entries)).toEqual(['h00000']);
      expect(survivors(largeSink.entries)).toEqual(['h00000']);
      expect(removedIds(smallSink.entries)).toEqual(
        recurringCorpus(100, 10)
          .slice(1)
          .map((d) => d.id)
      );
    });

    it('should shrink windows past the index ceiling with the same result', async () => {
      const corpus = pairedCorpus(20, 100, 30);
      const plainSink = new MemoryAuditSink();
      const adaptiveSink = new MemoryAuditSink();
      const checkpointStore = new MemoryCheckpointStore();

      const plain = await runScan(
        { store: new MemoryDocumentStore(corpus), auditSink: plainSink },
        scanOptions(windowed)
      );
      // window 0 ends with 10 entries > 5: the rest run at 250ms, 4 entries each
      const adaptive = await runScan(
        { store: new MemoryDocumentStore(corpus), auditSink: adaptiveSink, checkpointStore },
        scanOptions({ ...windowed, maxIndexEntries: 5 })
      );

      expect(plain.windows).toBe(5);
      expect(adaptive.windows).toBe(9);
      expect(adaptive.peakIndexEntries).toBe(10);
      expect(checkpointStore.history.map((c) => c.windowLengthMs)).toEqual(
        Array.from({ length: 9 }, () => 250)
      );
      expect(records(adaptiveSink)).toEqual(records(plainSink));
      expect(removedIds(adaptiveSink.entries)).toEqual(ALL_B_IDS(20));
    });

    it('should use explicit range bounds', async () => {
      const sink = new MemoryAuditSink();

      const report = await runScan(
        { store: new MemoryDocumentStore(pairedCorpus(20, 100, 30)), auditSink: sink },
        scanOptions({ ...windowed, range: { from: 500, to: 1000 } })
      );

      expect(report.documentsScanned).toBe(10);
      expect(removedIds(sink.entries)).toEqual([
        'd00005b',
        'd00006b',
        'd00007b',
        'd00008b',
        'd00009b',
      ]);
    });

    it('should return an empty report for an empty store', async () => {
      const report = await runScan({ store: new MemoryDocumentStore() }, scanOptions(windowed));

      expect(report).toMatchObject({ windows: 0, documentsScanned: 0, records: 0 });
    });

    it('should require range bounds from a store that cannot report them', async () => {
      const inner = new MemoryDocumentStore(pairedCorpus(2, 100, 30));
      const store: DocumentStore = {
        scroll: (query, cursor) => inner.scroll(query, cursor),
        delete: (id) => inner.delete(id),
        getById: (id) => inner.getById(id),
        close: () => inner.close(),
      };

      await expect(runScan({ store }, scanOptions(windowed))).rejects.toThrow(
        ConfigurationInvalidError
      );
    });
  });

  describe('cancellation and resume', () => {
    const options = scanOptions({ windowLengthMs: 500, overlapMs: 50, pageSize: 4 });

    it('should stop at the next document and resume from the saved window', async () => {
      const corpus = pairedCorpus(20, 100, 30);
      const store = new FlakyStore(new MemoryDocumentStore(corpus));
      const checkpointStore = new MemoryCheckpointStore();
      const firstSink = new MemoryAuditSink();
      const controller = new AbortController();
      // window 0 takes three pages; abort while the first page of window 1 is fetched
      store.onScroll = () => {
        if (store.scrollCalls === 3) controller.abort();
      };

      const first = await runScan({ store, auditSink: firstSink, checkpointStore }, options, {
        signal: controller.signal,
      });

      expect(first).toMatchObject({ cancelled: true, windows: 1, records: 5 });
      expect(await checkpointStore.load()).toMatchObject({
        windowIndex: 1,
        windowStart: 450,
        windowLengthMs: 500,
        position: { timestamp: 430, id: 'd00004b' },
      });

      store.onScroll = undefined;
      const secondSink = new MemoryAuditSink();
      const second = await runScan({ store, auditSink: secondSink, checkpointStore }, options, {
        resume: true,
      });

      expect(second).toMatchObject({ cancelled: false, resumedFromWindow: 1, records: 15 });
      expect(removedIds([...firstSink.entries, ...secondSink.entries])).toEqual(ALL_B_IDS(20));
      expect(await checkpointStore.load()).toBeNull();
    });

    it('should restore pinned survivors when resuming a compacted group', async () => {
      const store = new FlakyStore(new MemoryDocumentStore(recurringCorpus(100, 10)));
      const checkpointStore = new MemoryCheckpointStore();
      const firstSink = new MemoryAuditSink();
      const controller = new AbortController();
      const opts = scanOptions({ windowLengthMs: 500, overlapMs: 50 });
      // window 0 is one page; abort as window 1 fetches its first
      store.onScroll = () => {
        if (store.scrollCalls === 1) controller.abort();
      };

      const first = await runScan({ store, auditSink: firstSink, checkpointStore }, opts, {
        signal: controller.signal,
      });

      expect(first).toMatchObject({ cancelled: true, windows: 1, documentsRemoved: 39 });
      expect(await checkpointStore.load()).toMatchObject({
        windowIndex: 1,
        windowStart: 450,
        pinned: [{ id: 'h00000', timestamp: 0 }],
      });

      store.onScroll = undefined;
      const secondSink = new MemoryAuditSink();
      const second = await runScan({ store, auditSink: secondSink, checkpointStore }, opts, {
        resume: true,
      });

      // re-reads 400..940 to rebuild, then 950..990
      expect(second).toMatchObject({ documentsScanned: 60, records: 2, documentsRemoved: 60 });
      const all = [...firstSink.entries, ...secondSink.entries];
      expect(survivors(all)).toEqual(['h00000']);
      expect(removedIds(all)).toEqual(
        recurringCorpus(100, 10)
          .slice(1)
          .map((d) => d.id)
      );
    });

    it('should finish the deletes of a window already in elimination', async () => {
      const store = new FlakyStore(new MemoryDocumentStore(pairedCorpus(20, 100, 30)));
      const checkpointStore = new MemoryCheckpointStore();
      const controller = new AbortController();
      store.onDelete = () => controller.abort();

      const report = await runScan(
        { store, checkpointStore },
        scanOptions({ windowLengthMs: 500, overlapMs: 50, mode: 'live' }),
        { signal: controller.signal }
      );

      expect(report).toMatchObject({ cancelled: true, windows: 1, records: 5, deleted: 5 });
      expect([...store.deleteCalls].sort()).toEqual(ALL_B_IDS(5));
      expect(ALL_B_IDS(5).filter((id) => store.inner.has(id))).toEqual([]);
      expect(store.scrollCalls).toBe(1);
      expect(await checkpointStore.load()).toMatchObject({ windowIndex: 1, windowStart: 450 });
    });

    it('should checkpoint the window when verification cannot reach the store', async () => {
      const store = new FlakyStore(new MemoryDocumentStore(pairedCorpus(20, 100, 30)));
      store.rejectGetById.add('d00006b');
      const checkpointStore = new MemoryCheckpointStore();

      await expect(
        runScan(
          { store, checkpointStore, retry: FAST_RETRY },
          scanOptions({ windowLengthMs: 500, overlapMs: 50, verify: true })
        )
      ).rejects.toMatchObject({
        name: 'SourceUnavailableError',
        message: 'Document store unavailable: ECONNRESET socket closed',
      });

      expect(await checkpointStore.load()).toMatchObject({
        windowIndex: 1,
        windowStart: 450,
        position: { timestamp: 930, id: 'd00009b' },
      });
    });

    it('should refuse a checkpoint written with other options', async () => {
      const checkpointStore = new MemoryCheckpointStore();
      await checkpointStore.save({
        version: 1,
        configHash: 'written-by-another-configuration',
        range: { from: 0, to: 1000 },
        windowIndex: 1,
        windowStart: 450,
        windowLengthMs: 500,
        position: null,
        pinned: [],
        updatedAt: '2026-01-01T00:00:00.000Z',
      });

      await expect(
        runScan(
          { store: new MemoryDocumentStore(pairedCorpus(10, 100, 30)), checkpointStore },
          options,
          { resume: true }
        )
      ).rejects.toThrow(CheckpointMismatchError);
    });

    it('should start from the beginning when there is no checkpoint', async () => {
      const report = await runScan(
        {
          store: new MemoryDocumentStore(pairedCorpus(10, 100, 30)),
          checkpointStore: new MemoryCheckpointStore(),
        },
        options,
        { resume: true }
      );

      expect(report).toMatchObject({ resumedFromWindow: null, records: 10 });
    });

    it('should checkpoint the failed window when the store stays unreachable', async () => {
      const store = new FlakyStore(new MemoryDocumentStore(pairedCorpus(20, 100, 30)));
      store.failScrollsAfter = 3;
      const checkpointStore = new MemoryCheckpointStore();

      await expect(
        runScan({ store, checkpointStore, retry: FAST_RETRY }, options)
      ).rejects.toThrow(SourceUnavailableError);

      expect(await checkpointStore.load()).toMatchObject({
        windowIndex: 1,
        windowStart: 450,
        position: { timestamp: 430, id: 'd00004b' },
      });
    });
  });
});
