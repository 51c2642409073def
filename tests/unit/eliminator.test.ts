import { describe, it, expect } from 'vitest';
import { Eliminator } from '../../src/services/dedup/eliminator.js';
import { MemoryAuditSink, type AuditSink } from '../../src/services/dedup/audit-log.js';
import { MemoryDocumentStore } from '../../src/core/adapters/memory-store.adapter.js';
import type { AuditEntry } from '../../src/core/types.js';
import { doc, FAST_RETRY, FlakyStore } from '../fixtures/test-helpers.js';

function storeWith(ids: string[]): FlakyStore {
  return new FlakyStore(
    new MemoryDocumentStore(ids.map((id, i) => doc(id, i, { title: 'x' })))
  );
}

const record = { fingerprint: 'fp', survivor: 'a', removed: ['b', 'c'] };

describe('Eliminator', () => {
  describe('dry run', () => {
    it('should audit the record without touching the store', async () => {
      const store = storeWith(['a', 'b', 'c']);
      const sink = new MemoryAuditSink();
      const eliminator = new Eliminator(store, sink, {
        mode: 'dryRun',
        timeoutMs: 1000,
        concurrency: 2,
      });

      const entry = await eliminator.apply({ record, verified: false }, 3);

      expect(entry).toMatchObject({
        record,
        mode: 'dryRun',
        windowIndex: 3,
        verified: false,
        outcome: null,
      });
      expect(sink.entries).toEqual([entry]);
      expect(store.deleteCalls).toEqual([]);
      expect(store.inner.size).toBe(3);
    });
  });

  describe('live', () => {
    it('should delete every removed id', async () => {
      const store = storeWith(['a', 'b', 'c']);
      const eliminator = new Eliminator(store, new MemoryAuditSink(), {
        mode: 'live',
        timeoutMs: 1000,
        concurrency: 1,
      });

      const entry = await eliminator.apply({ record, verified: true }, 0);

      expect(entry.outcome).toEqual({ deleted: ['b', 'c'], failed: [] });
      expect(store.inner.ids()).toEqual(['a']);
    });

    it('should record a rejected delete and carry on with the rest', async () => {
      const store = storeWith(['a', 'b', 'c']);
      store.rejectDeletes.add('b');
      const eliminator = new Eliminator(store, new MemoryAuditSink(), {
        mode: 'live',
        timeoutMs: 1000,
        concurrency: 1,
        retry: FAST_RETRY,
      });

      const entry = await eliminator.apply({ record, verified: false }, 0);

      expect(entry.outcome).toEqual({
        deleted: ['c'],
        failed: [{ id: 'b', reason: 'Delete failed for b: permission denied', code: 'E3000' }],
      });
      expect(store.inner.ids()).toEqual(['a', 'b']);
    });

    it('should count a delete of a vanished document as a failure', async () => {
      const store = storeWith(['a', 'c']);
      const eliminator = new Eliminator(store, new MemoryAuditSink(), {
        mode: 'live',
        timeoutMs: 1000,
        concurrency: 1,
      });

      const entry = await eliminator.apply({ record, verified: false }, 0);

      expect(entry.outcome).toEqual({
        deleted: ['c'],
        failed: [
          { id: 'b', reason: 'Delete failed for b: store reported nothing deleted', code: 'E3000' },
        ],
      });
    });
  });

  describe('applyAll', () => {
    it('should return entries in record order', async () => {
      const store = storeWith(['a1', 'b1', 'a2', 'b2', 'a3', 'b3']);
      const eliminator = new Eliminator(store, new MemoryAuditSink(), {
        mode: 'live',
        timeoutMs: 1000,
        concurrency: 2,
      });
      const pending = [1, 2, 3].map((n) => ({
        record: { fingerprint: `fp${n}`, survivor: `a${n}`, removed: [`b${n}`] },
        verified: false,
      }));

      const entries = await eliminator.applyAll(pending, 0);

      expect(entries.map((e) => e.record.fingerprint)).toEqual(['fp1', 'fp2', 'fp3']);
      expect(store.inner.ids()).toEqual(['a1', 'a2', 'a3']);
    });

    it('should finish the batch before rethrowing an audit failure', async () => {
      const written: string[] = [];
      const sink: AuditSink = {
        append: async (entry: AuditEntry) => {
          if (entry.record.fingerprint === 'fp1') throw new Error('disk full');
          written.push(entry.record.fingerprint);
        },
        close: async () => {},
      };
      const eliminator = new Eliminator(storeWith([]), sink, {
        mode: 'dryRun',
        timeoutMs: 1000,
        concurrency: 2,
      });
      const pending = [1, 2, 3].map((n) => ({
        record: { fingerprint: `fp${n}`, survivor: `a${n}`, removed: [`b${n}`] },
        verified: false,
      }));

      await expect(eliminator.applyAll(pending, 0)).rejects.toThrow('disk full');
      expect(written).toEqual(['fp2']);
    });
  });
});
