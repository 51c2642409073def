import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateIndex } from '../../src/services/dedup/duplicate-index.js';

describe('DuplicateIndex', () => {
  let index: DuplicateIndex;

  beforeEach(() => {
    index = new DuplicateIndex();
  });

  describe('insert', () => {
    it('should group ids by fingerprint in discovery order', () => {
      index.insert('k1', 'b', 20);
      index.insert('k1', 'a', 10);
      index.insert('k2', 'c', 15);

      const groups = [...index.groupsWithDuplicates()];

      expect(groups).toHaveLength(1);
      expect(groups[0]?.key).toBe('k1');
      expect(groups[0]?.members).toEqual([
        { id: 'b', timestamp: 20 },
        { id: 'a', timestamp: 10 },
      ]);
      expect(groups[0]?.newestTimestamp).toBe(20);
    });

    it('should ignore an id that is already indexed', () => {
      expect(index.insert('k1', 'a', 10)).toBe(true);
      expect(index.insert('k1', 'a', 10)).toBe(false);
      expect(index.insert('k2', 'a', 10)).toBe(false);

      expect(index.size).toBe(1);
      expect([...index.groupsWithDuplicates()]).toEqual([]);
    });

    it('should track entry and group counts', () => {
      index.insert('k1', 'a', 1);
      index.insert('k1', 'b', 2);
      index.insert('k2', 'c', 3);

      expect(index.size).toBe(3);
      expect(index.groupCount).toBe(2);
      expect(index.has('b')).toBe(true);
      expect(index.has('z')).toBe(false);
    });
  });

  describe('groupsWithDuplicates', () => {
    beforeEach(() => {
      index.insert('old', 'a', 10);
      index.insert('old', 'b', 20);
      index.insert('new', 'c', 50);
      index.insert('new', 'd', 90);
      index.insert('single', 'e', 30);
    });

    it('should skip groups of one', () => {
      expect([...index.groupsWithDuplicates()].map((g) => g.key)).toEqual(['old', 'new']);
    });

    it('should only yield settled groups when given a bound', () => {
      expect([...index.groupsWithDuplicates({ settledBefore: 90 })].map((g) => g.key)).toEqual([
        'old',
      ]);
      expect([...index.groupsWithDuplicates({ settledBefore: 91 })].map((g) => g.key)).toEqual([
        'old',
        'new',
      ]);
    });

    it('should skip groups that finished before the lower bound', () => {
      expect([...index.groupsWithDuplicates({ newestAtLeast: 21 })].map((g) => g.key)).toEqual([
        'new',
      ]);
    });
  });

  describe('evict', () => {
    it('should drop whole groups whose newest member is older than the bound', () => {
      index.insert('k1', 'a', 10);
      index.insert('k1', 'b', 20);
      index.insert('k2', 'c', 5);
      index.insert('k2', 'd', 40);

      const evicted = index.evict(30);

      expect(evicted).toBe(2);
      expect(index.size).toBe(2);
      expect(index.has('a')).toBe(false);
      // k2 keeps its older member because the group is still open
      expect(index.has('c')).toBe(true);
    });

    it('should allow an evicted id to be indexed again', () => {
      index.insert('k1', 'a', 10);
      index.evict(11);

      expect(index.insert('k1', 'a', 10)).toBe(true);
    });

    it('should evict everything with an infinite bound', () => {
      index.insert('k1', 'a', 10);
      index.insert('k2', 'b', Number.MAX_SAFE_INTEGER);

      expect(index.evict(Infinity)).toBe(2);
      expect(index.size).toBe(0);
      expect(index.groupCount).toBe(0);
    });
  });

  describe('peakSize', () => {
    it('should remember the largest size across evictions', () => {
      index.insert('k1', 'a', 1);
      index.insert('k1', 'b', 2);
      index.insert('k2', 'c', 3);
      index.evict(10);
      index.insert('k3', 'd', 20);

      expect(index.size).toBe(1);
      expect(index.peakSize).toBe(3);
    });

    it('should reset on clear', () => {
      index.insert('k1', 'a', 1);
      index.clear();

      expect(index.size).toBe(0);
      expect(index.peakSize).toBe(0);
    });
  });

  describe('compaction', () => {
    beforeEach(() => {
      index.insert('beat', 'h1', 100);
      index.insert('beat', 'h2', 200);
      index.insert('beat', 'h3', 300);
      index.insert('pair', 'p1', 250);
      index.insert('pair', 'p2', 280);
    });

    it('should list open groups holding members older than the bound', () => {
      expect([...index.groupsToCompact(260, 150)].map((g) => g.key)).toEqual(['beat']);
      expect([...index.groupsToCompact(260, 100)]).toEqual([]);
    });

    it('should drop retired members and pin the survivor', () => {
      expect(index.compact('beat', ['h2'], 'h1')).toBe(1);

      expect(index.size).toBe(4);
      expect(index.has('h2')).toBe(false);
      expect(index.pinnedSurvivors()).toEqual([{ key: 'beat', id: 'h1', timestamp: 100 }]);
      // only the pinned survivor is older than the bound now
      expect([...index.groupsToCompact(260, 250)]).toEqual([]);
    });

    it('should forget a group whose members are all retired', () => {
      expect(index.compact('pair', ['p1', 'p2'])).toBe(2);

      expect(index.groupCount).toBe(1);
      expect(index.compact('pair', ['p1'])).toBe(0);
    });

    it('should restore a pinned survivor into an empty index', () => {
      const restored = new DuplicateIndex();
      restored.restorePinned({ key: 'beat', id: 'h1', timestamp: 100 });
      restored.insert('beat', 'h1', 100);
      restored.insert('beat', 'h4', 400);

      expect(restored.size).toBe(2);
      expect([...restored.groupsWithDuplicates()][0]).toMatchObject({
        pinned: 'h1',
        newestTimestamp: 400,
      });
    });
  });
});
