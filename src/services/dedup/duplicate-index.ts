/**
 * Duplicate Index
 *
 * fingerprint → group of {id, timestamp} in discovery order. One instance is
 * owned by one scan; the window loop evicts it down to the trailing overlap
 * after every window, which is what keeps its size proportional to the
 * documents of one overlap period rather than the corpus.
 *
 * A fingerprint that keeps recurring never settles, so eviction alone would
 * let its group grow with the corpus. Such groups are compacted instead: the
 * members older than the overlap are resolved early and dropped, and the
 * survivor chosen then is pinned for the rest of the scan.
 *
 * Not synchronized: all inserts come from the scanner's single read loop.
 */

import type {
  DocumentId,
  DuplicateGroup,
  FingerprintKey,
  PinnedSurvivor,
} from '../../core/types.js';

export interface GroupFilter {
  /** Only groups whose newest member is strictly older than this */
  settledBefore?: number;
  /** Only groups whose newest member is at or after this */
  newestAtLeast?: number;
}

export class DuplicateIndex {
  private readonly groups = new Map<FingerprintKey, DuplicateGroup>();
  // id → key; makes re-inserting a document a no-op
  private readonly owners = new Map<DocumentId, FingerprintKey>();
  private peak = 0;

  /**
   * Add a document to the group for its fingerprint.
   *
   * @returns false if the id is already indexed
   */
  insert(fingerprint: FingerprintKey, id: DocumentId, timestamp: number): boolean {
    if (this.owners.has(id)) return false;

    let group = this.groups.get(fingerprint);
    if (!group) {
      group = { key: fingerprint, members: [], newestTimestamp: timestamp };
      this.groups.set(fingerprint, group);
    }
    group.members.push({ id, timestamp });
    if (timestamp > group.newestTimestamp) group.newestTimestamp = timestamp;

    this.owners.set(id, fingerprint);
    if (this.owners.size > this.peak) this.peak = this.owners.size;
    return true;
  }

  *groupsWithDuplicates(filter: GroupFilter = {}): Generator<DuplicateGroup> {
    const { settledBefore = Infinity, newestAtLeast = -Infinity } = filter;
    for (const group of this.groups.values()) {
      if (group.members.length < 2) continue;
      if (group.newestTimestamp >= settledBefore) continue;
      if (group.newestTimestamp < newestAtLeast) continue;
      yield group;
    }
  }

  /**
   * Open groups (newest member at or after `settledBefore`) holding a member
   * older than `staleBefore` that is not their pinned survivor.
   */
  *groupsToCompact(settledBefore: number, staleBefore: number): Generator<DuplicateGroup> {
    for (const group of this.groups.values()) {
      if (group.newestTimestamp < settledBefore) continue;
      if (group.members.some((m) => m.id !== group.pinned && m.timestamp < staleBefore)) {
        yield group;
      }
    }
  }

  /**
   * Remove the given members from a group and pin its survivor. Members must
   * not be re-inserted afterwards; the read loop only moves forward.
   *
   * @returns number of entries removed
   */
  compact(fingerprint: FingerprintKey, retire: readonly DocumentId[], pinned?: DocumentId): number {
    const group = this.groups.get(fingerprint);
    if (!group) return 0;

    const drop = new Set(retire);
    const before = group.members.length;
    group.members = group.members.filter((m) => !drop.has(m.id));
    for (const id of drop) {
      if (this.owners.get(id) === fingerprint) this.owners.delete(id);
    }
    if (pinned !== undefined) group.pinned = pinned;

    const newest = group.members.reduce((max, m) => Math.max(max, m.timestamp), -Infinity);
    if (group.members.length === 0) {
      this.groups.delete(fingerprint);
    } else {
      group.newestTimestamp = newest;
    }
    return before - group.members.length;
  }

  /** Re-seed a survivor pinned by an interrupted run */
  restorePinned(survivor: PinnedSurvivor): void {
    this.insert(survivor.key, survivor.id, survivor.timestamp);
    const group = this.groups.get(survivor.key);
    if (group) group.pinned = survivor.id;
  }

  pinnedSurvivors(): PinnedSurvivor[] {
    const pinned: PinnedSurvivor[] = [];
    for (const group of this.groups.values()) {
      const member = group.members.find((m) => m.id === group.pinned);
      if (member) pinned.push({ key: group.key, ...member });
    }
    return pinned;
  }

  /**
   * Drop every group whose newest member is older than the bound.
   *
   * Groups go as a whole: a group still receiving members keeps its older
   * ones, so a duplicate spanning a window boundary is still found.
   *
   * @returns number of entries removed
   */
  evict(olderThan: number): number {
    let evicted = 0;
    for (const [key, group] of this.groups) {
      if (group.newestTimestamp >= olderThan) continue;
      for (const member of group.members) {
        this.owners.delete(member.id);
      }
      evicted += group.members.length;
      this.groups.delete(key);
    }
    return evicted;
  }

  has(id: DocumentId): boolean {
    return this.owners.has(id);
  }

  /** Indexed document entries */
  get size(): number {
    return this.owners.size;
  }

  get groupCount(): number {
    return this.groups.size;
  }

  /** Largest size reached since construction or the last clear() */
  get peakSize(): number {
    return this.peak;
  }

  clear(): void {
    this.groups.clear();
    this.owners.clear();
    this.peak = 0;
  }
}
