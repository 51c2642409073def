/**
 * Resolution Policy
 *
 * Picks one survivor per duplicate group and lists the rest for removal.
 * Every rule is a total order over members, so the same group always yields
 * the same record regardless of discovery order.
 *
 * A pinned survivor wins over the rule. Groups compacted across windows are
 * therefore resolved by the rule once, over the members known at the first
 * compaction, and keep that survivor afterwards.
 */

import type { DocumentStore } from '../../core/interfaces/document-store.js';
import type {
  DocumentId,
  DuplicateGroup,
  EliminationRecord,
  FieldValue,
  GroupMember,
  StoredDocument,
  TieBreakRule,
} from '../../core/types.js';
import { DedupError, ErrorCodes, SourceUnavailableError } from '../../core/errors.js';
import { compareIds } from '../../core/adapters/cursor.js';
import { withRetry, isRetryableStoreError, type RetryOptions } from '../../utils/retry.js';
import { withTimeout } from '../../utils/timeout.js';
import { canonicalJson } from './fingerprint.js';

const MEMBER_ORDER: Record<TieBreakRule, (a: GroupMember, b: GroupMember) => number> = {
  smallestId: (a, b) => compareIds(a.id, b.id),
  earliest: (a, b) => a.timestamp - b.timestamp || compareIds(a.id, b.id),
  latest: (a, b) => b.timestamp - a.timestamp || compareIds(a.id, b.id),
};

export function chooseSurvivor(
  members: readonly GroupMember[],
  rule: TieBreakRule,
  pinned?: DocumentId
): GroupMember {
  const order = MEMBER_ORDER[rule];
  const [first, ...rest] = members;
  if (!first) {
    throw new DedupError('Cannot choose a survivor from an empty group', ErrorCodes.INTERNAL_ERROR);
  }
  const fixed = pinned === undefined ? undefined : members.find((m) => m.id === pinned);
  if (fixed) return fixed;
  return rest.reduce((best, member) => (order(member, best) < 0 ? member : best), first);
}

/**
 * Exactly one survivor; every other member is removed.
 */
export function resolveGroup(
  group: Pick<DuplicateGroup, 'key' | 'members' | 'pinned'>,
  rule: TieBreakRule
): EliminationRecord {
  const survivor = chooseSurvivor(group.members, rule, group.pinned);
  return {
    fingerprint: group.key,
    survivor: survivor.id,
    removed: group.members.filter((m) => m.id !== survivor.id).map((m) => m.id),
  };
}

// =============================================================================
// VERIFICATION
// =============================================================================

export interface VerifyOptions {
  tieBreak: TieBreakRule;
  /** Fields left out of the comparison */
  ignoreFields: readonly string[];
  timeoutMs: number;
  retry?: RetryOptions;
}

export interface VerificationResult {
  /** One record per class of identical documents with more than one member */
  records: EliminationRecord[];
  /** Member ids split by content, in discovery order */
  partitions: DocumentId[][];
  /** Members the store no longer has */
  missing: DocumentId[];
  /** True when present members did not all share the same content */
  collision: boolean;
}

export function canonicalBody(document: StoredDocument, ignoreFields: readonly string[]): string {
  const kept: Record<string, FieldValue> = {};
  for (const [name, value] of Object.entries(document.fields)) {
    if (!ignoreFields.includes(name)) kept[name] = value;
  }
  return canonicalJson(kept);
}

/** Store failures surface as SourceUnavailable, like a failed scroll */
async function fetchMember(
  store: DocumentStore,
  id: DocumentId,
  options: VerifyOptions
): Promise<StoredDocument | null> {
  try {
    return await withRetry(() => withTimeout(store.getById(id), options.timeoutMs, 'getById'), {
      ...options.retry,
      retryableErrors: isRetryableStoreError,
    });
  } catch (error) {
    if (error instanceof DedupError && !isRetryableStoreError(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceUnavailableError(`Document store unavailable: ${message}`, null, {
      documentId: id,
      operation: 'getById',
    });
  }
}

/**
 * Re-fetch every member and split the group by full content.
 *
 * Identical fingerprints with different bodies mean either a hash collision
 * or, far more likely, a field list that does not capture what makes two
 * documents different. Either way the classes are resolved separately.
 */
export async function verifyGroup(
  group: DuplicateGroup,
  store: DocumentStore,
  options: VerifyOptions
): Promise<VerificationResult> {
  const classes = new Map<string, GroupMember[]>();
  const missing: DocumentId[] = [];

  for (const member of group.members) {
    const document = await fetchMember(store, member.id, options);
    if (!document) {
      missing.push(member.id);
      continue;
    }
    const body = canonicalBody(document, options.ignoreFields);
    const cls = classes.get(body);
    if (cls) {
      cls.push(member);
    } else {
      classes.set(body, [member]);
    }
  }

  const partitions = [...classes.values()];
  return {
    records: partitions
      .filter((members) => members.length > 1)
      .map((members) =>
        resolveGroup({ key: group.key, members, pinned: group.pinned }, options.tieBreak)
      ),
    partitions: partitions.map((members) => members.map((m) => m.id)),
    missing,
    collision: partitions.length > 1,
  };
}
