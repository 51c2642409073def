/**
 * Core domain types shared by the scanner services and the store adapters
 */

// =============================================================================
// DOCUMENTS
// =============================================================================

export type DocumentId = string;

/** JSON-like value stored in a document field */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export interface StoredDocument {
  id: DocumentId;
  /** Ordering timestamp used for windowing (epoch milliseconds) */
  timestamp: number;
  fields: Record<string, FieldValue>;
}

/** Position in the (timestamp, id) sort order */
export interface SortPosition {
  timestamp: number;
  id: DocumentId;
}

/** Half-open time range [from, to). Either bound may be absent. */
export interface TimeRange {
  from?: number;
  to?: number;
}

// =============================================================================
// FINGERPRINTS AND GROUPS
// =============================================================================

export type FingerprintKey = string;

export interface GroupMember {
  id: DocumentId;
  timestamp: number;
}

export interface DuplicateGroup {
  key: FingerprintKey;
  /** Discovery order */
  members: GroupMember[];
  newestTimestamp: number;
  /**
   * Survivor fixed when the group was compacted in an earlier window. It is
   * kept by every later resolution of the group.
   */
  pinned?: DocumentId;
}

/** A pinned survivor carried across windows and checkpoints */
export interface PinnedSurvivor extends GroupMember {
  key: FingerprintKey;
}

// =============================================================================
// WINDOWS
// =============================================================================

export interface WindowDescriptor {
  index: number;
  /** Inclusive start; absent when unbounded */
  start?: number;
  /** Exclusive end; absent when unbounded */
  end?: number;
  overlapMs: number;
  isLast: boolean;
}

// =============================================================================
// RESOLUTION AND ELIMINATION
// =============================================================================

export const SCAN_MODES = ['dryRun', 'live'] as const;
export type ScanMode = (typeof SCAN_MODES)[number];

export const TIE_BREAK_RULES = ['smallestId', 'earliest', 'latest'] as const;
export type TieBreakRule = (typeof TIE_BREAK_RULES)[number];

/** Digest algorithms offered through node:crypto */
export const HASH_ALGORITHMS = ['sha256', 'sha1', 'md5', 'sha512'] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export interface EliminationRecord {
  fingerprint: FingerprintKey;
  survivor: DocumentId;
  removed: DocumentId[];
}

export interface DeleteFailure {
  id: DocumentId;
  reason: string;
  code: string;
}

export interface EliminationOutcome {
  deleted: DocumentId[];
  failed: DeleteFailure[];
}

export interface AuditEntry {
  record: EliminationRecord;
  mode: ScanMode;
  windowIndex: number;
  verified: boolean;
  /** null in dry-run mode */
  outcome: EliminationOutcome | null;
  recordedAt: string;
}

// =============================================================================
// CHECKPOINTS AND REPORTS
// =============================================================================

export interface ScanCheckpoint {
  version: 1;
  /** Hash of the options that shape the scan; resume requires a match */
  configHash: string;
  /** Resolved scan range, reused on resume */
  range: TimeRange;
  /** First window not yet completed */
  windowIndex: number;
  /** Start of that window; null in unbounded mode */
  windowStart: number | null;
  /** Effective window length after adaptive shrinking; null in unbounded mode */
  windowLengthMs: number | null;
  /** Last document consumed inside that window, when known */
  position: SortPosition | null;
  /** Survivors of groups compacted before that window and still open */
  pinned: PinnedSurvivor[];
  updatedAt: string;
}

export interface ScanReport {
  mode: ScanMode;
  windows: number;
  documentsScanned: number;
  duplicateGroups: number;
  records: number;
  documentsRemoved: number;
  deleted: number;
  deleteFailures: number;
  collisionsSuspected: number;
  peakIndexEntries: number;
  /** Open groups shrunk at a window end because they outlived the overlap */
  groupsCompacted: number;
  cancelled: boolean;
  resumedFromWindow: number | null;
  durationMs: number;
}
