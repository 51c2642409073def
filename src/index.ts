// Main entry point for dedupe-scanner (library usage)
// The CLI lives in ./cli.ts; importing this module reads configuration from
// the environment but never loads a .env file.

// Core types and errors
export type {
  DocumentId,
  FieldValue,
  StoredDocument,
  SortPosition,
  TimeRange,
  FingerprintKey,
  GroupMember,
  DuplicateGroup,
  PinnedSurvivor,
  WindowDescriptor,
  ScanMode,
  TieBreakRule,
  HashAlgorithm,
  EliminationRecord,
  DeleteFailure,
  EliminationOutcome,
  AuditEntry,
  ScanCheckpoint,
  ScanReport,
} from './core/types.js';
export { SCAN_MODES, TIE_BREAK_RULES, HASH_ALGORITHMS } from './core/types.js';
export * from './core/errors.js';

// Store interface and adapters
export type { DocumentStore, ScrollQuery, ScrollPage } from './core/interfaces/document-store.js';
export { MemoryDocumentStore } from './core/adapters/memory-store.adapter.js';
export { SqliteDocumentStore } from './core/adapters/sqlite-store.adapter.js';
export {
  encodeCursor,
  decodeCursor,
  compareIds,
  compareSortPositions,
} from './core/adapters/cursor.js';
export { createSQLiteConnection, type SQLiteConnection } from './db/factory.js';

// Configuration
export { config, buildConfig, type Config } from './config/index.js';
export {
  resolveScanOptions,
  isWindowed,
  type ScanOptions,
  type ScanOverrides,
} from './config/scan-options.js';

// Scanner pipeline
export * from './services/dedup/index.js';
