export { createHasher, DIGEST_HEX_LENGTH, type Hasher } from './hashers.js';
export {
  createFingerprintExtractor,
  canonicalJson,
  canonicalToken,
  readField,
  type FingerprintExtractor,
} from './fingerprint.js';
export { DuplicateIndex, type GroupFilter } from './duplicate-index.js';
export {
  WindowScheduler,
  type WindowSchedulerOptions,
  type WindowResumePoint,
} from './window-scheduler.js';
export { DocumentSourceIterator, type SourceIteratorOptions } from './source-iterator.js';
export {
  chooseSurvivor,
  resolveGroup,
  verifyGroup,
  canonicalBody,
  type VerifyOptions,
  type VerificationResult,
} from './resolution-policy.js';
export {
  Eliminator,
  type EliminatorOptions,
  type PendingElimination,
} from './eliminator.js';
export {
  JsonlAuditSink,
  MemoryAuditSink,
  NullAuditSink,
  type AuditSink,
} from './audit-log.js';
export {
  FileCheckpointStore,
  MemoryCheckpointStore,
  computeConfigHash,
  type CheckpointStore,
} from './checkpoint.js';
export {
  DeduplicationScanner,
  runScan,
  type ScannerDependencies,
  type ScanRunOptions,
} from './scanner.js';
