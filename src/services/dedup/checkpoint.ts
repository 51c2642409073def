/**
 * Scan checkpoints
 *
 * Written after every completed window and when a scan stops early, so an
 * interrupted scan resumes at the first unfinished window instead of the
 * beginning. The configuration hash ties a checkpoint to the options that
 * shaped it: resuming with different fields or windows would silently miss
 * duplicates.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { ScanCheckpoint } from '../../core/types.js';
import type { ScanOptions } from '../../config/scan-options.js';
import { createCheckpointCorruptError } from '../../core/errors.js';
import { createHasher } from './hashers.js';
import { canonicalJson } from './fingerprint.js';

export interface CheckpointStore {
  load(): Promise<ScanCheckpoint | null>;
  save(checkpoint: ScanCheckpoint): Promise<void>;
  clear(): Promise<void>;
}

const positionSchema = z.object({ timestamp: z.number(), id: z.string() });

const checkpointSchema = z.object({
  version: z.literal(1),
  configHash: z.string().min(1),
  range: z.object({ from: z.number().optional(), to: z.number().optional() }),
  windowIndex: z.number().int().min(0),
  windowStart: z.number().nullable(),
  windowLengthMs: z.number().int().positive().nullable(),
  position: positionSchema.nullable(),
  pinned: z.array(z.object({ key: z.string(), id: z.string(), timestamp: z.number() })),
  updatedAt: z.string(),
});

/**
 * Hash of every option that changes which records a scan produces.
 * Page size, concurrency and timeouts are deliberately left out.
 */
export function computeConfigHash(options: ScanOptions): string {
  const shape = canonicalJson({
    fields: options.fields,
    hashAlgorithm: options.hashAlgorithm,
    windowLengthMs: options.windowLengthMs ?? null,
    overlapMs: options.overlapMs ?? null,
    from: options.range.from ?? null,
    to: options.range.to ?? null,
    mode: options.mode,
    verify: options.verify,
    verifyIgnoreFields: options.verifyIgnoreFields,
    tieBreak: options.tieBreak,
    maxIndexEntries: options.maxIndexEntries,
  });
  return createHasher('sha256').hash(shape);
}

export class MemoryCheckpointStore implements CheckpointStore {
  private current: ScanCheckpoint | null = null;
  /** Every saved checkpoint, oldest first */
  readonly history: ScanCheckpoint[] = [];

  async load(): Promise<ScanCheckpoint | null> {
    return this.current ? structuredClone(this.current) : null;
  }

  async save(checkpoint: ScanCheckpoint): Promise<void> {
    this.current = structuredClone(checkpoint);
    this.history.push(structuredClone(checkpoint));
  }

  async clear(): Promise<void> {
    this.current = null;
  }
}

export class FileCheckpointStore implements CheckpointStore {
  constructor(readonly path: string) {}

  async load(): Promise<ScanCheckpoint | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw createCheckpointCorruptError(this.path, 'not valid JSON');
    }

    const result = checkpointSchema.safeParse(parsed);
    if (!result.success) {
      const reason = result.error.issues[0]?.message ?? 'invalid shape';
      throw createCheckpointCorruptError(this.path, reason);
    }
    return result.data;
  }

  /** Write to a temporary file and rename it over the old one */
  async save(checkpoint: ScanCheckpoint): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf8');
    await rename(tmp, this.path);
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }
}
