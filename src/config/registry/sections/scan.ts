/**
 * Scan Configuration Section
 *
 * Fingerprint fields, windowing, resolution and elimination settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { HASH_ALGORITHMS, SCAN_MODES, TIE_BREAK_RULES } from '../../../core/types.js';

export const scanSection = {
  name: 'scan',
  description: 'Duplicate scan configuration.',
  options: {
    fields: {
      envKey: 'DEDUP_FIELDS',
      defaultValue: [],
      description: 'Ordered, comma-separated list of fields composing the fingerprint.',
      schema: z.array(z.string()),
      parse: 'stringArray',
    },
    hashAlgorithm: {
      envKey: 'DEDUP_HASH_ALGORITHM',
      defaultValue: 'sha256',
      description: 'Fingerprint hash: sha256 (default), sha1, md5, or sha512.',
      schema: z.enum(HASH_ALGORITHMS),
      allowedValues: HASH_ALGORITHMS,
    },
    windowLengthMs: {
      envKey: 'DEDUP_WINDOW_LENGTH',
      defaultValue: undefined,
      description: 'Window length (e.g. 1h, 1d, or milliseconds). Unset scans in one pass.',
      schema: z.number().int().optional(),
      parse: 'duration',
    },
    overlapMs: {
      envKey: 'DEDUP_OVERLAP',
      defaultValue: undefined,
      description:
        'Overlap carried between windows. Must cover the largest time gap between duplicates. Unset scans in one pass.',
      schema: z.number().int().optional(),
      parse: 'duration',
    },
    from: {
      envKey: 'DEDUP_FROM',
      defaultValue: undefined,
      description: 'Inclusive scan start (ISO date or epoch ms).',
      schema: z.number().optional(),
      parse: 'timestamp',
    },
    to: {
      envKey: 'DEDUP_TO',
      defaultValue: undefined,
      description: 'Exclusive scan end (ISO date or epoch ms).',
      schema: z.number().optional(),
      parse: 'timestamp',
    },
    mode: {
      envKey: 'DEDUP_MODE',
      defaultValue: 'dryRun',
      description: 'dryRun reports elimination records; live deletes documents.',
      schema: z.enum(SCAN_MODES),
      allowedValues: SCAN_MODES,
    },
    verify: {
      envKey: 'DEDUP_VERIFY',
      defaultValue: false,
      description: 'Re-fetch and compare full documents before eliminating a group.',
      schema: z.boolean(),
    },
    verifyIgnoreFields: {
      envKey: 'DEDUP_VERIFY_IGNORE_FIELDS',
      defaultValue: [],
      description: 'Fields left out of the full-document comparison (e.g. ingest timestamps).',
      schema: z.array(z.string()),
      parse: 'stringArray',
    },
    tieBreak: {
      envKey: 'DEDUP_TIE_BREAK',
      defaultValue: 'smallestId',
      description: 'Survivor rule: smallestId, earliest, or latest.',
      schema: z.enum(TIE_BREAK_RULES),
      allowedValues: TIE_BREAK_RULES,
    },
    pageSize: {
      envKey: 'DEDUP_PAGE_SIZE',
      defaultValue: 1000,
      description: 'Documents requested per scroll page.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    deleteConcurrency: {
      envKey: 'DEDUP_DELETE_CONCURRENCY',
      defaultValue: 4,
      description: 'Duplicate groups eliminated in parallel.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    maxIndexEntries: {
      envKey: 'DEDUP_MAX_INDEX_ENTRIES',
      defaultValue: 0,
      description: 'Shrink later windows when the duplicate index grows past this size (0 disables).',
      schema: z.number().int().min(0),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
