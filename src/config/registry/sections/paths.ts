/**
 * Paths Configuration Section
 *
 * Data directory, audit log and checkpoint locations.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { getDataDir } from '../parsers.js';

export const pathsSection = {
  name: 'paths',
  description: 'File path configuration.',
  options: {
    dataDir: {
      envKey: 'DEDUP_DATA_DIR',
      defaultValue: 'data',
      description: 'Base data directory. Supports ~ expansion.',
      schema: z.string(),
      // DEDUP_DATA_DIR, else ~/.dedupe-scanner for an installed package, else ./data
      parse: () => getDataDir(),
    },
    auditLog: {
      envKey: 'DEDUP_AUDIT_LOG',
      defaultValue: '',
      description: 'JSON Lines file receiving one audit entry per resolved group. Empty disables.',
      schema: z.string(),
      parse: 'optionalPath',
    },
    checkpoint: {
      envKey: 'DEDUP_CHECKPOINT_PATH',
      defaultValue: '',
      description: 'Checkpoint file used to resume an interrupted scan. Empty disables.',
      schema: z.string(),
      parse: 'optionalPath',
    },
  },
} satisfies ConfigSectionMeta;
