/**
 * Store Configuration Section
 *
 * SQLite document store settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const storeSection = {
  name: 'store',
  description: 'Document store configuration.',
  options: {
    path: {
      envKey: 'DEDUP_STORE_PATH',
      defaultValue: 'documents.db',
      description: 'SQLite document store path, relative to the data directory, or :memory:.',
      schema: z.string(),
      parse: 'path',
    },
    timeoutMs: {
      envKey: 'DEDUP_STORE_TIMEOUT_MS',
      defaultValue: 30000,
      description: 'Timeout for each store call (scroll page, delete, get) in milliseconds.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    busyTimeoutMs: {
      envKey: 'DEDUP_STORE_BUSY_TIMEOUT_MS',
      defaultValue: 5000,
      description: 'SQLite busy timeout in milliseconds.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
