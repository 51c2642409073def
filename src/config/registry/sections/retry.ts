/**
 * Retry Configuration Section
 *
 * Store operation retry settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const retrySection = {
  name: 'retry',
  description: 'Store operation retry configuration.',
  options: {
    maxAttempts: {
      envKey: 'DEDUP_RETRY_MAX_ATTEMPTS',
      defaultValue: 3,
      description: 'Maximum attempts per store call.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    initialDelayMs: {
      envKey: 'DEDUP_RETRY_INITIAL_DELAY_MS',
      defaultValue: 100,
      description: 'Initial delay between retries in milliseconds.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    maxDelayMs: {
      envKey: 'DEDUP_RETRY_MAX_DELAY_MS',
      defaultValue: 5000,
      description: 'Maximum delay between retries in milliseconds.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    backoffMultiplier: {
      envKey: 'DEDUP_RETRY_BACKOFF_MULTIPLIER',
      defaultValue: 2,
      description: 'Backoff multiplier for retry delays.',
      schema: z.number().min(1),
    },
  },
} satisfies ConfigSectionMeta;
