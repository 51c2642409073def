/**
 * Logging Configuration Section
 *
 * Log level and output settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const loggingSection = {
  name: 'logging',
  description: 'Logging configuration.',
  options: {
    level: {
      envKey: 'LOG_LEVEL',
      defaultValue: 'info',
      description: 'Log level: fatal, error, warn, info, debug, or trace.',
      schema: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']),
      allowedValues: ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const,
    },
    pretty: {
      envKey: 'DEDUP_LOG_PRETTY',
      defaultValue: true,
      description: 'Pretty-print logs outside production (pino-pretty).',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;
