/**
 * Effective scan options
 *
 * Merges the environment-derived scan section with per-invocation overrides
 * (CLI flags, library callers) and validates the combination. Anything that
 * would make the scan meaningless is rejected here, before the first read.
 */

import { z } from 'zod';
import type { Config } from './index.js';
import { HASH_ALGORITHMS, SCAN_MODES, TIE_BREAK_RULES } from '../core/types.js';
import { ConfigurationInvalidError } from '../core/errors.js';
import { formatZodErrors } from './registry/schema-builder.js';

const scanOptionsSchema = z
  .object({
    fields: z
      .array(z.string().min(1, 'field names must not be empty'))
      .min(1, 'at least one fingerprint field is required'),
    hashAlgorithm: z.enum(HASH_ALGORITHMS),
    windowLengthMs: z.number().int().positive('window length must be positive').optional(),
    overlapMs: z.number().int().min(0, 'overlap must not be negative').optional(),
    range: z.object({
      from: z.number().optional(),
      to: z.number().optional(),
    }),
    mode: z.enum(SCAN_MODES),
    verify: z.boolean(),
    verifyIgnoreFields: z.array(z.string()),
    tieBreak: z.enum(TIE_BREAK_RULES),
    pageSize: z.number().int().min(1),
    deleteConcurrency: z.number().int().min(1),
    maxIndexEntries: z.number().int().min(0),
    storeTimeoutMs: z.number().int().min(1),
  })
  .superRefine((options, ctx) => {
    const { windowLengthMs, overlapMs, range } = options;
    if (windowLengthMs !== undefined && overlapMs !== undefined && overlapMs >= windowLengthMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['overlapMs'],
        message: `overlap (${overlapMs}ms) must be shorter than the window length (${windowLengthMs}ms)`,
      });
    }
    if (range.from !== undefined && range.to !== undefined && range.from >= range.to) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['range'],
        message: 'range start must be before range end',
      });
    }
  });

export type ScanOptions = z.infer<typeof scanOptionsSchema>;

export type ScanOverrides = Partial<Omit<ScanOptions, 'range'>> & {
  from?: number;
  to?: number;
};

/**
 * Resolve the options of one scan.
 *
 * @throws ConfigurationInvalidError listing every invalid option
 */
export function resolveScanOptions(config: Config, overrides: ScanOverrides = {}): ScanOptions {
  const { scan } = config;
  const candidate = {
    fields: overrides.fields ?? scan.fields,
    hashAlgorithm: overrides.hashAlgorithm ?? scan.hashAlgorithm,
    windowLengthMs: overrides.windowLengthMs ?? scan.windowLengthMs,
    overlapMs: overrides.overlapMs ?? scan.overlapMs,
    range: {
      from: overrides.from ?? scan.from,
      to: overrides.to ?? scan.to,
    },
    mode: overrides.mode ?? scan.mode,
    verify: overrides.verify ?? scan.verify,
    verifyIgnoreFields: overrides.verifyIgnoreFields ?? scan.verifyIgnoreFields,
    tieBreak: overrides.tieBreak ?? scan.tieBreak,
    pageSize: overrides.pageSize ?? scan.pageSize,
    deleteConcurrency: overrides.deleteConcurrency ?? scan.deleteConcurrency,
    maxIndexEntries: overrides.maxIndexEntries ?? scan.maxIndexEntries,
    storeTimeoutMs: overrides.storeTimeoutMs ?? config.store.timeoutMs,
  };

  const result = scanOptionsSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationInvalidError(formatZodErrors(result.error));
  }
  return result.data;
}

/** True when both a window length and an overlap are configured */
export function isWindowed<T extends Pick<ScanOptions, 'windowLengthMs' | 'overlapMs'>>(
  options: T
): options is T & { windowLengthMs: number; overlapMs: number } {
  return options.windowLengthMs !== undefined && options.overlapMs !== undefined;
}
