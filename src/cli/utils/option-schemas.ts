/**
 * Zod schemas for flag values
 *
 * Flags arrive as strings; these convert them with the same parsers the
 * environment goes through, so `--window 2h` and `DEDUP_WINDOW_LENGTH=2h`
 * mean the same thing.
 */

import { z } from 'zod';
import type { FieldValue } from '../../core/types.js';
import {
  parseDurationMs,
  parseStringArray,
  parseTimestamp,
} from '../../config/registry/parsers.js';

export const csvList = z
  .string()
  .transform((value) => parseStringArray(value, []));

export const duration = z.string().transform((value, ctx) => {
  const ms = parseDurationMs(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
    return z.NEVER;
  }
  return ms;
});

export const timestamp = z.string().transform((value, ctx) => {
  const ms = parseTimestamp(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date or epoch "${value}"` });
    return z.NEVER;
  }
  return ms;
});

export const integer = z.coerce.number().int();
export const positiveInteger = integer.min(1);

const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ])
);

/** A JSON object usable as document fields */
export const documentFields = z.record(fieldValueSchema);
