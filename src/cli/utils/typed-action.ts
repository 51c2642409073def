/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander hands actions loosely typed option bags. Each command declares a
 * zod schema instead; the wrapper validates the options against it, so the
 * handler receives typed values and bad flags surface as configuration
 * errors. Failures go through handleCliError.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { ConfigurationInvalidError, DedupError, ErrorCodes } from '../../core/errors.js';
import { formatZodErrors } from '../../config/registry/schema-builder.js';
import { handleCliError } from './errors.js';

/**
 * Global CLI options available to all commands via --option flags
 */
const globalOptionsSchema = z.object({
  /** Output format: json or table */
  format: z.enum(['json', 'table']).default('json'),
});

export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationInvalidError(formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * @example
 * ```typescript
 * const optionsSchema = z.object({ store: z.string().optional() });
 *
 * program
 *   .command('my-command')
 *   .option('--store <path>')
 *   .action(typedAction(optionsSchema, async (options, globalOpts, args) => {
 *     console.log(options.store);
 *   }));
 * ```
 */
export function typedAction<S extends z.ZodTypeAny>(
  schema: S,
  handler: (options: z.infer<S>, globalOpts: GlobalOptions, args: string[]) => Promise<void>
): (...actionArgs: unknown[]) => Promise<void> {
  return async (...actionArgs: unknown[]) => {
    try {
      // Commander passes the command itself last
      const cmd = actionArgs[actionArgs.length - 1];
      if (!(cmd instanceof Command)) {
        throw new DedupError('Action invoked without its command', ErrorCodes.INTERNAL_ERROR);
      }
      const options = parseOptions(schema, cmd.opts());
      const globalOpts = parseOptions(globalOptionsSchema, cmd.optsWithGlobals());
      await handler(options, globalOpts, cmd.args);
    } catch (error) {
      handleCliError(error);
    }
  };
}
