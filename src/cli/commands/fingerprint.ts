/**
 * Fingerprint CLI Command
 *
 * Print the fingerprint of one JSON document, to check a field list before
 * running a scan.
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { HASH_ALGORITHMS } from '../../core/types.js';
import { createInvalidParameterError } from '../../core/errors.js';
import { createFingerprintExtractor } from '../../services/dedup/fingerprint.js';
import { createHasher } from '../../services/dedup/hashers.js';
import { formatOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';
import { parseJsonInput, readStdin } from '../utils/stdin.js';
import { csvList, documentFields } from '../utils/option-schemas.js';

const fingerprintFlagsSchema = z.object({
  doc: z.string().optional(),
  fields: csvList.optional(),
  hash: z.enum(HASH_ALGORITHMS).optional(),
});

export function addFingerprintCommand(program: Command): void {
  program
    .command('fingerprint')
    .description('Print the fingerprint of a JSON document (from --doc or stdin)')
    .option('--doc <json>', 'Document as a JSON object')
    .option('--fields <list>', 'Comma-separated fingerprint fields (default: DEDUP_FIELDS)')
    .addOption(new Option('--hash <algorithm>', 'Fingerprint hash').choices([...HASH_ALGORITHMS]))
    .action(
      typedAction(fingerprintFlagsSchema, async (flags, globalOpts) => {
        const text = flags.doc ?? (await readStdin());
        if (!text) {
          throw createInvalidParameterError('doc', 'pass --doc or pipe a document on stdin');
        }

        const parsed = documentFields.safeParse(parseJsonInput('doc', text));
        if (!parsed.success) throw createInvalidParameterError('doc', 'expected a JSON object');

        const algorithm = flags.hash ?? config.scan.hashAlgorithm;
        const extractor = createFingerprintExtractor(
          flags.fields ?? config.scan.fields,
          createHasher(algorithm)
        );
        const document = { fields: parsed.data };

        console.log(
          formatOutput(
            {
              fingerprint: extractor.fingerprint(document),
              algorithm,
              fields: extractor.fields,
              canonical: extractor.canonicalForm(document),
            },
            globalOpts.format
          )
        );
      })
    );
}
