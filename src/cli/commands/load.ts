/**
 * Load CLI Command
 *
 * Bulk-load newline-delimited JSON into the SQLite store. Each line is one
 * document; the id and timestamp come from configurable fields and the whole
 * object minus the id is stored as the document body.
 */

import { Command } from 'commander';
import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import type { StoredDocument } from '../../core/types.js';
import { createInvalidParameterError } from '../../core/errors.js';
import { parseTimestamp } from '../../config/registry/parsers.js';
import { createComponentLogger } from '../../utils/logger.js';
import { formatOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';
import { openStore } from '../utils/store.js';
import { parseJsonInput } from '../utils/stdin.js';
import { documentFields, positiveInteger } from '../utils/option-schemas.js';

const logger = createComponentLogger('cli-load');

const loadFlagsSchema = z.object({
  idField: z.string().min(1).default('id'),
  timestampField: z.string().min(1).default('timestamp'),
  batchSize: positiveInteger.default(1000),
  store: z.string().optional(),
});

/**
 * Turn one parsed line into a document
 *
 * @throws DedupError (E1001) when the id or timestamp is missing or unusable
 */
export function toStoredDocument(
  value: unknown,
  idField: string,
  timestampField: string,
  location: string
): StoredDocument {
  const parsed = documentFields.safeParse(value);
  if (!parsed.success) {
    throw createInvalidParameterError(location, 'expected a JSON object');
  }
  const { [idField]: rawId, ...fields } = parsed.data;

  let id: string;
  if (typeof rawId === 'string' && rawId !== '') {
    id = rawId;
  } else if (typeof rawId === 'number') {
    id = String(rawId);
  } else {
    throw createInvalidParameterError(location, `missing "${idField}"`);
  }

  const rawTimestamp = fields[timestampField];
  let ts: number | undefined;
  if (typeof rawTimestamp === 'number') {
    ts = rawTimestamp;
  } else if (typeof rawTimestamp === 'string') {
    ts = parseTimestamp(rawTimestamp);
  }
  if (ts === undefined || !Number.isFinite(ts)) {
    throw createInvalidParameterError(location, `missing or unparseable "${timestampField}"`);
  }

  return { id, timestamp: ts, fields };
}

export function addLoadCommand(program: Command): void {
  program
    .command('load <file>')
    .description('Load newline-delimited JSON documents into the SQLite store')
    .option('--id-field <name>', 'Field holding the document id', 'id')
    .option('--timestamp-field <name>', 'Field holding the ordering timestamp', 'timestamp')
    .option('--batch-size <n>', 'Documents per insert transaction', '1000')
    .option('--store <path>', 'SQLite store path (default: DEDUP_STORE_PATH)')
    .action(
      typedAction(loadFlagsSchema, async (flags, globalOpts, args) => {
        const [file] = args;
        if (!file) throw createInvalidParameterError('file', 'a path is required');

        const store = openStore(flags.store);
        try {
          const lines = createInterface({
            input: createReadStream(file, 'utf8'),
            crlfDelay: Infinity,
          });

          let batch: StoredDocument[] = [];
          let loaded = 0;
          let lineNumber = 0;
          for await (const line of lines) {
            lineNumber++;
            if (line.trim() === '') continue;
            const location = `${file}:${lineNumber}`;
            batch.push(
              toStoredDocument(
                parseJsonInput(location, line),
                flags.idField,
                flags.timestampField,
                location
              )
            );
            if (batch.length >= flags.batchSize) {
              loaded += await store.insertMany(batch);
              batch = [];
            }
          }
          loaded += await store.insertMany(batch);

          logger.info({ file, loaded }, 'Documents loaded');
          const total = await store.count();
          console.log(formatOutput({ file, loaded, total }, globalOpts.format));
        } finally {
          await store.close();
        }
      })
    );
}
