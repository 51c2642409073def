/**
 * Scan CLI Command
 *
 * Find duplicate documents in the SQLite store and report or delete them.
 * Flags override the DEDUP_* environment.
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { resolveDataPath } from '../../config/registry/parsers.js';
import { resolveScanOptions } from '../../config/scan-options.js';
import { HASH_ALGORITHMS, SCAN_MODES, TIE_BREAK_RULES } from '../../core/types.js';
import { runScan } from '../../services/dedup/scanner.js';
import { JsonlAuditSink } from '../../services/dedup/audit-log.js';
import { FileCheckpointStore } from '../../services/dedup/checkpoint.js';
import { createComponentLogger } from '../../utils/logger.js';
import { formatOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';
import { openStore } from '../utils/store.js';
import { csvList, duration, integer, positiveInteger, timestamp } from '../utils/option-schemas.js';

const logger = createComponentLogger('cli-scan');

const scanFlagsSchema = z.object({
  fields: csvList.optional(),
  hash: z.enum(HASH_ALGORITHMS).optional(),
  window: duration.optional(),
  overlap: duration.optional(),
  from: timestamp.optional(),
  to: timestamp.optional(),
  mode: z.enum(SCAN_MODES).optional(),
  verify: z.boolean().optional(),
  ignoreFields: csvList.optional(),
  tieBreak: z.enum(TIE_BREAK_RULES).optional(),
  pageSize: positiveInteger.optional(),
  concurrency: positiveInteger.optional(),
  maxIndexEntries: integer.optional(),
  store: z.string().optional(),
  auditLog: z.string().optional(),
  checkpoint: z.string().optional(),
  resume: z.boolean().default(false),
});

export function addScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Find duplicate documents and report (dry run) or delete (live) them')
    .option('--fields <list>', 'Comma-separated fingerprint fields, in order')
    .addOption(new Option('--hash <algorithm>', 'Fingerprint hash').choices([...HASH_ALGORITHMS]))
    .option('--window <duration>', 'Window length (e.g. 6h, 1d)')
    .option('--overlap <duration>', 'Overlap between windows; covers the largest duplicate skew')
    .option('--from <time>', 'Inclusive start (ISO date or epoch ms)')
    .option('--to <time>', 'Exclusive end (ISO date or epoch ms)')
    .addOption(new Option('--mode <mode>', 'dryRun reports, live deletes').choices([...SCAN_MODES]))
    .option('--verify', 'Compare full documents before eliminating')
    .option('--ignore-fields <list>', 'Fields left out of verification')
    .addOption(
      new Option('--tie-break <rule>', 'Which member survives').choices([...TIE_BREAK_RULES])
    )
    .option('--page-size <n>', 'Documents per scroll page')
    .option('--concurrency <n>', 'Groups eliminated in parallel')
    .option('--max-index-entries <n>', 'Shrink windows above this index size (0 disables)')
    .option('--store <path>', 'SQLite store path (default: DEDUP_STORE_PATH)')
    .option('--audit-log <path>', 'Append audit entries to this JSON Lines file')
    .option('--checkpoint <path>', 'Checkpoint file for resuming')
    .option('--resume', 'Resume from the checkpoint', false)
    .action(
      typedAction(scanFlagsSchema, async (flags, globalOpts) => {
        const options = resolveScanOptions(config, {
          fields: flags.fields,
          hashAlgorithm: flags.hash,
          windowLengthMs: flags.window,
          overlapMs: flags.overlap,
          from: flags.from,
          to: flags.to,
          mode: flags.mode,
          verify: flags.verify,
          verifyIgnoreFields: flags.ignoreFields,
          tieBreak: flags.tieBreak,
          pageSize: flags.pageSize,
          deleteConcurrency: flags.concurrency,
          maxIndexEntries: flags.maxIndexEntries,
        });

        const auditPath = flags.auditLog
          ? resolveDataPath(flags.auditLog, '')
          : config.paths.auditLog;
        const checkpointPath = flags.checkpoint
          ? resolveDataPath(flags.checkpoint, '')
          : config.paths.checkpoint;

        const store = openStore(flags.store);
        const controller = new AbortController();
        const onSigint = (): void => {
          logger.warn('Interrupt received, finishing in-flight deletes and stopping');
          controller.abort();
        };
        process.once('SIGINT', onSigint);

        try {
          const report = await runScan(
            {
              store,
              auditSink: auditPath ? new JsonlAuditSink(auditPath) : undefined,
              checkpointStore: checkpointPath ? new FileCheckpointStore(checkpointPath) : undefined,
            },
            options,
            { signal: controller.signal, resume: flags.resume }
          );

          console.log(formatOutput(report, globalOpts.format));
          if (report.cancelled) {
            process.exitCode = 130;
          } else if (report.deleteFailures > 0) {
            process.exitCode = 1;
          }
        } finally {
          process.removeListener('SIGINT', onSigint);
          await store.close();
        }
      })
    );
}
