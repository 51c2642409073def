/**
 * Audit sinks
 *
 * Append-only stream of one entry per resolved group. The JSON Lines sink
 * serializes appends so that concurrent eliminations never interleave lines.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { AuditEntry } from '../../core/types.js';

export interface AuditSink {
  append(entry: AuditEntry): Promise<void>;
  close(): Promise<void>;
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(structuredClone(entry));
  }

  async close(): Promise<void> {}
}

export class JsonlAuditSink implements AuditSink {
  private tail: Promise<void> = Promise.resolve();
  private prepared = false;

  constructor(readonly path: string) {}

  append(entry: AuditEntry): Promise<void> {
    const line = `${JSON.stringify(entry)}\n`;
    const write = this.tail.then(async () => {
      if (!this.prepared) {
        await mkdir(dirname(this.path), { recursive: true });
        this.prepared = true;
      }
      await appendFile(this.path, line, 'utf8');
    });
    // A failed write is reported to its caller only; later appends still run
    this.tail = write.catch(() => undefined);
    return write;
  }

  async close(): Promise<void> {
    await this.tail;
  }
}

/** Drops entries; used when no audit log is configured */
export class NullAuditSink implements AuditSink {
  async append(): Promise<void> {}
  async close(): Promise<void> {}
}
