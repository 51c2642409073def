/**
 * Open the SQLite document store for a command
 */

import { config } from '../../config/index.js';
import { resolveDataPath } from '../../config/registry/parsers.js';
import { createSQLiteConnection } from '../../db/factory.js';
import { SqliteDocumentStore } from '../../core/adapters/sqlite-store.adapter.js';

export function openStore(path?: string): SqliteDocumentStore {
  const connection = createSQLiteConnection({
    path: path ? resolveDataPath(path, '') : config.store.path,
    busyTimeoutMs: config.store.busyTimeoutMs,
  });
  return new SqliteDocumentStore(connection);
}
