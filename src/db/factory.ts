import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('db-factory');

export type DocumentDb = BetterSQLite3Database<typeof schema>;

/**
 * SQLite database connection result
 */
export interface SQLiteConnection {
  db: DocumentDb;
  sqlite: Database.Database;
}

export interface SQLiteConnectionOptions {
  /** File path, or ':memory:' */
  path: string;
  busyTimeoutMs: number;
  readonly?: boolean;
}

/**
 * Open (and initialise) the SQLite document database
 */
export function createSQLiteConnection(options: SQLiteConnectionOptions): SQLiteConnection {
  const inMemory = options.path === ':memory:';

  // Ensure data directory exists
  if (!inMemory) {
    const dir = dirname(options.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let sqlite: Database.Database;

  try {
    sqlite = new Database(options.path, {
      readonly: options.readonly ?? false,
      timeout: options.busyTimeoutMs,
    });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    // Check for common native module errors
    if (errorMessage.includes('MODULE_NOT_FOUND') || errorMessage.includes('Cannot find module')) {
      throw new Error(
        `Failed to load better-sqlite3 native module.\n` +
          `Error: ${errorMessage}\n\n` +
          `Solutions:\n` +
          `- Run: npm rebuild better-sqlite3\n` +
          `- Or reinstall: npm install --force better-sqlite3`
      );
    }

    // Re-throw with additional context
    throw new Error(`Failed to create database connection: ${errorMessage}`);
  }

  if (!inMemory && !options.readonly) {
    sqlite.pragma('journal_mode = WAL');
  }

  // Wait for locks instead of failing fast
  sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs}`);

  if (!options.readonly) {
    sqlite.exec(schema.DOCUMENTS_DDL);
  }

  logger.debug({ path: options.path }, 'Opened document database');

  const db = drizzle(sqlite, { schema });
  return { db, sqlite };
}
