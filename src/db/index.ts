import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: DatabaseType;
  db: AppDatabase;
}

/**
 * Open (or create) the SQLite database at `path`. `:memory:` gives a
 * throwaway database for tests.
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ':memory:') {
    // Ensure the data directory exists before opening the database file
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite: DatabaseType = new Database(path);

  if (path !== ':memory:') {
    // Enable WAL journal mode for concurrent read performance
    sqlite.pragma('journal_mode = WAL');
    // Safe in WAL mode, skips fsync on most writes
    sqlite.pragma('synchronous = NORMAL');
  }

  return { sqlite, db: drizzle(sqlite, { schema }) };
}
