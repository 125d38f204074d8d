import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * Create tables directly with CREATE TABLE IF NOT EXISTS.
 *
 * Safe to run on every boot; existing data is left untouched.
 */
export function runMigrations(sqlite: DatabaseType): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS remediation_actions (
      action_id TEXT PRIMARY KEY,
      target TEXT NOT NULL,
      action_type TEXT NOT NULL,
      status TEXT NOT NULL,
      cooldown_minutes INTEGER NOT NULL,
      issue_fingerprint TEXT,
      description TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      executed_at INTEGER,
      result TEXT,
      error TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_actions_target_type ON remediation_actions(target, action_type, executed_at);
    CREATE INDEX IF NOT EXISTS idx_actions_executed_at ON remediation_actions(executed_at);

    CREATE TABLE IF NOT EXISTS preferences (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  console.log('[DB] Schema ready');
}
