import { eq, sql } from 'drizzle-orm';
import type { PreferenceStore } from '../engine/engine.js';
import type { AppDatabase } from './index.js';
import { preferences } from './schema.js';

// ---------------------------------------------------------------------------
// Preference operations (upsert semantics)
// ---------------------------------------------------------------------------

export class SqlitePreferenceStore implements PreferenceStore {
  constructor(private readonly db: AppDatabase) {}

  get(key: string): string | null {
    const row = this.db.select().from(preferences).where(eq(preferences.key, key)).get();
    return row?.value ?? null;
  }

  set(key: string, value: string): void {
    this.db.insert(preferences)
      .values({ key, value })
      .onConflictDoUpdate({
        target: preferences.key,
        set: {
          value,
          updatedAt: sql`datetime('now')`,
        },
      })
      .run();
  }

  all(): Array<{ key: string; value: string; updatedAt: string }> {
    return this.db.select().from(preferences).all();
  }
}
