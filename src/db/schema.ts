import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { ACTION_STATUSES, REMEDIATION_TYPES } from '../engine/types.js';

// ---------------------------------------------------------------------------
// Remediation actions -- cooldown and rate-limit decisions read this table
// ---------------------------------------------------------------------------
export const remediationActions = sqliteTable(
  'remediation_actions',
  {
    actionId: text('action_id').primaryKey(),
    target: text('target').notNull(),
    actionType: text('action_type', { enum: REMEDIATION_TYPES }).notNull(),
    status: text('status', { enum: ACTION_STATUSES }).notNull(),
    cooldownMinutes: integer('cooldown_minutes').notNull(),
    issueFingerprint: text('issue_fingerprint'),
    description: text('description').notNull(),
    createdAt: integer('created_at').notNull(),  // epoch ms
    executedAt: integer('executed_at'),          // epoch ms, set on dispatch
    result: text('result'),
    error: text('error'),
  },
  (table) => [
    index('idx_actions_target_type').on(table.target, table.actionType, table.executedAt),
    index('idx_actions_executed_at').on(table.executedAt),
  ],
);

// ---------------------------------------------------------------------------
// Preferences -- operator settings (key-value)
// ---------------------------------------------------------------------------
export const preferences = sqliteTable('preferences', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: text('updated_at').notNull().default(sql`(datetime('now'))`),
});
