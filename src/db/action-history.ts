/**
 * SQLite-backed action history. Cooldown and rate-limit queries hit the
 * (target, action_type, executed_at) index, so safety limits survive a
 * process restart.
 */

import { and, desc, eq, gte, inArray, lt, sql } from 'drizzle-orm';
import {
  buildStats,
  isTerminal,
  type ActionCompletion,
  type ActionHistoryStore,
  type ActionStats,
} from '../engine/action-history.js';
import { DISPATCHED_STATUSES, type RemediationAction, type RemediationType } from '../engine/types.js';
import type { AppDatabase } from './index.js';
import { remediationActions } from './schema.js';

type ActionRow = typeof remediationActions.$inferSelect;

function fromRow(row: ActionRow): RemediationAction {
  return {
    actionId: row.actionId,
    target: row.target,
    actionType: row.actionType,
    status: row.status,
    cooldownMinutes: row.cooldownMinutes,
    issueFingerprint: row.issueFingerprint,
    description: row.description,
    createdAt: row.createdAt,
    executedAt: row.executedAt ?? undefined,
    result: row.result ?? undefined,
    error: row.error ?? undefined,
  };
}

export class SqliteActionHistory implements ActionHistoryStore {
  constructor(private readonly db: AppDatabase) {}

  insert(action: RemediationAction): void {
    this.db.insert(remediationActions).values({
      actionId: action.actionId,
      target: action.target,
      actionType: action.actionType,
      status: action.status,
      cooldownMinutes: action.cooldownMinutes,
      issueFingerprint: action.issueFingerprint,
      description: action.description,
      createdAt: action.createdAt,
      executedAt: action.executedAt ?? null,
      result: action.result ?? null,
      error: action.error ?? null,
    }).run();
  }

  complete(actionId: string, completion: ActionCompletion): RemediationAction | null {
    const current = this.get(actionId);
    if (!current) return null;
    if (isTerminal(current)) {
      throw new Error(`Action ${actionId} is already ${current.status}`);
    }

    const row = this.db.update(remediationActions)
      .set({
        status: completion.status,
        result: completion.result ?? null,
        error: completion.error ?? null,
      })
      .where(eq(remediationActions.actionId, actionId))
      .returning()
      .get();
    return row ? fromRow(row) : null;
  }

  get(actionId: string): RemediationAction | null {
    const row = this.db.select().from(remediationActions)
      .where(eq(remediationActions.actionId, actionId))
      .get();
    return row ? fromRow(row) : null;
  }

  latestDispatched(target: string, actionType: RemediationType): RemediationAction | null {
    const row = this.db.select().from(remediationActions)
      .where(and(
        eq(remediationActions.target, target),
        eq(remediationActions.actionType, actionType),
        inArray(remediationActions.status, DISPATCHED_STATUSES),
      ))
      .orderBy(desc(sql`coalesce(${remediationActions.executedAt}, ${remediationActions.createdAt})`))
      .limit(1)
      .get();
    return row ? fromRow(row) : null;
  }

  countDispatchedSince(since: number): number {
    const row = this.db.select({ count: sql<number>`count(*)` })
      .from(remediationActions)
      .where(and(
        inArray(remediationActions.status, DISPATCHED_STATUSES),
        gte(sql`coalesce(${remediationActions.executedAt}, ${remediationActions.createdAt})`, since),
      ))
      .get();
    return row?.count ?? 0;
  }

  recent(limit: number): RemediationAction[] {
    return this.db.select().from(remediationActions)
      .orderBy(desc(remediationActions.createdAt), desc(sql`rowid`))
      .limit(Math.max(0, limit))
      .all()
      .map(fromRow);
  }

  stats(): ActionStats {
    const rows = this.db.select({ status: remediationActions.status, count: sql<number>`count(*)` })
      .from(remediationActions)
      .groupBy(remediationActions.status)
      .all();

    const counts = { total: 0, successful: 0, failed: 0, skipped: 0, inProgress: 0 };
    for (const row of rows) {
      counts.total += row.count;
      if (row.status === 'SUCCESS') counts.successful += row.count;
      else if (row.status === 'FAILED') counts.failed += row.count;
      else if (row.status === 'SKIPPED') counts.skipped += row.count;
      else counts.inProgress += row.count;
    }
    return buildStats(counts);
  }

  failStale(startedBefore: number, error: string): number {
    const result = this.db.update(remediationActions)
      .set({ status: 'FAILED', error })
      .where(and(
        eq(remediationActions.status, 'IN_PROGRESS'),
        lt(sql`coalesce(${remediationActions.executedAt}, ${remediationActions.createdAt})`, startedBefore),
      ))
      .run();
    return result.changes;
  }

  prune(before: number): number {
    const result = this.db.delete(remediationActions)
      .where(and(
        lt(remediationActions.createdAt, before),
        inArray(remediationActions.status, ['SUCCESS', 'FAILED', 'SKIPPED']),
      ))
      .run();
    return result.changes;
  }
}
