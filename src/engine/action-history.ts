/**
 * Action history -- the record that cooldown and rate-limit decisions are
 * computed from. The SQLite-backed store in db/ keeps these limits intact
 * across a restart; the in-memory store is the default for tests.
 */

import { DISPATCHED_STATUSES, type RemediationAction, type RemediationType } from './types.js';

export interface ActionCompletion {
  status: 'SUCCESS' | 'FAILED';
  result?: string;
  error?: string;
}

export interface ActionStats {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  inProgress: number;
  /** Percentage of finished actions that succeeded, 0 when none finished. */
  successRate: number;
}

export interface ActionHistoryStore {
  insert(action: RemediationAction): void;
  /** Finish an in-flight action. Throws if the action is already terminal. */
  complete(actionId: string, completion: ActionCompletion): RemediationAction | null;
  get(actionId: string): RemediationAction | null;
  /** Most recent dispatched (in-flight or finished) action for the pair. */
  latestDispatched(target: string, actionType: RemediationType): RemediationAction | null;
  /** Dispatched actions whose execution started at or after `since`. */
  countDispatchedSince(since: number): number;
  recent(limit: number): RemediationAction[];
  stats(): ActionStats;
  /** Delete finished or skipped actions created before `before`. */
  prune(before: number): number;
  /** Mark IN_PROGRESS actions dispatched before `startedBefore` as FAILED. */
  failStale(startedBefore: number, error: string): number;
}

export function isTerminal(action: RemediationAction): boolean {
  return action.status === 'SUCCESS' || action.status === 'FAILED';
}

export function dispatchTime(action: RemediationAction): number {
  return action.executedAt ?? action.createdAt;
}

export function buildStats(counts: Omit<ActionStats, 'successRate'>): ActionStats {
  const finished = counts.successful + counts.failed;
  return {
    ...counts,
    successRate: finished > 0 ? Math.round((counts.successful / finished) * 1000) / 10 : 0,
  };
}

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

export class InMemoryActionHistory implements ActionHistoryStore {
  private readonly actions = new Map<string, RemediationAction>();

  insert(action: RemediationAction): void {
    if (this.actions.has(action.actionId)) {
      throw new Error(`Action ${action.actionId} already recorded`);
    }
    this.actions.set(action.actionId, { ...action });
  }

  complete(actionId: string, completion: ActionCompletion): RemediationAction | null {
    const action = this.actions.get(actionId);
    if (!action) return null;
    if (isTerminal(action)) {
      throw new Error(`Action ${actionId} is already ${action.status}`);
    }
    action.status = completion.status;
    action.result = completion.result;
    action.error = completion.error;
    return { ...action };
  }

  get(actionId: string): RemediationAction | null {
    const action = this.actions.get(actionId);
    return action ? { ...action } : null;
  }

  latestDispatched(target: string, actionType: RemediationType): RemediationAction | null {
    let latest: RemediationAction | null = null;
    for (const action of this.actions.values()) {
      if (action.target !== target || action.actionType !== actionType) continue;
      if (!DISPATCHED_STATUSES.includes(action.status)) continue;
      if (!latest || dispatchTime(action) >= dispatchTime(latest)) latest = action;
    }
    return latest ? { ...latest } : null;
  }

  countDispatchedSince(since: number): number {
    let count = 0;
    for (const action of this.actions.values()) {
      if (DISPATCHED_STATUSES.includes(action.status) && dispatchTime(action) >= since) count++;
    }
    return count;
  }

  recent(limit: number): RemediationAction[] {
    return [...this.actions.values()]
      .reverse()
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, Math.max(0, limit))
      .map((action) => ({ ...action }));
  }

  stats(): ActionStats {
    const counts = { total: 0, successful: 0, failed: 0, skipped: 0, inProgress: 0 };
    for (const action of this.actions.values()) {
      counts.total++;
      if (action.status === 'SUCCESS') counts.successful++;
      else if (action.status === 'FAILED') counts.failed++;
      else if (action.status === 'SKIPPED') counts.skipped++;
      else counts.inProgress++;
    }
    return buildStats(counts);
  }

  failStale(startedBefore: number, error: string): number {
    let failed = 0;
    for (const action of this.actions.values()) {
      if (action.status === 'IN_PROGRESS' && dispatchTime(action) < startedBefore) {
        action.status = 'FAILED';
        action.error = error;
        failed++;
      }
    }
    return failed;
  }

  prune(before: number): number {
    let removed = 0;
    for (const [id, action] of this.actions) {
      if (action.createdAt < before && (isTerminal(action) || action.status === 'SKIPPED')) {
        this.actions.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
