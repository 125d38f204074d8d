/**
 * OutcomeTracker -- bounded history of processed issues and what was done
 * about them. Feeds reporting and the recurring-failure forecast.
 */

import { DAY_MS, systemClock, type Clock, type Issue, type OutcomeReason, type RemediationType } from './types.js';

export interface OutcomeRecord {
  issue: Issue;
  reason: OutcomeReason;
  actionId?: string;
  actionType?: RemediationType;
  recordedAt: number;
}

export interface OutcomeTrackerOptions {
  clock?: Clock;
  retentionMs?: number;
  maxEntries?: number;
}

export class OutcomeTracker {
  private entries: OutcomeRecord[] = [];
  private readonly clock: Clock;
  private readonly retentionMs: number;
  private readonly maxEntries: number;

  constructor(opts: OutcomeTrackerOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.retentionMs = opts.retentionMs ?? 7 * DAY_MS;
    this.maxEntries = opts.maxEntries ?? 1000;
  }

  record(issue: Issue, reason: OutcomeReason, action?: { actionId: string; actionType: RemediationType }): void {
    this.entries.push({
      issue: { ...issue },
      reason,
      actionId: action?.actionId,
      actionType: action?.actionType,
      recordedAt: this.clock(),
    });
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
  }

  /**
   * Start times of distinct failures seen on a component, oldest first.
   * Forecast-derived issues are excluded so forecasts do not feed themselves.
   */
  failureTimes(component: string): number[] {
    const cutoff = this.clock() - this.retentionMs;
    const times = new Set<number>();
    for (const entry of this.entries) {
      const { issue } = entry;
      if (issue.component !== component || issue.source === 'trend') continue;
      if (issue.startedAt < cutoff) continue;
      times.add(issue.startedAt);
    }
    return [...times].sort((a, b) => a - b);
  }

  /** Components with at least one recorded non-forecast failure. */
  components(): string[] {
    const names = new Set<string>();
    for (const entry of this.entries) {
      if (entry.issue.source !== 'trend') names.add(entry.issue.component);
    }
    return [...names];
  }

  history(limit = 50): OutcomeRecord[] {
    return this.entries.slice(-limit).reverse();
  }

  /** Drop records older than the retention window. */
  prune(): number {
    const cutoff = this.clock() - this.retentionMs;
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.recordedAt >= cutoff);
    return before - this.entries.length;
  }
}
