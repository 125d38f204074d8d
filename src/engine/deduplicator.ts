/**
 * Deduplicator -- turns alert payloads and local detections into Issues.
 *
 *  - At most one open Issue per fingerprint; repeat sightings update it in place
 *  - A resolved sighting closes the Issue and drops any acknowledgement
 *  - All mutation of one fingerprint is serialized through a keyed mutex
 *  - New-issue and resolved callbacks run with per-callback failure isolation
 *
 * Resolved issues leave the active set and are retained for reporting until
 * the retention window passes.
 */

import crypto from 'node:crypto';
import { z } from 'zod';
import { IngestionError, errorMessage } from './errors.js';
import { KeyedMutex } from './keyed-mutex.js';
import { lookupById, type LookupResult } from './lookup.js';
import { issueTypeForAlert, parseSeverity, suggestedFixForAlert } from './alert-mapping.js';
import {
  DAY_MS,
  MINUTE_MS,
  systemClock,
  type Clock,
  type Issue,
  type IssueSighting,
  type Severity,
} from './types.js';

// ---------------------------------------------------------------------------
// Alert payload schema (Alertmanager webhook format)
// ---------------------------------------------------------------------------

const alertSchema = z.object({
  status: z.string().optional(),
  labels: z.object({ alertname: z.string().min(1) }).catchall(z.string()),
  annotations: z.record(z.string()).optional(),
  startsAt: z.string().optional(),
  endsAt: z.string().optional(),
  generatorURL: z.string().optional(),
  fingerprint: z.string().optional(),
});

export type RawAlert = z.input<typeof alertSchema>;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IngestOutcome = 'created' | 'updated' | 'resolved' | 'ignored';

export interface IngestResult {
  outcome: IngestOutcome;
  issue: Issue | null;
}

export interface BatchError {
  index: number;
  reason: string;
  message: string;
}

export interface BatchResult {
  processed: number;
  created: number;
  updated: number;
  resolved: number;
  ignored: number;
  errors: BatchError[];
  issues: Issue[];
}

export interface DedupStats {
  total: number;
  firing: number;
  acknowledged: number;
  silenced: number;
  resolved: number;
  critical: number;
  warning: number;
  info: number;
}

export type IssueCallback = (issue: Issue) => void | Promise<void>;

export interface DeduplicatorOptions {
  clock?: Clock;
  resolvedRetentionMs?: number;
}

export interface LocalIssueInput {
  source: string;
  component: string;
  issueType: string;
  severity: Severity;
  description: string;
  metrics?: Record<string, unknown>;
  labels?: Record<string, string>;
  suggestedFix?: string | null;
}

// ---------------------------------------------------------------------------
// Fingerprints
// ---------------------------------------------------------------------------

function hash16(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex').slice(0, 16);
}

/** Fingerprint of an alert that arrived without one. */
export function alertFingerprint(alertName: string, instance: string): string {
  return hash16(`${alertName}${instance}`);
}

/** Fingerprint of a locally detected issue. */
export function localFingerprint(source: string, component: string, issueType: string): string {
  return hash16(`${source}:${component}:${issueType}`);
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Validate one Alertmanager alert and turn it into a sighting.
 * Throws IngestionError for anything that is not a usable alert.
 */
export function normalizeAlert(raw: unknown): IssueSighting {
  const parsed = alertSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'alert';
    throw new IngestionError(`Malformed alert (${where}): ${issue?.message ?? 'invalid payload'}`);
  }

  const alert = parsed.data;
  const labels: Record<string, string> = { ...alert.labels };
  const annotations = alert.annotations ?? {};
  const name = alert.labels.alertname;
  const instance = labels.instance || labels.node || 'unknown';

  const startsAt = alert.startsAt ? Date.parse(alert.startsAt) : NaN;

  return {
    fingerprint: alert.fingerprint || alertFingerprint(name, instance),
    source: 'alertmanager',
    name,
    issueType: issueTypeForAlert(name),
    component: instance,
    severity: parseSeverity(labels.severity),
    description: annotations.description || annotations.summary || name,
    metrics: {
      ...(alert.startsAt ? { startsAt: alert.startsAt } : {}),
      ...(alert.endsAt ? { endsAt: alert.endsAt } : {}),
      ...(annotations.value ? { value: annotations.value } : {}),
    },
    labels,
    suggestedFix: suggestedFixForAlert(name),
    firing: (alert.status ?? 'firing').toLowerCase() !== 'resolved',
    observedAt: Number.isFinite(startsAt) && startsAt > 0 ? startsAt : undefined,
  };
}

export function localSighting(input: LocalIssueInput, firing: boolean): IssueSighting {
  return {
    fingerprint: localFingerprint(input.source, input.component, input.issueType),
    source: input.source,
    name: input.issueType,
    issueType: input.issueType,
    component: input.component,
    severity: input.severity,
    description: input.description,
    metrics: input.metrics ?? {},
    labels: input.labels ?? {},
    suggestedFix: input.suggestedFix ?? null,
    firing,
  };
}

// ---------------------------------------------------------------------------
// Deduplicator
// ---------------------------------------------------------------------------

export class Deduplicator {
  private readonly active = new Map<string, Issue>();
  private resolvedHistory: Issue[] = [];
  private readonly lock = new KeyedMutex();
  private readonly newIssueCallbacks: IssueCallback[] = [];
  private readonly resolvedCallbacks: IssueCallback[] = [];
  private readonly clock: Clock;
  private readonly resolvedRetentionMs: number;

  constructor(opts: DeduplicatorOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.resolvedRetentionMs = opts.resolvedRetentionMs ?? DAY_MS;
  }

  /** Register a callback for newly created issues. */
  onNewIssue(callback: IssueCallback): void {
    this.newIssueCallbacks.push(callback);
  }

  /** Register a callback for issues that just moved to RESOLVED. */
  onResolved(callback: IssueCallback): void {
    this.resolvedCallbacks.push(callback);
  }

  // ------------------------------------------------------------------ Intake

  /** Ingest one raw alert. Throws IngestionError if it is malformed. */
  async ingest(raw: unknown): Promise<IngestResult> {
    return this.apply(normalizeAlert(raw));
  }

  /**
   * Ingest a batch. Malformed alerts are reported and skipped; the rest of
   * the batch is still processed.
   */
  async ingestBatch(raws: unknown[]): Promise<BatchResult> {
    const result: BatchResult = {
      processed: 0,
      created: 0,
      updated: 0,
      resolved: 0,
      ignored: 0,
      errors: [],
      issues: [],
    };

    for (const [index, raw] of raws.entries()) {
      try {
        const { outcome, issue } = await this.ingest(raw);
        result.processed++;
        result[outcome]++;
        if (issue) result.issues.push(issue);
      } catch (err) {
        const reason = err instanceof IngestionError ? err.reason : 'ingest_failed';
        console.warn(`[Dedup] Skipping alert #${index}: ${errorMessage(err)}`);
        result.errors.push({ index, reason, message: errorMessage(err) });
      }
    }

    return result;
  }

  /** Apply a normalized sighting under the fingerprint's lock. */
  apply(sighting: IssueSighting): Promise<IngestResult> {
    return this.lock.run(sighting.fingerprint, () => this.applyLocked(sighting));
  }

  private applyLocked(sighting: IssueSighting): IngestResult {
    const now = this.clock();
    const existing = this.active.get(sighting.fingerprint);

    if (!sighting.firing) {
      if (!existing) {
        console.log(`[Dedup] Resolved alert for unknown issue ${sighting.fingerprint} ignored`);
        return { outcome: 'ignored', issue: null };
      }
      existing.description = sighting.description;
      existing.metrics = { ...existing.metrics, ...sighting.metrics };
      const closed = this.closeLocked(existing, now);
      return { outcome: 'resolved', issue: closed };
    }

    if (existing) {
      existing.description = sighting.description;
      existing.metrics = { ...existing.metrics, ...sighting.metrics };
      existing.labels = { ...existing.labels, ...sighting.labels };
      existing.severity = sighting.severity;
      existing.updatedAt = now;
      return { outcome: 'updated', issue: { ...existing } };
    }

    const issue: Issue = {
      fingerprint: sighting.fingerprint,
      source: sighting.source,
      name: sighting.name,
      issueType: sighting.issueType,
      component: sighting.component,
      status: 'FIRING',
      severity: sighting.severity,
      description: sighting.description,
      metrics: { ...sighting.metrics },
      labels: { ...sighting.labels },
      suggestedFix: sighting.suggestedFix,
      startedAt: sighting.observedAt ?? now,
      updatedAt: now,
    };
    this.active.set(issue.fingerprint, issue);
    console.log(`[Dedup] New issue ${issue.fingerprint.slice(0, 8)}: ${issue.name} on ${issue.component} (${issue.severity})`);

    this.fire(this.newIssueCallbacks, issue);
    return { outcome: 'created', issue: { ...issue } };
  }

  // ------------------------------------------------------------------ Lifecycle

  /** Acknowledge a FIRING issue. Null if unknown, ambiguous or not FIRING. */
  async acknowledge(idOrPrefix: string, actor: string): Promise<Issue | null> {
    const found = this.find(idOrPrefix);
    if (found.kind !== 'found') return null;

    return this.lock.run(found.id, () => {
      const issue = this.active.get(found.id);
      if (!issue || issue.status !== 'FIRING') return null;
      issue.status = 'ACKNOWLEDGED';
      issue.acknowledgedAt = this.clock();
      issue.acknowledgedBy = actor;
      issue.updatedAt = issue.acknowledgedAt;
      console.log(`[Dedup] Issue ${found.id.slice(0, 8)} acknowledged by ${actor}`);
      return { ...issue };
    });
  }

  /** Silence an open issue for the given number of minutes. */
  async silence(idOrPrefix: string, durationMinutes: number): Promise<Issue | null> {
    const found = this.find(idOrPrefix);
    if (found.kind !== 'found' || !(durationMinutes > 0)) return null;

    return this.lock.run(found.id, () => {
      const issue = this.active.get(found.id);
      if (!issue) return null;
      const now = this.clock();
      issue.status = 'SILENCED';
      issue.silencedUntil = now + durationMinutes * MINUTE_MS;
      issue.updatedAt = now;
      console.log(`[Dedup] Issue ${found.id.slice(0, 8)} silenced for ${durationMinutes}m`);
      return { ...issue };
    });
  }

  /** Close an open issue (remediation succeeded or the condition cleared). */
  async resolve(fingerprint: string): Promise<Issue | null> {
    return this.lock.run(fingerprint, () => {
      const issue = this.active.get(fingerprint);
      return issue ? this.closeLocked(issue, this.clock()) : null;
    });
  }

  /** Record classification results on an open issue. */
  annotate(fingerprint: string, patch: Pick<Issue, 'riskLevel' | 'diagnosis' | 'suggestedFix'>): Issue | null {
    const issue = this.active.get(fingerprint);
    if (!issue) return null;
    issue.riskLevel = patch.riskLevel;
    issue.diagnosis = patch.diagnosis;
    issue.suggestedFix = patch.suggestedFix;
    return { ...issue };
  }

  private closeLocked(issue: Issue, now: number): Issue {
    issue.status = 'RESOLVED';
    issue.resolvedAt = now;
    issue.updatedAt = now;
    issue.acknowledgedAt = undefined;
    issue.acknowledgedBy = undefined;
    issue.silencedUntil = undefined;

    this.active.delete(issue.fingerprint);
    this.resolvedHistory.push(issue);
    console.log(`[Dedup] Issue ${issue.fingerprint.slice(0, 8)} resolved: ${issue.name} on ${issue.component}`);

    const snapshot = { ...issue };
    this.fire(this.resolvedCallbacks, snapshot);
    return snapshot;
  }

  private fire(callbacks: IssueCallback[], issue: Issue): void {
    for (const callback of callbacks) {
      try {
        const pending = callback({ ...issue });
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => {
            console.error('[Dedup] Issue callback failed:', errorMessage(err));
          });
        }
      } catch (err) {
        console.error('[Dedup] Issue callback failed:', errorMessage(err));
      }
    }
  }

  // ------------------------------------------------------------------ Queries

  /** Exact fingerprint first, then unique prefix, over open issues. */
  find(idOrPrefix: string): LookupResult<Issue> {
    const found = lookupById(this.active, idOrPrefix);
    return found.kind === 'found' ? { ...found, value: { ...found.value } } : found;
  }

  get(fingerprint: string): Issue | undefined {
    const issue = this.active.get(fingerprint);
    return issue ? { ...issue } : undefined;
  }

  getActiveIssues(): Issue[] {
    return [...this.active.values()].map((issue) => ({ ...issue }));
  }

  getResolvedSince(since: number): Issue[] {
    return this.resolvedHistory
      .filter((issue) => (issue.resolvedAt ?? 0) >= since)
      .map((issue) => ({ ...issue }));
  }

  getStats(): DedupStats {
    const stats: DedupStats = {
      total: this.active.size,
      firing: 0,
      acknowledged: 0,
      silenced: 0,
      resolved: this.resolvedHistory.length,
      critical: 0,
      warning: 0,
      info: 0,
    };

    for (const issue of this.active.values()) {
      if (issue.status === 'FIRING') stats.firing++;
      else if (issue.status === 'ACKNOWLEDGED') stats.acknowledged++;
      else if (issue.status === 'SILENCED') stats.silenced++;

      if (issue.severity === 'CRITICAL') stats.critical++;
      else if (issue.severity === 'WARNING') stats.warning++;
      else stats.info++;
    }

    return stats;
  }

  // ------------------------------------------------------------------ Housekeeping

  /**
   * Lift silences whose window has elapsed. An issue acknowledged before it
   * was silenced goes back to ACKNOWLEDGED, any other to FIRING.
   */
  async expireSilences(): Promise<Issue[]> {
    const now = this.clock();
    const due = [...this.active.values()]
      .filter((issue) => issue.status === 'SILENCED' && (issue.silencedUntil ?? 0) <= now)
      .map((issue) => issue.fingerprint);

    const lifted: Issue[] = [];
    for (const fingerprint of due) {
      const issue = await this.lock.run(fingerprint, () => {
        const current = this.active.get(fingerprint);
        if (!current || current.status !== 'SILENCED' || (current.silencedUntil ?? 0) > this.clock()) {
          return null;
        }
        current.status = current.acknowledgedAt === undefined ? 'FIRING' : 'ACKNOWLEDGED';
        current.silencedUntil = undefined;
        current.updatedAt = this.clock();
        return { ...current };
      });
      if (issue) lifted.push(issue);
    }
    return lifted;
  }

  /** Drop resolved issues older than the retention window. */
  cleanupResolved(): number {
    const cutoff = this.clock() - this.resolvedRetentionMs;
    const before = this.resolvedHistory.length;
    this.resolvedHistory = this.resolvedHistory.filter((issue) => (issue.resolvedAt ?? 0) >= cutoff);
    return before - this.resolvedHistory.length;
  }
}
