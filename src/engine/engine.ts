/**
 * RemediationEngine -- owns every piece of lifecycle state and wires the
 * pipeline together:
 *
 *   intake -> Deduplicator -> (new issue) -> RiskClassifier -> runbook plan
 *     -> RemediationGate -> { ActionExecutor | ApprovalWorkflow -> ActionExecutor }
 *     -> OutcomeTracker -> TrendDetector
 *
 * One instance is constructed by the process entry point and handed to the
 * HTTP routes, the Telegram listener and the sweeps. Remediation runs in the
 * background: intake and approval calls return before any action finishes.
 * whenIdle() waits for that background work (used by tests and shutdown).
 */

import { defaultRiskFor } from './alert-mapping.js';
import { InMemoryActionHistory, type ActionHistoryStore, type ActionStats } from './action-history.js';
import { ActionExecutor, type ActionCollaborator } from './action-executor.js';
import { ApprovalWorkflow } from './approval-workflow.js';
import {
  Deduplicator,
  localFingerprint,
  localSighting,
  type BatchResult,
  type DedupStats,
  type IngestResult,
  type IssueCallback,
  type LocalIssueInput,
} from './deduplicator.js';
import { errorMessage } from './errors.js';
import {
  formatActionOutcome,
  formatDecision,
  formatPrediction,
} from './format.js';
import { shortId } from './lookup.js';
import { silentNotifier, type NotificationChannel } from './notifier.js';
import { OutcomeTracker } from './outcome-tracker.js';
import { RemediationGate, assertLimit } from './remediation-gate.js';
import { RiskClassifier, type DiagnosisOracle } from './risk-classifier.js';
import { planRemediation } from './runbooks.js';
import { TrendDetector, isActionable, type AnalysisResult } from './trend-detector.js';
import {
  DAY_MS,
  MINUTE_MS,
  systemClock,
  type ApprovalRequest,
  type Clock,
  type CooldownTable,
  type GateDecision,
  type Issue,
  type Prediction,
  type PredictionType,
  type RemediationAction,
  type RemediationPlan,
  type Severity,
} from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Key/value settings that outlive the process. */
export interface PreferenceStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
}

export const REQUIRE_APPROVAL_PREFERENCE = 'remediation.requireApproval';

export const DEFAULT_COOLDOWN_MINUTES: CooldownTable = {
  service_restart: 15,
  container_restart: 10,
  disk_cleanup: 60,
  log_rotation: 30,
  resource_scale: 30,
  custom: 15,
};

export interface EngineOptions {
  collaborator: ActionCollaborator;
  oracle?: DiagnosisOracle | null;
  notifier?: NotificationChannel;
  history?: ActionHistoryStore;
  preferences?: PreferenceStore;
  clock?: Clock;
  maxActionsPerHour?: number;
  requireApproval?: boolean;
  cooldownMinutes?: Partial<CooldownTable>;
  approvalTtlMinutes?: number;
  oracleTimeoutMs?: number;
  actionTimeoutMs?: number;
  trendRetentionMs?: number;
  trendMinSamples?: number;
  spawnIssuesFromForecasts?: boolean;
  outcomeRetentionMs?: number;
  resolvedRetentionMs?: number;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface DispatchResult {
  decision: GateDecision;
  action: RemediationAction | null;
  approvalId?: string;
}

export type ApprovalResponse =
  | { status: 'approved' | 'rejected' | 'expired'; approvalId: string; message: string }
  | { status: 'not_found' | 'ambiguous'; message: string };

export type RemediateResponse =
  | { status: 'dispatched'; result: DispatchResult }
  | { status: 'not_found' | 'ambiguous' | 'no_runbook'; message: string };

export interface EngineStats {
  issues: DedupStats;
  remediation: ActionStats & { requireApproval: boolean };
  pendingApprovals: number;
}

export interface HealthReport {
  generatedAt: number;
  activeIssues: number;
  resolvedLast24h: number;
  pendingApprovals: number;
  bySeverity: Record<Severity, number>;
  recentResolutions: Issue[];
  remediation: ActionStats;
}

export interface SweepResult {
  expiredApprovals: number;
  liftedSilences: number;
  droppedResolved: number;
  prunedOutcomes: number;
  prunedActions: number;
}

const ISSUE_TYPE_BY_PREDICTION: Record<PredictionType, string> = {
  DISK_FULL: 'disk_full',
  MEMORY_EXHAUSTION: 'memory_exhaustion',
  SERVICE_FAILURE: 'recurring_failure',
};

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class RemediationEngine {
  readonly dedup: Deduplicator;
  readonly classifier: RiskClassifier;
  readonly gate: RemediationGate;
  readonly approvals: ApprovalWorkflow;
  readonly executor: ActionExecutor;
  readonly outcomes: OutcomeTracker;
  readonly trends: TrendDetector;

  private readonly clock: Clock;
  private readonly history: ActionHistoryStore;
  private readonly notifier: NotificationChannel;
  private readonly preferences: PreferenceStore | null;
  private readonly cooldowns: CooldownTable;
  private readonly spawnIssuesFromForecasts: boolean;
  private readonly historyRetentionMs: number;
  private readonly actionTimeoutMs: number;
  private readonly inflight = new Set<Promise<void>>();
  private activePredictions = new Map<string, Prediction>();
  private lastPredictions: Prediction[] = [];

  constructor(opts: EngineOptions) {
    this.clock = opts.clock ?? systemClock;
    this.history = opts.history ?? new InMemoryActionHistory();
    this.notifier = opts.notifier ?? silentNotifier;
    this.preferences = opts.preferences ?? null;
    this.cooldowns = { ...DEFAULT_COOLDOWN_MINUTES, ...opts.cooldownMinutes };
    for (const [actionType, minutes] of Object.entries(this.cooldowns)) {
      assertLimit(`cooldownMinutes.${actionType}`, minutes);
    }
    for (const [name, value] of Object.entries({
      approvalTtlMinutes: opts.approvalTtlMinutes,
      oracleTimeoutMs: opts.oracleTimeoutMs,
      actionTimeoutMs: opts.actionTimeoutMs,
      trendRetentionMs: opts.trendRetentionMs,
      trendMinSamples: opts.trendMinSamples,
      outcomeRetentionMs: opts.outcomeRetentionMs,
      resolvedRetentionMs: opts.resolvedRetentionMs,
    })) {
      if (value !== undefined) assertLimit(name, value, 1);
    }
    this.spawnIssuesFromForecasts = opts.spawnIssuesFromForecasts ?? true;

    const outcomeRetentionMs = opts.outcomeRetentionMs ?? 7 * DAY_MS;
    const longestCooldownMs = Math.max(...Object.values(this.cooldowns)) * MINUTE_MS;
    this.historyRetentionMs = Math.max(outcomeRetentionMs, longestCooldownMs);

    const storedSwitch = this.preferences?.get(REQUIRE_APPROVAL_PREFERENCE);

    this.dedup = new Deduplicator({ clock: this.clock, resolvedRetentionMs: opts.resolvedRetentionMs });
    this.classifier = new RiskClassifier(opts.oracle ?? null, { timeoutMs: opts.oracleTimeoutMs ?? 20_000 });
    this.gate = new RemediationGate(this.history, {
      clock: this.clock,
      maxActionsPerHour: opts.maxActionsPerHour ?? 10,
      requireApproval: storedSwitch == null ? opts.requireApproval ?? false : storedSwitch === 'true',
    });
    this.approvals = new ApprovalWorkflow({ clock: this.clock, defaultTtlMinutes: opts.approvalTtlMinutes ?? 60 });
    this.actionTimeoutMs = opts.actionTimeoutMs ?? 120_000;
    this.executor = new ActionExecutor(opts.collaborator, this.history, { timeoutMs: this.actionTimeoutMs });
    this.outcomes = new OutcomeTracker({ clock: this.clock, retentionMs: outcomeRetentionMs });
    this.trends = new TrendDetector({
      clock: this.clock,
      retentionMs: opts.trendRetentionMs,
      minSamples: opts.trendMinSamples,
      failureTimes: (component) => this.outcomes.failureTimes(component),
    });

    this.dedup.onNewIssue((issue) => {
      this.track(this.processIssue(issue));
    });
    this.dedup.onResolved((issue) => this.handleResolved(issue));
  }

  // ------------------------------------------------------------------ Intake

  /** Register an extra new-issue callback (announcements, dashboards). */
  onNewIssue(callback: IssueCallback): void {
    this.dedup.onNewIssue(callback);
  }

  ingestAlerts(raws: unknown[]): Promise<BatchResult> {
    return this.dedup.ingestBatch(raws);
  }

  ingestAlert(raw: unknown): Promise<IngestResult> {
    return this.dedup.ingest(raw);
  }

  reportLocalIssue(input: LocalIssueInput): Promise<IngestResult> {
    return this.dedup.apply(localSighting(input, true));
  }

  clearLocalIssue(source: string, component: string, issueType: string): Promise<Issue | null> {
    return this.dedup.resolve(localFingerprint(source, component, issueType));
  }

  // ------------------------------------------------------------------ Pipeline

  private async processIssue(issue: Issue): Promise<void> {
    const classification = await this.classifier.classify(issue);
    const current = this.dedup.annotate(issue.fingerprint, {
      riskLevel: classification.riskLevel,
      diagnosis: classification.diagnosis,
      suggestedFix: classification.suggestedFix,
    });
    if (!current) {
      console.log(`[Engine] Issue ${shortId(issue.fingerprint)} closed before classification finished`);
      return;
    }

    console.log(
      `[Engine] ${current.name} on ${current.component} classified ${classification.riskLevel} (${classification.diagnosis.source})`,
    );

    if (current.severity === 'INFO') {
      this.outcomes.record(current, 'informational');
      return;
    }

    const plan = planRemediation(current, this.cooldowns);
    if (!plan) {
      console.log(`[Engine] No runbook for ${current.issueType}; recording only`);
      this.outcomes.record(current, 'no_runbook');
      return;
    }

    this.dispatch(current, plan, false);
  }

  /**
   * Run a plan through the gate. Admission is synchronous; execution,
   * approval prompts and notifications continue in the background.
   */
  private dispatch(issue: Issue, plan: RemediationPlan, autoApprove: boolean): DispatchResult {
    const { decision, action } = this.gate.admit({
      riskLevel: issue.riskLevel ?? defaultRiskFor(issue.issueType),
      plan,
      issueFingerprint: issue.fingerprint,
      autoApprove,
    });

    if (decision.decision === 'NEEDS_APPROVAL') {
      const { request, created } = this.approvals.request(issue, plan);
      if (created) {
        this.outcomes.record(issue, 'approval_requested');
        this.track(this.send((n) => n.requestApproval(issue, request.approvalId, plan)));
      }
      return { decision, action: null, approvalId: request.approvalId };
    }

    if (decision.decision === 'SKIPPED') {
      this.outcomes.record(issue, decision.reason);
      const detail = decision.reason === 'cooldown'
        ? `${plan.description} is cooling down for another ${Math.ceil(this.gate.cooldownRemainingMs(plan) / MINUTE_MS)}m`
        : `Hourly action limit reached`;
      this.track(this.send((n) => n.notify(formatDecision(issue, decision.reason, detail))));
      return { decision, action };
    }

    if (action) {
      this.outcomes.record(issue, autoApprove ? 'approved' : 'auto_executed', {
        actionId: action.actionId,
        actionType: action.actionType,
      });
      this.track(this.runAction(issue, plan, action));
    }
    return { decision, action };
  }

  private async runAction(issue: Issue, plan: RemediationPlan, action: RemediationAction): Promise<void> {
    const report = await this.executor.execute(action, {
      issue,
      description: plan.description,
      instruction: plan.instruction,
    });

    let final: Issue = issue;
    if (report.success) {
      final = (await this.dedup.resolve(issue.fingerprint)) ?? { ...issue, status: 'RESOLVED', resolvedAt: this.clock() };
    }
    this.outcomes.record(final, report.reason, { actionId: action.actionId, actionType: action.actionType });

    await this.send((n) => n.notify(formatActionOutcome(final, report)));
  }

  private handleResolved(issue: Issue): void {
    const withdrawn = this.approvals.withdraw(issue.fingerprint);
    if (withdrawn) {
      console.log(`[Engine] Approval ${shortId(withdrawn.approvalId)} withdrawn: issue_closed`);
      this.outcomes.record(issue, 'issue_closed');
    }
  }

  private async send(deliver: (channel: NotificationChannel) => Promise<void>): Promise<void> {
    try {
      await deliver(this.notifier);
    } catch (err) {
      console.error('[Notify] Delivery failed:', errorMessage(err));
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        console.error('[Engine] Background task failed:', errorMessage(err));
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }

  /** Resolves once no background remediation work is pending. */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  // ------------------------------------------------------------------ Operator commands

  acknowledge(idOrPrefix: string, actor: string): Promise<Issue | null> {
    return this.dedup.acknowledge(idOrPrefix, actor);
  }

  silence(idOrPrefix: string, durationMinutes: number): Promise<Issue | null> {
    return this.dedup.silence(idOrPrefix, durationMinutes);
  }

  /** Approve or reject a pending request. Returns before any action runs. */
  resolveApproval(idOrPrefix: string, approved: boolean, actor = 'operator'): ApprovalResponse {
    const resolution = this.approvals.resolve(idOrPrefix, approved);

    switch (resolution.status) {
      case 'not_found':
        return { status: 'not_found', message: `No pending approval matches "${idOrPrefix}" (not found or expired)` };
      case 'ambiguous':
        return {
          status: 'ambiguous',
          message: `"${idOrPrefix}" matches ${resolution.matches.length} approvals; use a longer id`,
        };
      case 'expired': {
        const { request } = resolution;
        this.outcomes.record(request.issue, 'approval_expired');
        this.track(this.send((n) => n.notify(this.expiryMessage(request))));
        return { status: 'expired', approvalId: request.approvalId, message: `Approval ${shortId(request.approvalId)} has expired` };
      }
      case 'rejected': {
        const { request } = resolution;
        this.outcomes.record(request.issue, 'approval_rejected');
        this.track(
          this.send((n) =>
            n.notify(
              `🚫 ${request.plan.description} rejected by ${actor}: approval_rejected\nIssue will remain unresolved (${shortId(request.issueRef)})`,
            ),
          ),
        );
        return { status: 'rejected', approvalId: request.approvalId, message: `Rejected ${request.plan.description}` };
      }
      case 'approved': {
        const { request } = resolution;
        const issue = this.dedup.get(request.issueRef) ?? request.issue;
        console.log(`[Engine] ${shortId(request.approvalId)} approved by ${actor}`);
        this.dispatch(issue, request.plan, true);
        return { status: 'approved', approvalId: request.approvalId, message: `Approved; running ${request.plan.description}` };
      }
    }
  }

  /** Operator-triggered retry: a new action through the same gate. */
  remediate(idOrPrefix: string): RemediateResponse {
    const found = this.dedup.find(idOrPrefix);
    if (found.kind === 'not_found') return { status: 'not_found', message: `No active issue matches "${idOrPrefix}"` };
    if (found.kind === 'ambiguous') {
      return { status: 'ambiguous', message: `"${idOrPrefix}" matches ${found.matches.length} issues; use a longer id` };
    }

    const plan = planRemediation(found.value, this.cooldowns);
    if (!plan) return { status: 'no_runbook', message: `No runbook for ${found.value.issueType}` };

    return { status: 'dispatched', result: this.dispatch(found.value, plan, true) };
  }

  get requireApproval(): boolean {
    return this.gate.requireApproval;
  }

  setRequireApproval(value: boolean): void {
    this.gate.setRequireApproval(value);
    this.preferences?.set(REQUIRE_APPROVAL_PREFERENCE, String(value));
  }

  // ------------------------------------------------------------------ Queries

  getActiveIssues(): Issue[] {
    return this.dedup.getActiveIssues();
  }

  getStats(): EngineStats {
    return {
      issues: this.dedup.getStats(),
      remediation: { ...this.history.stats(), requireApproval: this.gate.requireApproval },
      pendingApprovals: this.approvals.pending().length,
    };
  }

  getRecentActions(limit = 20): RemediationAction[] {
    return this.history.recent(limit);
  }

  getPendingApprovals(): ApprovalRequest[] {
    return this.approvals.pending();
  }

  getPredictions(): Prediction[] {
    return [...this.lastPredictions];
  }

  getHealthReport(): HealthReport {
    const now = this.clock();
    const active = this.dedup.getActiveIssues();
    const resolved = this.dedup
      .getResolvedSince(now - DAY_MS)
      .sort((a, b) => (b.resolvedAt ?? 0) - (a.resolvedAt ?? 0));

    const bySeverity: Record<Severity, number> = { CRITICAL: 0, WARNING: 0, INFO: 0 };
    for (const issue of active) bySeverity[issue.severity]++;

    return {
      generatedAt: now,
      activeIssues: active.length,
      resolvedLast24h: resolved.length,
      pendingApprovals: this.approvals.pending().length,
      bySeverity,
      recentResolutions: resolved.slice(0, 10),
      remediation: this.history.stats(),
    };
  }

  // ------------------------------------------------------------------ Trends

  recordSample(component: string, metric: string, value: number, timestamp?: number): void {
    this.trends.addSample(component, metric, value, timestamp);
  }

  /**
   * Run forecasts and anomaly checks. New actionable forecasts are announced
   * and, when enabled, raised as issues; forecast issues whose prediction
   * disappeared are resolved.
   */
  async runTrendAnalysis(): Promise<AnalysisResult> {
    const result = this.trends.analyze(this.outcomes.components());
    const actionable = new Map(result.predictions.filter(isActionable).map((p) => [p.id, p]));

    for (const prediction of actionable.values()) {
      if (!this.activePredictions.has(prediction.id)) {
        console.log(`[Trends] ${prediction.description}`);
        await this.send((n) => n.notify(formatPrediction(prediction)));
      }
      if (this.spawnIssuesFromForecasts) {
        await this.reportLocalIssue({
          source: 'trend',
          component: prediction.component,
          issueType: ISSUE_TYPE_BY_PREDICTION[prediction.type],
          severity: prediction.severity,
          description: prediction.description,
          metrics: { ...prediction.metrics, hoursUntil: prediction.hoursUntil },
          labels: { node: prediction.component },
          suggestedFix: prediction.recommendation,
        });
      }
    }

    if (this.spawnIssuesFromForecasts) {
      for (const [id, previous] of this.activePredictions) {
        if (!actionable.has(id)) {
          await this.clearLocalIssue('trend', previous.component, ISSUE_TYPE_BY_PREDICTION[previous.type]);
        }
      }
    }

    this.activePredictions = actionable;
    this.lastPredictions = result.predictions;
    return result;
  }

  // ------------------------------------------------------------------ Housekeeping

  /**
   * Fail actions left IN_PROGRESS by a previous process. Call once at
   * startup, before anything is dispatched.
   */
  failInterruptedActions(): number {
    const failed = this.history.failStale(this.clock() - this.actionTimeoutMs, 'interrupted');
    if (failed > 0) {
      console.warn(`[Engine] Marked ${failed} interrupted action(s) as FAILED`);
    }
    return failed;
  }

  async sweep(): Promise<SweepResult> {
    const expired = this.approvals.sweepExpired();
    for (const request of expired) {
      console.log(`[Approvals] ${shortId(request.approvalId)} expired without a response`);
      this.outcomes.record(request.issue, 'approval_expired');
      await this.send((n) => n.notify(this.expiryMessage(request)));
    }

    const lifted = await this.dedup.expireSilences();
    const droppedResolved = this.dedup.cleanupResolved();
    const prunedOutcomes = this.outcomes.prune();
    const prunedActions = this.history.prune(this.clock() - this.historyRetentionMs);

    return {
      expiredApprovals: expired.length,
      liftedSilences: lifted.length,
      droppedResolved,
      prunedOutcomes,
      prunedActions,
    };
  }

  private expiryMessage(request: ApprovalRequest): string {
    return `⌛ Approval for ${request.plan.description} lapsed: approval_expired\nIssue: ${request.issue.name} on ${request.issue.component} (${shortId(request.issueRef)})`;
  }
}
