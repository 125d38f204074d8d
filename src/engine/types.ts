/**
 * Shared types for the alert lifecycle and remediation engine.
 *
 * Timestamps are Unix epoch milliseconds throughout.
 */

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

/** Source of "now". Injected so tests can run on simulated time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export type IssueStatus = 'FIRING' | 'ACKNOWLEDGED' | 'SILENCED' | 'RESOLVED';

export type Severity = 'CRITICAL' | 'WARNING' | 'INFO';

export const RISK_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

/** Where the risk level of an issue came from. */
export interface Diagnosis {
  riskLevel: RiskLevel;
  source: 'oracle' | 'fallback';
  rootCause?: string;
  remediation?: string;
  reasoning?: string;
  /** Why the static table was used (oracle_unavailable, oracle_timeout, ...). */
  fallbackReason?: string;
}

export interface Issue {
  fingerprint: string;
  /** alertmanager, health, trend, ... */
  source: string;
  /** Alert name or a readable label for locally detected issues. */
  name: string;
  issueType: string;
  component: string;
  status: IssueStatus;
  severity: Severity;
  riskLevel?: RiskLevel;
  description: string;
  metrics: Record<string, unknown>;
  labels: Record<string, string>;
  suggestedFix: string | null;
  startedAt: number;
  updatedAt: number;
  resolvedAt?: number;
  acknowledgedAt?: number;
  acknowledgedBy?: string;
  silencedUntil?: number;
  diagnosis?: Diagnosis;
}

/** One observation of an issue, from any source, before deduplication. */
export interface IssueSighting {
  fingerprint: string;
  source: string;
  name: string;
  issueType: string;
  component: string;
  severity: Severity;
  description: string;
  metrics: Record<string, unknown>;
  labels: Record<string, string>;
  suggestedFix: string | null;
  firing: boolean;
  observedAt?: number;
}

// ---------------------------------------------------------------------------
// Remediation actions
// ---------------------------------------------------------------------------

export const REMEDIATION_TYPES = [
  'service_restart',
  'container_restart',
  'disk_cleanup',
  'log_rotation',
  'resource_scale',
  'custom',
] as const;
export type RemediationType = (typeof REMEDIATION_TYPES)[number];

export const ACTION_STATUSES = ['PENDING', 'IN_PROGRESS', 'SUCCESS', 'FAILED', 'SKIPPED'] as const;
export type ActionStatus = (typeof ACTION_STATUSES)[number];

/** Statuses that count towards cooldown and rate limit. */
export const DISPATCHED_STATUSES: ActionStatus[] = ['IN_PROGRESS', 'SUCCESS', 'FAILED'];

export type CooldownTable = Record<RemediationType, number>;

export interface RemediationAction {
  actionId: string;
  target: string;
  actionType: RemediationType;
  status: ActionStatus;
  cooldownMinutes: number;
  issueFingerprint: string | null;
  description: string;
  createdAt: number;
  executedAt?: number;
  result?: string;
  error?: string;
}

/** What the engine intends to do about an issue. */
export interface RemediationPlan {
  runbookId: string;
  actionType: RemediationType;
  target: string;
  description: string;
  cooldownMinutes: number;
  /** Set for plans that must never auto-execute, whatever the risk. */
  alwaysRequireApproval: boolean;
  /** Free-text instruction passed to the collaborator (custom plans). */
  instruction?: string;
}

// ---------------------------------------------------------------------------
// Gate decisions and reasons
// ---------------------------------------------------------------------------

export type SkipReason = 'cooldown' | 'rate_limit';

export type GateDecision =
  | { decision: 'AUTO_EXECUTE' }
  | { decision: 'NEEDS_APPROVAL' }
  | { decision: 'SKIPPED'; reason: SkipReason };

/** Stable reason strings attached to every outcome and notification. */
export type OutcomeReason =
  | 'auto_executed'
  | 'approval_requested'
  | 'approved'
  | 'approval_rejected'
  | 'approval_expired'
  | 'cooldown'
  | 'rate_limit'
  | 'no_runbook'
  | 'informational'
  | 'action_succeeded'
  | 'action_failed'
  | 'action_timeout'
  | 'manual_action_required'
  | 'issue_closed';

// ---------------------------------------------------------------------------
// Approvals
// ---------------------------------------------------------------------------

export interface ApprovalRequest {
  approvalId: string;
  issueRef: string;
  issue: Issue;
  plan: RemediationPlan;
  requestedAt: number;
  expiresAt: number;
}

// ---------------------------------------------------------------------------
// Trends
// ---------------------------------------------------------------------------

export interface TrendSample {
  timestamp: number;
  value: number;
}

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface Trend {
  /** Units per hour. */
  slope: number;
  volatility: number;
  direction: TrendDirection;
  mean: number;
  current: number;
  sampleCount: number;
}

export type PredictionType = 'DISK_FULL' | 'MEMORY_EXHAUSTION' | 'SERVICE_FAILURE';

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export interface Prediction {
  id: string;
  type: PredictionType;
  component: string;
  confidence: Confidence;
  severity: Severity;
  hoursUntil: number;
  predictedTime: number;
  description: string;
  recommendation: string;
  metrics: Record<string, number>;
  createdAt: number;
}

export interface Anomaly {
  component: string;
  metric: string;
  kind: 'outlier' | 'spike';
  value: number;
  mean: number;
  stdDev: number;
  timestamp: number;
}
