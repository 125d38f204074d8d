/**
 * Plain-text message formatting for operator notifications.
 */

import { shortId } from './lookup.js';
import type { ActionStats } from './action-history.js';
import type { ExecutionReport } from './action-executor.js';
import type { DedupStats } from './deduplicator.js';
import type { HealthReport } from './engine.js';
import type { Issue, OutcomeReason, Prediction, RemediationPlan, Severity } from './types.js';

const SEVERITY_ICON: Record<Severity, string> = {
  CRITICAL: '🔴',
  WARNING: '🟠',
  INFO: 'ℹ️',
};

/** `1h 5m`, `3m`, `45s`. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m`;
  return `${totalSeconds}s`;
}

export function formatIssueAlert(issue: Issue, now: number): string {
  const lines = [
    `${SEVERITY_ICON[issue.severity]} ${issue.severity}: ${issue.name}`,
    '',
    `Instance: ${issue.component}`,
    `Status: ${issue.status}`,
    `Duration: ${formatDuration(now - issue.startedAt)}`,
    '',
    issue.description,
  ];
  if (issue.suggestedFix) {
    lines.push('', `Suggested fix: ${issue.suggestedFix}`);
  }
  lines.push('', `ID: ${shortId(issue.fingerprint)}`);
  return lines.join('\n');
}

export function formatApprovalPrompt(issue: Issue, approvalId: string, plan: RemediationPlan): string {
  return [
    `🔐 Approval needed (${issue.riskLevel ?? 'UNCLASSIFIED'} risk)`,
    '',
    `Issue: ${issue.name} on ${issue.component}`,
    `Action: ${plan.description}`,
    `Target: ${plan.target}`,
    ...(issue.diagnosis?.rootCause ? [`Root cause: ${issue.diagnosis.rootCause}`] : []),
    '',
    `Reply /approve ${shortId(approvalId)} or /reject ${shortId(approvalId)}`,
  ].join('\n');
}

export function formatActionOutcome(issue: Issue, report: ExecutionReport): string {
  const icon = report.success ? '✅' : '❌';
  return [
    `${icon} ${report.action.actionType} on ${report.action.target}: ${report.reason}`,
    `Issue: ${issue.name} on ${issue.component} (${shortId(issue.fingerprint)})`,
    report.message,
  ].join('\n');
}

export function formatDecision(issue: Issue, reason: OutcomeReason, detail?: string): string {
  return [
    `⏸️ No action for ${issue.name} on ${issue.component}: ${reason}`,
    ...(detail ? [detail] : []),
    `ID: ${shortId(issue.fingerprint)}`,
  ].join('\n');
}

export function formatPrediction(prediction: Prediction): string {
  return [
    `🔮 Predicted ${prediction.type} (${prediction.severity}, ${prediction.confidence} confidence)`,
    '',
    prediction.description,
    `Expected: ${new Date(prediction.predictedTime).toISOString()}`,
    `Recommendation: ${prediction.recommendation}`,
  ].join('\n');
}

export function formatPredictionReport(predictions: Prediction[]): string {
  if (predictions.length === 0) return '🔮 No predicted issues.';
  return [
    `🔮 ${predictions.length} predicted issue(s)`,
    ...predictions.map(
      (p) => `• ${p.type} on ${p.component} in ${p.hoursUntil}h (${p.severity}, ${p.confidence})`,
    ),
  ].join('\n');
}

export function formatStats(issues: DedupStats, actions: ActionStats, requireApproval: boolean): string {
  return [
    '📊 Status',
    `Active issues: ${issues.total} (firing ${issues.firing}, acked ${issues.acknowledged}, silenced ${issues.silenced})`,
    `Severity: critical ${issues.critical}, warning ${issues.warning}, info ${issues.info}`,
    `Resolved (retained): ${issues.resolved}`,
    `Actions: ${actions.total} total, ${actions.successful} ok, ${actions.failed} failed, ${actions.skipped} skipped`,
    `Success rate: ${actions.successRate}%`,
    `Require approval: ${requireApproval ? 'on' : 'off'}`,
  ].join('\n');
}

export function formatIssueList(issues: Issue[]): string {
  if (issues.length === 0) return 'No active issues.';
  return issues
    .map((i) => `${SEVERITY_ICON[i.severity]} ${shortId(i.fingerprint)} ${i.name} on ${i.component} [${i.status}]`)
    .join('\n');
}

export function formatHealthReport(report: HealthReport): string {
  const lines = [
    '🩺 Health report',
    `Active issues: ${report.activeIssues} (critical ${report.bySeverity.CRITICAL}, warning ${report.bySeverity.WARNING}, info ${report.bySeverity.INFO})`,
    `Resolved in last 24h: ${report.resolvedLast24h}`,
    `Pending approvals: ${report.pendingApprovals}`,
    `Remediation success rate: ${report.remediation.successRate}% of ${report.remediation.successful + report.remediation.failed} completed`,
  ];
  if (report.recentResolutions.length > 0) {
    lines.push('', 'Recent resolutions:');
    for (const issue of report.recentResolutions) {
      lines.push(`• ${issue.name} on ${issue.component} (${shortId(issue.fingerprint)})`);
    }
  }
  return lines.join('\n');
}
