/**
 * Runbook definitions: which remediation an issue type maps to, and the
 * target key it is scoped to for cooldown purposes.
 *
 * Target keys are `kind:segment[:segment...]`, e.g. `container:nginx` or
 * `guest:pve1:lxc:105`. The action collaborator parses them back.
 */

import type { CooldownTable, Issue, RemediationPlan, RemediationType } from './types.js';

// ---------------------------------------------------------------------------
// Runbook types
// ---------------------------------------------------------------------------

interface Runbook {
  id: string;
  triggers: string[];
  actionType: RemediationType;
  /** Null when the issue lacks what the target needs. */
  targetBuilder: (issue: Issue) => string | null;
  describe: (issue: Issue, target: string) => string;
}

// ---------------------------------------------------------------------------
// Target helpers
// ---------------------------------------------------------------------------

/** Host part of an instance label (`10.0.0.5:9100` -> `10.0.0.5`). */
export function hostOf(issue: Issue): string {
  const host = issue.labels.node || issue.labels.host || issue.component;
  return host.replace(/:\d+$/, '');
}

function containerName(issue: Issue): string {
  return issue.labels.container || issue.labels.name || issue.component;
}

// ---------------------------------------------------------------------------
// Runbook definitions
// ---------------------------------------------------------------------------

export const RUNBOOKS: Runbook[] = [
  {
    id: 'container-restart',
    triggers: ['container_stopped', 'container_unhealthy'],
    actionType: 'container_restart',
    targetBuilder: (issue) => `container:${containerName(issue)}`,
    describe: (issue) => `Restart container ${containerName(issue)}`,
  },
  {
    id: 'guest-start',
    triggers: ['guest_stopped'],
    actionType: 'container_restart',
    targetBuilder: (issue) => {
      const { node, type, vmid } = issue.labels;
      if (!node || !vmid || (type !== 'lxc' && type !== 'qemu')) return null;
      return `guest:${node}:${type}:${vmid}`;
    },
    describe: (issue) => `Start ${issue.labels.type === 'qemu' ? 'VM' : 'container'} ${issue.labels.vmid} on ${issue.labels.node}`,
  },
  {
    id: 'service-restart',
    triggers: ['service_stopped'],
    actionType: 'service_restart',
    targetBuilder: (issue) => {
      const unit = issue.labels.service || issue.labels.unit;
      return unit ? `service:${hostOf(issue)}:${unit}` : null;
    },
    describe: (issue, target) => `Restart service ${target.split(':')[2]} on ${hostOf(issue)}`,
  },
  {
    id: 'docker-daemon-restart',
    triggers: ['daemon_unhealthy'],
    actionType: 'service_restart',
    targetBuilder: (issue) => `service:${hostOf(issue)}:docker`,
    describe: (issue) => `Restart the Docker daemon on ${hostOf(issue)}`,
  },
  {
    id: 'disk-cleanup',
    triggers: ['high_disk', 'disk_full'],
    actionType: 'disk_cleanup',
    targetBuilder: (issue) => `disk:${hostOf(issue)}:/var/log`,
    describe: (issue) => `Clean old logs and unused images on ${hostOf(issue)}`,
  },
  {
    id: 'log-rotation',
    triggers: ['log_volume_high'],
    actionType: 'log_rotation',
    targetBuilder: (issue) => `logs:${hostOf(issue)}`,
    describe: (issue) => `Force log rotation on ${hostOf(issue)}`,
  },
  {
    id: 'memory-reclaim',
    triggers: ['high_memory', 'memory_exhaustion'],
    actionType: 'resource_scale',
    targetBuilder: (issue) => `memory:${hostOf(issue)}`,
    describe: (issue) => `Reclaim page cache on ${hostOf(issue)}`,
  },
];

// ---------------------------------------------------------------------------
// Runbook lookup
// ---------------------------------------------------------------------------

export function findRunbook(issueType: string): Runbook | undefined {
  return RUNBOOKS.find((r) => r.triggers.includes(issueType));
}

/**
 * Build the remediation plan for an issue, or null when there is nothing
 * to run. Issue types without a runbook get a custom plan only when the
 * diagnosis oracle proposed a fix; custom plans always need approval.
 */
export function planRemediation(issue: Issue, cooldowns: CooldownTable): RemediationPlan | null {
  const runbook = findRunbook(issue.issueType);
  const target = runbook?.targetBuilder(issue) ?? null;

  if (runbook && target) {
    return {
      runbookId: runbook.id,
      actionType: runbook.actionType,
      target,
      description: runbook.describe(issue, target),
      cooldownMinutes: cooldowns[runbook.actionType],
      alwaysRequireApproval: false,
    };
  }

  const proposed = issue.diagnosis?.source === 'oracle' ? issue.diagnosis.remediation : undefined;
  if (!proposed) return null;

  return {
    runbookId: 'custom',
    actionType: 'custom',
    target: `custom:${issue.component}:${issue.issueType}`,
    description: proposed,
    cooldownMinutes: cooldowns.custom,
    alwaysRequireApproval: true,
    instruction: proposed,
  };
}
