/**
 * Shared fixtures for engine tests: a settable clock, issue and plan
 * builders, a recording notifier and a scripted action collaborator.
 */

import { vi, type Mock } from 'vitest';
import type { ActionHandler, ActionOutcome } from '../engine/action-executor.js';
import type { NotificationChannel } from '../engine/notifier.js';
import type { Issue, RemediationPlan, RemediationType } from '../engine/types.js';

export const T0 = Date.UTC(2026, 0, 1, 12, 0, 0);

export class FakeClock {
  constructor(public now = T0) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    fingerprint: 'fp-test-0001',
    source: 'alertmanager',
    name: 'ContainerDown',
    issueType: 'container_stopped',
    component: 'nginx',
    status: 'FIRING',
    severity: 'WARNING',
    description: 'nginx is down',
    metrics: {},
    labels: { alertname: 'ContainerDown', instance: 'nginx' },
    suggestedFix: 'Restart the affected container',
    startedAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makePlan(overrides: Partial<RemediationPlan> = {}): RemediationPlan {
  return {
    runbookId: 'container-restart',
    actionType: 'container_restart',
    target: 'container:nginx',
    description: 'Restart container nginx',
    cooldownMinutes: 10,
    alwaysRequireApproval: false,
    ...overrides,
  };
}

export interface RecordingNotifier extends NotificationChannel {
  messages: string[];
  approvals: Array<{ issue: Issue; approvalId: string; plan: RemediationPlan }>;
}

export function recordingNotifier(): RecordingNotifier {
  const messages: string[] = [];
  const approvals: RecordingNotifier['approvals'] = [];
  return {
    name: 'recording',
    messages,
    approvals,
    async notify(text: string) {
      messages.push(text);
    },
    async requestApproval(issue: Issue, approvalId: string, plan: RemediationPlan) {
      approvals.push({ issue, approvalId, plan });
    },
  };
}

export type FakeCollaborator = { [K in RemediationType]: Mock<ActionHandler> };

/** Collaborator whose every handler is a mock resolving to `outcome`. */
export function fakeCollaborator(outcome: ActionOutcome = { success: true, message: 'done' }): FakeCollaborator {
  const handler = () => vi.fn<ActionHandler>(async () => outcome);
  return {
    service_restart: handler(),
    container_restart: handler(),
    disk_cleanup: handler(),
    log_rotation: handler(),
    resource_scale: handler(),
    custom: handler(),
  };
}
