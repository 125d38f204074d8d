/**
 * ActionExecutor -- runs one admitted action through the action
 * collaborator and records the terminal outcome.
 *
 * Exactly one attempt per action. A failure or timeout marks the action
 * FAILED; retrying means admitting a new action through the gate.
 */

import type { ActionHistoryStore } from './action-history.js';
import { ActionExecutionFailure, errorMessage, type ExecutionFailureReason } from './errors.js';
import { withTimeout } from './timeout.js';
import type { Issue, RemediationAction, RemediationType } from './types.js';

// ---------------------------------------------------------------------------
// Collaborator contract
// ---------------------------------------------------------------------------

export interface ActionContext {
  issue: Issue | null;
  description: string;
  instruction?: string;
}

export interface ActionOutcome {
  success: boolean;
  message: string;
  /** Set by the collaborator when the action cannot be automated. */
  manual?: boolean;
}

export type ActionHandler = (target: string, context: ActionContext) => Promise<ActionOutcome>;

/** One entry point per remediation type. */
export type ActionCollaborator = { [K in RemediationType]: ActionHandler };

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export interface ExecutionReport {
  action: RemediationAction;
  success: boolean;
  reason: 'action_succeeded' | ExecutionFailureReason;
  message: string;
}

export interface ActionExecutorOptions {
  timeoutMs: number;
}

export class ActionExecutor {
  constructor(
    private readonly collaborator: ActionCollaborator,
    private readonly history: ActionHistoryStore,
    private readonly opts: ActionExecutorOptions,
  ) {}

  async execute(action: RemediationAction, context: ActionContext): Promise<ExecutionReport> {
    if (action.status !== 'IN_PROGRESS') {
      throw new Error(`Action ${action.actionId} is ${action.status}, not IN_PROGRESS`);
    }

    const handler = this.collaborator[action.actionType];
    const label = `${action.actionType} on ${action.target}`;

    let success: boolean;
    let reason: ExecutionReport['reason'];
    let message: string;

    try {
      const outcome = await withTimeout(
        handler(action.target, context),
        this.opts.timeoutMs,
        () => new ActionExecutionFailure('action_timeout', `${label} timed out after ${this.opts.timeoutMs}ms`),
      );
      success = outcome.success;
      message = outcome.message;
      reason = outcome.success ? 'action_succeeded' : outcome.manual ? 'manual_action_required' : 'action_failed';
    } catch (err) {
      success = false;
      message = errorMessage(err);
      reason = err instanceof ActionExecutionFailure ? err.reason : 'action_failed';
    }

    const completed = this.history.complete(
      action.actionId,
      success ? { status: 'SUCCESS', result: message } : { status: 'FAILED', error: `${reason}: ${message}` },
    );

    if (success) {
      console.log(`[Executor] ${label} succeeded: ${message}`);
    } else {
      console.error(`[Executor] ${label} failed (${reason}): ${message}`);
    }

    return {
      action: completed ?? { ...action, status: success ? 'SUCCESS' : 'FAILED' },
      success,
      reason,
      message,
    };
  }
}
