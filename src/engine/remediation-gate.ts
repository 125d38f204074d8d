/**
 * RemediationGate -- decides AUTO_EXECUTE / NEEDS_APPROVAL / SKIPPED.
 *
 * Checks, in order:
 *  1. Approval: risk above LOW, the global require-approval switch, or a
 *     plan that always needs a human (bypassed by autoApprove)
 *  2. Cooldown per (target, action type), from the action history
 *  3. Global rate limit over the trailing hour, from the action history
 *
 * admit() evaluates and records the IN_PROGRESS action in the same
 * synchronous step, so two near-simultaneous callers cannot both pass.
 * Limits that are not finite and non-negative throw a RangeError.
 */

import crypto from 'node:crypto';
import { dispatchTime, type ActionHistoryStore } from './action-history.js';
import {
  HOUR_MS,
  MINUTE_MS,
  systemClock,
  type Clock,
  type GateDecision,
  type RemediationAction,
  type RemediationPlan,
  type RiskLevel,
} from './types.js';

export interface GateRequest {
  riskLevel: RiskLevel;
  plan: RemediationPlan;
  /** Set when resuming an approved action or on an explicit operator request. */
  autoApprove?: boolean;
}

export interface AdmitRequest extends GateRequest {
  issueFingerprint: string | null;
}

export interface AdmitResult {
  decision: GateDecision;
  /** IN_PROGRESS action for AUTO_EXECUTE, SKIPPED audit record for SKIPPED. */
  action: RemediationAction | null;
}

export interface RemediationGateOptions {
  maxActionsPerHour: number;
  requireApproval: boolean;
  clock?: Clock;
}

/** Throws unless `value` is a finite number no smaller than `min`. */
export function assertLimit(name: string, value: number, min = 0): number {
  if (!Number.isFinite(value) || value < min) {
    throw new RangeError(`${name} must be a finite number >= ${min} (got ${value})`);
  }
  return value;
}

export class RemediationGate {
  private requireApprovalSwitch: boolean;
  private readonly clock: Clock;

  constructor(
    private readonly history: ActionHistoryStore,
    private readonly opts: RemediationGateOptions,
  ) {
    assertLimit('maxActionsPerHour', opts.maxActionsPerHour);
    this.requireApprovalSwitch = opts.requireApproval;
    this.clock = opts.clock ?? systemClock;
  }

  get requireApproval(): boolean {
    return this.requireApprovalSwitch;
  }

  setRequireApproval(value: boolean): void {
    this.requireApprovalSwitch = value;
    console.log(`[Gate] Require-approval switch ${value ? 'ON' : 'OFF'}`);
  }

  evaluate(request: GateRequest): GateDecision {
    const { plan } = request;

    const needsHuman =
      request.riskLevel !== 'LOW' || this.requireApprovalSwitch || plan.alwaysRequireApproval;
    if (needsHuman && !request.autoApprove) {
      return { decision: 'NEEDS_APPROVAL' };
    }

    if (this.cooldownRemainingMs(plan) > 0) {
      return { decision: 'SKIPPED', reason: 'cooldown' };
    }

    const recent = this.history.countDispatchedSince(this.clock() - HOUR_MS);
    if (recent >= this.opts.maxActionsPerHour) {
      return { decision: 'SKIPPED', reason: 'rate_limit' };
    }

    return { decision: 'AUTO_EXECUTE' };
  }

  /** Evaluate and, when admitted, record the action before returning. */
  admit(request: AdmitRequest): AdmitResult {
    const decision = this.evaluate(request);
    const { plan } = request;
    const now = this.clock();

    if (decision.decision === 'NEEDS_APPROVAL') {
      return { decision, action: null };
    }

    const base: RemediationAction = {
      actionId: crypto.randomUUID(),
      target: plan.target,
      actionType: plan.actionType,
      status: 'IN_PROGRESS',
      cooldownMinutes: plan.cooldownMinutes,
      issueFingerprint: request.issueFingerprint,
      description: plan.description,
      createdAt: now,
    };

    if (decision.decision === 'SKIPPED') {
      const skipped: RemediationAction = { ...base, status: 'SKIPPED', error: decision.reason };
      this.history.insert(skipped);
      console.log(`[Gate] Skipped ${plan.actionType} on ${plan.target}: ${decision.reason}`);
      return { decision, action: skipped };
    }

    const action: RemediationAction = { ...base, executedAt: now };
    this.history.insert(action);
    console.log(`[Gate] Admitted ${plan.actionType} on ${plan.target} (${action.actionId.slice(0, 8)})`);
    return { decision, action };
  }

  /** Milliseconds until the (target, action type) pair leaves its cooldown. */
  cooldownRemainingMs(plan: Pick<RemediationPlan, 'target' | 'actionType' | 'cooldownMinutes'>): number {
    assertLimit(`cooldownMinutes for ${plan.actionType}`, plan.cooldownMinutes);
    const latest = this.history.latestDispatched(plan.target, plan.actionType);
    if (!latest) return 0;
    const endsAt = dispatchTime(latest) + plan.cooldownMinutes * MINUTE_MS;
    return Math.max(0, endsAt - this.clock());
  }
}
