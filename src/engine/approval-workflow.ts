/**
 * ApprovalWorkflow -- pending human approvals.
 *
 * One outstanding request per issue, keyed by the issue fingerprint. Every
 * request is single use: approve, reject or expiry removes it, so a second
 * resolve on the same id is a no-op. Expiry is checked lazily at resolve
 * time; sweepExpired() evicts stale entries in the background.
 */

import { lookupById } from './lookup.js';
import {
  MINUTE_MS,
  systemClock,
  type ApprovalRequest,
  type Clock,
  type Issue,
  type RemediationPlan,
} from './types.js';

/** Hard ceiling on any approval window. */
export const MAX_APPROVAL_TTL_MINUTES = 24 * 60;

export type ApprovalResolution =
  | { status: 'approved'; request: ApprovalRequest }
  | { status: 'rejected'; request: ApprovalRequest }
  | { status: 'expired'; request: ApprovalRequest }
  | { status: 'not_found' }
  | { status: 'ambiguous'; matches: string[] };

export interface ApprovalWorkflowOptions {
  defaultTtlMinutes: number;
  clock?: Clock;
}

export function clampTtlMinutes(minutes: number): number {
  if (!Number.isFinite(minutes) || minutes <= 0) return 1;
  return Math.min(minutes, MAX_APPROVAL_TTL_MINUTES);
}

export class ApprovalWorkflow {
  private readonly pendingById = new Map<string, ApprovalRequest>();
  private readonly clock: Clock;
  private readonly defaultTtlMinutes: number;

  constructor(opts: ApprovalWorkflowOptions) {
    this.clock = opts.clock ?? systemClock;
    this.defaultTtlMinutes = clampTtlMinutes(opts.defaultTtlMinutes);
  }

  /**
   * Open an approval request for the issue. If one is already outstanding
   * and still valid it is returned unchanged with `created: false`.
   */
  request(issue: Issue, plan: RemediationPlan, ttlMinutes?: number): { request: ApprovalRequest; created: boolean } {
    const now = this.clock();
    const existing = this.pendingById.get(issue.fingerprint);
    if (existing && existing.expiresAt > now) {
      return { request: existing, created: false };
    }

    const ttl = ttlMinutes === undefined ? this.defaultTtlMinutes : clampTtlMinutes(ttlMinutes);
    const request: ApprovalRequest = {
      approvalId: issue.fingerprint,
      issueRef: issue.fingerprint,
      issue: { ...issue },
      plan,
      requestedAt: now,
      expiresAt: now + ttl * MINUTE_MS,
    };
    this.pendingById.set(request.approvalId, request);
    console.log(`[Approvals] Requested ${plan.actionType} on ${plan.target} (${request.approvalId.slice(0, 8)}, ${ttl}m)`);
    return { request, created: true };
  }

  /** Resolve by exact id, then unique prefix. Removes the entry on every outcome. */
  resolve(idOrPrefix: string, approved: boolean): ApprovalResolution {
    const found = lookupById(this.pendingById, idOrPrefix);
    if (found.kind === 'not_found') return { status: 'not_found' };
    if (found.kind === 'ambiguous') return { status: 'ambiguous', matches: found.matches };

    const request = found.value;
    this.pendingById.delete(found.id);

    if (request.expiresAt <= this.clock()) {
      console.log(`[Approvals] ${found.id.slice(0, 8)} resolved after expiry`);
      return { status: 'expired', request };
    }

    console.log(`[Approvals] ${found.id.slice(0, 8)} ${approved ? 'approved' : 'rejected'}`);
    return approved ? { status: 'approved', request } : { status: 'rejected', request };
  }

  /** Drop the pending request for an issue that no longer needs it. */
  withdraw(issueRef: string): ApprovalRequest | null {
    const request = this.pendingById.get(issueRef);
    if (!request) return null;
    this.pendingById.delete(issueRef);
    return request;
  }

  has(issueRef: string): boolean {
    return this.pendingById.has(issueRef);
  }

  /** Requests that can still be approved. */
  pending(): ApprovalRequest[] {
    const now = this.clock();
    return [...this.pendingById.values()].filter((r) => r.expiresAt > now);
  }

  /** Evict expired requests and return them. */
  sweepExpired(): ApprovalRequest[] {
    const now = this.clock();
    const expired: ApprovalRequest[] = [];
    for (const [id, request] of this.pendingById) {
      if (request.expiresAt <= now) {
        this.pendingById.delete(id);
        expired.push(request);
      }
    }
    return expired;
  }
}
