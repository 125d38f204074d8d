/**
 * Operator REST API. Every route here sits behind JWT auth (see app.ts).
 *
 * Issues:      GET /api/issues, GET /api/issues/stats,
 *              POST /api/issues/:id/{acknowledge,silence,remediate}
 * Approvals:   GET /api/approvals, POST /api/approvals/:id { approved }
 * Actions:     GET /api/actions?limit=, GET /api/actions/stats
 * Trends:      GET /api/predictions, POST /api/metrics
 * Engine:      PUT /api/engine/require-approval { enabled }
 * Reports:     GET /api/reports/health
 *
 * `:id` accepts a full id or an unambiguous prefix.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ApprovalResponse, RemediateResponse, RemediationEngine } from '../engine/engine.js';
import type { LookupResult } from '../engine/lookup.js';
import { errorMessage } from '../engine/errors.js';
import type { Issue } from '../engine/types.js';

const silenceSchema = z.object({ minutes: z.number().positive().max(7 * 24 * 60).default(60) });
const approvalSchema = z.object({ approved: z.boolean() });
const requireApprovalSchema = z.object({ enabled: z.boolean() });

const sampleSchema = z.object({
  component: z.string().min(1),
  metric: z.string().min(1),
  value: z.number().finite(),
  timestamp: z.number().int().positive().optional(),
});
const metricsSchema = z.union([z.object({ samples: z.array(sampleSchema).min(1) }), sampleSchema]);

const APPROVAL_STATUS: Record<ApprovalResponse['status'], number> = {
  approved: 202,
  rejected: 200,
  expired: 410,
  not_found: 404,
  ambiguous: 409,
};

const REMEDIATE_STATUS: Record<RemediateResponse['status'], number> = {
  dispatched: 202,
  not_found: 404,
  ambiguous: 409,
  no_runbook: 422,
};

function parseLimit(raw: unknown, fallback: number): number {
  const value = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  return Number.isInteger(value) && value > 0 ? Math.min(value, 500) : fallback;
}

/** Operator name for audit logs. */
function actorOf(res: Response): string {
  const user: unknown = res.locals.user;
  return typeof user === 'object' && user !== null && 'role' in user && typeof user.role === 'string'
    ? user.role
    : 'operator';
}

/** 404/409 for a failed lookup; true when the handler should stop. */
function rejectLookup(res: Response, id: string, found: LookupResult<Issue>): boolean {
  if (found.kind === 'not_found') {
    res.status(404).json({ error: `No active issue matches "${id}"`, reason: 'not_found' });
    return true;
  }
  if (found.kind === 'ambiguous') {
    res.status(409).json({ error: `"${id}" matches ${found.matches.length} issues`, reason: 'ambiguous_id' });
    return true;
  }
  return false;
}

export function createApiRouter(engine: RemediationEngine): Router {
  const router = Router();

  // ------------------------------------------------------------------ Issues

  router.get('/api/issues', (_req: Request, res: Response) => {
    res.json({ issues: engine.getActiveIssues() });
  });

  router.get('/api/issues/stats', (_req: Request, res: Response) => {
    res.json(engine.getStats());
  });

  router.post('/api/issues/:id/acknowledge', async (req: Request, res: Response) => {
    const id = req.params.id;
    if (rejectLookup(res, id, engine.dedup.find(id))) return;

    const issue = await engine.acknowledge(id, actorOf(res));
    if (!issue) {
      res.status(409).json({ error: 'Only firing issues can be acknowledged' });
      return;
    }
    res.json({ issue });
  });

  router.post('/api/issues/:id/silence', async (req: Request, res: Response) => {
    const id = req.params.id;
    const body = silenceSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'minutes must be a positive number of minutes (max 7 days)' });
      return;
    }
    if (rejectLookup(res, id, engine.dedup.find(id))) return;

    const issue = await engine.silence(id, body.data.minutes);
    if (!issue) {
      res.status(409).json({ error: 'Issue could not be silenced' });
      return;
    }
    res.json({ issue });
  });

  router.post('/api/issues/:id/remediate', (req: Request, res: Response) => {
    const response = engine.remediate(req.params.id);
    res.status(REMEDIATE_STATUS[response.status]).json(response);
  });

  // ------------------------------------------------------------------ Approvals

  router.get('/api/approvals', (_req: Request, res: Response) => {
    res.json({ approvals: engine.getPendingApprovals() });
  });

  router.post('/api/approvals/:id', (req: Request, res: Response) => {
    const body = approvalSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'approved (boolean) is required' });
      return;
    }
    const response = engine.resolveApproval(req.params.id, body.data.approved, actorOf(res));
    res.status(APPROVAL_STATUS[response.status]).json(response);
  });

  // ------------------------------------------------------------------ Actions

  router.get('/api/actions', (req: Request, res: Response) => {
    res.json({ actions: engine.getRecentActions(parseLimit(req.query.limit, 20)) });
  });

  router.get('/api/actions/stats', (_req: Request, res: Response) => {
    res.json(engine.getStats().remediation);
  });

  // ------------------------------------------------------------------ Trends

  router.get('/api/predictions', (_req: Request, res: Response) => {
    res.json({ predictions: engine.getPredictions() });
  });

  router.post('/api/metrics', (req: Request, res: Response) => {
    const body = metricsSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Expected { component, metric, value } or { samples: [...] }' });
      return;
    }
    const samples = 'samples' in body.data ? body.data.samples : [body.data];
    for (const s of samples) {
      engine.recordSample(s.component, s.metric, s.value, s.timestamp);
    }
    res.status(202).json({ recorded: samples.length });
  });

  // ------------------------------------------------------------------ Engine

  router.put('/api/engine/require-approval', (req: Request, res: Response) => {
    const body = requireApprovalSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'enabled (boolean) is required' });
      return;
    }
    try {
      engine.setRequireApproval(body.data.enabled);
    } catch (err) {
      console.error('[API] Failed to persist require-approval:', errorMessage(err));
      res.status(500).json({ error: 'Failed to update setting' });
      return;
    }
    console.log(`[API] Require approval set to ${body.data.enabled} by ${actorOf(res)}`);
    res.json({ requireApproval: engine.requireApproval });
  });

  // ------------------------------------------------------------------ Reports

  router.get('/api/reports/health', (_req: Request, res: Response) => {
    res.json(engine.getHealthReport());
  });

  return router;
}
