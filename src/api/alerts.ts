/**
 * POST /api/alerts -- Alertmanager webhook intake.
 *
 * Authentication: X-API-Key header checked against WARDEN_API_KEY.
 *
 * Request:  { status?, alerts: [{ status, labels, annotations, startsAt, endsAt, fingerprint }] }
 * Response: { processed, created, updated, resolved, ignored, errors }
 *
 * Malformed alerts are reported in `errors` and skipped; the rest of the
 * batch is still processed.
 */

import { Router } from 'express';
import { z } from 'zod';
import { apiKeyAuth } from '../auth/jwt.js';
import type { RemediationEngine } from '../engine/engine.js';
import { errorMessage } from '../engine/errors.js';

const webhookSchema = z.object({
  status: z.string().optional(),
  alerts: z.array(z.unknown()),
});

export function createAlertsRouter(engine: RemediationEngine): Router {
  const router = Router();

  router.use(apiKeyAuth);

  router.post('/', async (req, res) => {
    const body = webhookSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Expected an Alertmanager payload with an alerts array' });
      return;
    }

    try {
      const result = await engine.ingestAlerts(body.data.alerts);
      console.log(
        `[Alerts] Webhook: ${result.processed} processed, ${result.created} new, ${result.errors.length} rejected`,
      );
      res.json({
        processed: result.processed,
        created: result.created,
        updated: result.updated,
        resolved: result.resolved,
        ignored: result.ignored,
        errors: result.errors,
      });
    } catch (err) {
      console.error('[Alerts] Webhook processing failed:', errorMessage(err));
      res.status(500).json({ error: 'Failed to process alerts' });
    }
  });

  return router;
}
