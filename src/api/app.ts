import express, { type Express } from 'express';
import cors from 'cors';
import { authMiddleware, handleLogin } from '../auth/jwt.js';
import { config } from '../config.js';
import type { RemediationEngine } from '../engine/engine.js';
import { createAlertsRouter } from './alerts.js';
import { createHealthRouter, type HealthProbes } from './health.js';
import { createApiRouter } from './routes.js';

/**
 * Mount middleware and routes on an Express app. The entry point passes the
 * process-wide engine; tests pass one of their own.
 */
export function configureApp(app: Express, engine: RemediationEngine, probes: HealthProbes): Express {
  app.use(cors({ origin: config.corsOrigins }));
  app.use(express.json({ limit: '1mb' }));

  // Public routes (no JWT)
  app.use('/api/health', createHealthRouter(engine, probes));
  app.post('/api/auth/login', handleLogin);

  // Alertmanager webhook (API key auth, not JWT)
  app.use('/api/alerts', createAlertsRouter(engine));

  // Everything else under /api requires a bearer token
  app.use('/api', authMiddleware);
  app.use(createApiRouter(engine));

  return app;
}
