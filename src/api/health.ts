import { Router } from 'express';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { RemediationEngine } from '../engine/engine.js';
import { errorMessage } from '../engine/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let version = '1.0.0';
try {
  const pkgPath = join(__dirname, '..', '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    version = pkg.version;
  }
} catch (err) {
  console.warn('[Health] Could not read package version:', errorMessage(err));
}

export interface HealthProbes {
  /** Throws when the database is unusable. */
  checkDatabase(): void;
  /** Resolves to the Proxmox version string. */
  proxmoxVersion(): Promise<string>;
}

interface ComponentHealth {
  status: 'up' | 'down';
  responseMs: number;
  version?: string;
  error?: string;
}

async function probe(check: () => Promise<string | undefined>): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    const detail = await check();
    return { status: 'up', responseMs: Date.now() - start, ...(detail ? { version: detail } : {}) };
  } catch (err) {
    return { status: 'down', responseMs: Date.now() - start, error: errorMessage(err) };
  }
}

export function createHealthRouter(engine: RemediationEngine, probes: HealthProbes): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    // Liveness check for Docker healthcheck compatibility
    if (req.query.liveness !== undefined) {
      res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime(), version });
      return;
    }

    const [database, proxmox] = await Promise.all([
      probe(async () => {
        probes.checkDatabase();
        return undefined;
      }),
      probe(() => probes.proxmoxVersion()),
    ]);

    const components = { database, proxmox };
    const allUp = Object.values(components).every((c) => c.status === 'up');
    const stats = engine.getStats();

    res.status(allUp ? 200 : 503).json({
      status: allUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version,
      components,
      engine: {
        activeIssues: stats.issues.total,
        pendingApprovals: stats.pendingApprovals,
        requireApproval: stats.remediation.requireApproval,
      },
    });
  });

  return router;
}
