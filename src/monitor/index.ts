/**
 * Monitor lifecycle management.
 *
 * Starts the periodic loops that drive the remediation engine:
 *  - Health sweep:  cluster metrics, thresholds and guest state
 *  - Trend sweep:   forecasts and anomaly checks
 *  - Housekeeping:  expired approvals and silences, retention pruning
 */

import { getAnyClient } from '../clients/proxmox.js';
import { config } from '../config.js';
import type { RemediationEngine } from '../engine/engine.js';
import { HealthSweep } from './health-sweep.js';

const timers: Array<ReturnType<typeof setInterval>> = [];
let startupTimer: ReturnType<typeof setTimeout> | null = null;
let running = false;

/** Initial delay before the first health sweep */
const STARTUP_DELAY = 5_000;

export interface MonitorIntervals {
  healthMs: number;
  trendMs: number;
  housekeepingMs: number;
}

/**
 * Start the monitoring loops. Each tick is independently error-wrapped so a
 * failing sweep never stops the others.
 */
export function startMonitor(
  engine: RemediationEngine,
  intervals: MonitorIntervals = {
    healthMs: config.healthSweepIntervalMs,
    trendMs: config.trendSweepIntervalMs,
    housekeepingMs: config.housekeepingIntervalMs,
  },
): void {
  if (running) {
    console.warn('[Monitor] Already running, skipping start');
    return;
  }

  const health = new HealthSweep(getAnyClient, engine);

  const runHealth = (): void => {
    health.run().catch(err =>
      console.error('[Monitor] Health sweep error:', err instanceof Error ? err.message : err)
    );
  };

  startupTimer = setTimeout(() => {
    startupTimer = null;
    runHealth();
    timers.push(setInterval(runHealth, intervals.healthMs));
  }, STARTUP_DELAY);

  timers.push(
    setInterval(() => {
      engine.runTrendAnalysis().catch(err =>
        console.error('[Monitor] Trend analysis error:', err instanceof Error ? err.message : err)
      );
    }, intervals.trendMs),
  );

  timers.push(
    setInterval(() => {
      engine.sweep().catch(err =>
        console.error('[Monitor] Housekeeping error:', err instanceof Error ? err.message : err)
      );
    }, intervals.housekeepingMs),
  );

  running = true;
  console.log('[Monitor] Monitoring started');
  console.log(`[Monitor]   Health:       every ${Math.round(intervals.healthMs / 1000)}s`);
  console.log(`[Monitor]   Trends:       every ${Math.round(intervals.trendMs / 1000)}s`);
  console.log(`[Monitor]   Housekeeping: every ${Math.round(intervals.housekeepingMs / 1000)}s`);
}

/** Stop all monitoring loops. */
export function stopMonitor(): void {
  if (startupTimer) {
    clearTimeout(startupTimer);
    startupTimer = null;
  }
  for (const id of timers) {
    clearInterval(id);
  }
  timers.length = 0;
  running = false;
  console.log('[Monitor] Monitoring stopped');
}
