import express from 'express';
import { createServer } from 'node:http';
import { config } from './config.js';
import { configureApp } from './api/app.js';
import { setupSocketIO } from './realtime/socket.js';
import { openDatabase } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { SqliteActionHistory } from './db/action-history.js';
import { SqlitePreferenceStore } from './db/preferences.js';
import { createDiagnosisOracle } from './ai/diagnosis.js';
import { NodeShell } from './clients/ssh.js';
import { getAnyClient, getClientForNode } from './clients/proxmox.js';
import { createInfrastructureActions } from './clients/infrastructure-actions.js';
import { RemediationEngine } from './engine/engine.js';
import { formatIssueAlert } from './engine/format.js';
import { FanoutNotifier } from './engine/notifier.js';
import { DAY_MS, HOUR_MS } from './engine/types.js';
import { startMonitor, stopMonitor } from './monitor/index.js';
import { SocketNotifier } from './notify/socket.js';
import { TelegramNotifier } from './notify/telegram.js';
import { TelegramListener } from './services/telegram-listener.js';

// Create Express app and HTTP server
const app = express();
const server = createServer(app);

// Set up Socket.IO on the HTTP server
const { io, eventsNs } = setupSocketIO(server);

// Durable action history and preferences
const { sqlite, db } = openDatabase(config.dbPath);
runMigrations(sqlite);

const shell = new NodeShell({ nodes: config.clusterNodes, keyPath: config.sshKeyPath });

const notifier = new FanoutNotifier([new TelegramNotifier(), new SocketNotifier(eventsNs)]);

// The one engine instance for this process; everything below gets it by reference
const engine = new RemediationEngine({
  collaborator: createInfrastructureActions({
    exec: shell.exec,
    proxmoxFor: getClientForNode,
    dockerHost: config.dockerHostNode,
  }),
  oracle: createDiagnosisOracle(),
  notifier,
  history: new SqliteActionHistory(db),
  preferences: new SqlitePreferenceStore(db),
  maxActionsPerHour: config.maxActionsPerHour,
  requireApproval: config.requireApproval,
  cooldownMinutes: config.cooldownMinutes,
  approvalTtlMinutes: config.approvalTtlMinutes,
  oracleTimeoutMs: config.oracleTimeoutMs,
  actionTimeoutMs: config.actionTimeoutMs,
  trendRetentionMs: config.trendRetentionDays * DAY_MS,
  trendMinSamples: config.trendMinSamples,
  spawnIssuesFromForecasts: config.forecastSpawnIssues,
  outcomeRetentionMs: config.outcomeRetentionDays * DAY_MS,
  resolvedRetentionMs: config.resolvedIssueRetentionHours * HOUR_MS,
});

engine.failInterruptedActions();

// Announce every new issue once, before classification finishes
engine.onNewIssue((issue) =>
  notifier.notify(formatIssueAlert(issue, Date.now())).catch((err) =>
    console.error('[Notify] Issue announcement failed:', err instanceof Error ? err.message : err),
  ),
);

configureApp(app, engine, {
  checkDatabase: () => {
    sqlite.prepare('SELECT 1').get();
  },
  proxmoxVersion: () => getAnyClient().getVersion(),
});

const telegramListener = new TelegramListener(engine);

// Start listening -- IMPORTANT: listen on `server`, not `app` (Socket.IO requirement)
server.listen(config.port, () => {
  console.log(`Remediation engine running on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Health check: http://localhost:${config.port}/api/health`);
  console.log(`  Require approval: ${engine.requireApproval ? 'on' : 'off'}, max ${config.maxActionsPerHour} actions/hour`);

  startMonitor(engine);
  telegramListener.start();
});

// Graceful shutdown
function shutdown(signal: string) {
  console.log(`\n[${signal}] Shutting down gracefully...`);
  stopMonitor();
  telegramListener.stop();
  shell.close();
  io.close();
  server.close(() => {
    engine
      .whenIdle()
      .catch((err) => console.error('[Shutdown] In-flight work failed:', err instanceof Error ? err.message : err))
      .finally(() => {
        sqlite.close();
        console.log('Server closed.');
        process.exit(0);
      });
  });
  // Force exit after 10 seconds
  setTimeout(() => {
    console.error('Forced shutdown after timeout.');
    process.exit(1);
  }, 10000);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
