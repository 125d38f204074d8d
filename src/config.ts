import 'dotenv/config';
import { z } from 'zod';

export interface ClusterNode {
  name: string;
  host: string;
}

/** Parse `name=host,name=host` into cluster node entries. */
function parseClusterNodes(raw: string): ClusterNode[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const [name, host] = entry.split('=');
      return { name: name.trim(), host: (host ?? name).trim() };
    });
}

/**
 * Whole-number setting from the environment. Unset or empty gives the
 * default; anything else that is not an integer >= min stops startup.
 */
export function intFromEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = z.coerce.number().int().min(min).safeParse(raw.trim());
  if (!parsed.success) {
    throw new Error(`${name} must be a whole number >= ${min} (got "${raw}")`);
  }
  return parsed.data;
}

export const config = {
  port: intFromEnv('PORT', 4000, 1),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Auth
  jwtSecret: process.env.JWT_SECRET || (() => {
    if (process.env.NODE_ENV === 'production') {
      throw new Error('JWT_SECRET must be set in production');
    }
    return 'warden-dev-secret';
  })(),
  operatorPassword: process.env.OPERATOR_PASSWORD || 'warden',

  // API key for the alert webhook (Alertmanager, scripts)
  apiKey: process.env.WARDEN_API_KEY || '',

  // Database
  dbPath: process.env.DB_PATH || './data/warden.db',

  // Remediation safety limits
  requireApproval: process.env.REQUIRE_APPROVAL === 'true',
  maxActionsPerHour: intFromEnv('MAX_ACTIONS_PER_HOUR', 10),
  cooldownMinutes: {
    service_restart: intFromEnv('COOLDOWN_SERVICE_RESTART_MIN', 15),
    container_restart: intFromEnv('COOLDOWN_CONTAINER_RESTART_MIN', 10),
    disk_cleanup: intFromEnv('COOLDOWN_DISK_CLEANUP_MIN', 60),
    log_rotation: intFromEnv('COOLDOWN_LOG_ROTATION_MIN', 30),
    resource_scale: intFromEnv('COOLDOWN_RESOURCE_SCALE_MIN', 30),
    custom: intFromEnv('COOLDOWN_CUSTOM_MIN', 15),
  },
  approvalTtlMinutes: intFromEnv('APPROVAL_TTL_MIN', 60, 1),
  oracleTimeoutMs: intFromEnv('ORACLE_TIMEOUT_MS', 20000, 1),
  actionTimeoutMs: intFromEnv('ACTION_TIMEOUT_MS', 120000, 1),

  // Trend analysis
  trendRetentionDays: intFromEnv('TREND_RETENTION_DAYS', 7, 1),
  trendMinSamples: intFromEnv('TREND_MIN_SAMPLES', 24, 1),
  forecastSpawnIssues: process.env.FORECAST_SPAWN_ISSUES !== 'false', // default true

  // History retention
  outcomeRetentionDays: intFromEnv('OUTCOME_RETENTION_DAYS', 7, 1),
  resolvedIssueRetentionHours: intFromEnv('RESOLVED_ISSUE_RETENTION_HOURS', 24, 1),

  // Sweeps
  healthSweepIntervalMs: intFromEnv('HEALTH_SWEEP_INTERVAL_MS', 60000, 1),
  trendSweepIntervalMs: intFromEnv('TREND_SWEEP_INTERVAL_MS', 3600000, 1),
  housekeepingIntervalMs: intFromEnv('HOUSEKEEPING_INTERVAL_MS', 60000, 1),

  // SSH
  sshKeyPath: process.env.SSH_KEY_PATH || '/app/.ssh/id_ed25519',

  // Proxmox API
  pveTokenId: process.env.PVE_TOKEN_ID || 'root@pam!warden',
  pveTokenSecret: process.env.PVE_TOKEN_SECRET || '',

  // Cluster nodes
  clusterNodes: parseClusterNodes(process.env.CLUSTER_NODES || 'pve=127.0.0.1'),

  // Node that runs the Docker engine for container remediation
  dockerHostNode: process.env.DOCKER_HOST_NODE || '',

  // Telegram integration
  telegramBotToken: process.env.TELEGRAM_BOT_TOKEN || '',
  telegramChatId: process.env.TELEGRAM_CHAT_ID || '',
  telegramPollingInterval: intFromEnv('TELEGRAM_POLLING_INTERVAL', 2000, 1),
  telegramListenerEnabled: process.env.TELEGRAM_LISTENER_ENABLED !== 'false', // default true

  // Diagnosis oracle: Claude when ANTHROPIC_API_KEY is set, else the local LLM
  claudeModel: process.env.CLAUDE_MODEL || 'claude-sonnet-4-20250514',
  localLlmEndpoint: process.env.LOCAL_LLM_ENDPOINT || '',
  localLlmModel: process.env.LOCAL_LLM_MODEL || 'qwen2.5-7b-instruct-q4_k_m.gguf',

  // CORS
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:5173').split(',').filter(Boolean),
} as const;
