/**
 * Static tables that turn Alertmanager alert names into issue types and
 * suggested fixes, plus the default risk of every known issue type.
 */

import type { RiskLevel, Severity } from './types.js';

const ISSUE_TYPE_BY_ALERT: Record<string, string> = {
  ContainerDown: 'container_stopped',
  ContainerUnhealthy: 'container_unhealthy',
  ServiceDown: 'service_stopped',
  HighMemory: 'high_memory',
  HighMemoryUsage: 'high_memory',
  HighDiskUsage: 'high_disk',
  DiskFull: 'disk_full',
  HighCPU: 'high_cpu',
  HighCpuUsage: 'high_cpu',
  HighLogVolume: 'log_volume_high',
  DockerDaemonDown: 'daemon_unhealthy',
  HostDown: 'host_down',
};

const SUGGESTED_FIX_BY_ALERT: Record<string, string> = {
  HighCPU: 'Check for runaway processes; consider restarting the heaviest service',
  HighMemory: 'Drop page caches or restart the service with the largest footprint',
  HighDiskUsage: 'Clean rotated logs and prune unused Docker images',
  DiskFull: 'Free space immediately: clean logs, prune Docker, check large files',
  ContainerDown: 'Restart the affected container',
  ContainerUnhealthy: 'Restart the affected container and check its health check',
  ServiceDown: 'Restart the affected service and check its logs',
  HighLatency: 'Check network saturation and upstream dependencies',
  HostDown: 'Check host power and network connectivity',
};

/**
 * Default risk per issue type. Used whenever the diagnosis oracle is
 * unavailable or its answer cannot be parsed.
 */
const DEFAULT_RISK: Record<string, RiskLevel> = {
  container_stopped: 'LOW',
  container_unhealthy: 'LOW',
  high_cpu: 'LOW',
  high_disk: 'LOW',
  log_volume_high: 'LOW',
  high_memory: 'MEDIUM',
  service_stopped: 'MEDIUM',
  guest_stopped: 'MEDIUM',
  memory_exhaustion: 'MEDIUM',
  recurring_failure: 'MEDIUM',
  daemon_unhealthy: 'HIGH',
  disk_full: 'HIGH',
  host_down: 'HIGH',
  monitoring_error: 'HIGH',
};

export function issueTypeForAlert(alertName: string): string {
  return ISSUE_TYPE_BY_ALERT[alertName] ?? `prometheus_${alertName.toLowerCase()}`;
}

export function suggestedFixForAlert(alertName: string): string {
  return SUGGESTED_FIX_BY_ALERT[alertName] ?? `Investigate ${alertName} alert`;
}

/** Unknown issue types default to MEDIUM, never LOW. */
export function defaultRiskFor(issueType: string): RiskLevel {
  return DEFAULT_RISK[issueType] ?? 'MEDIUM';
}

export function parseSeverity(raw: string | undefined): Severity {
  switch ((raw ?? '').toLowerCase()) {
    case 'critical':
    case 'error':
      return 'CRITICAL';
    case 'warning':
      return 'WARNING';
    default:
      return 'INFO';
  }
}
