/**
 * Health sweep -- polls the cluster and feeds the remediation engine.
 *
 * Each sweep:
 *  - records disk/memory/cpu usage samples for trend analysis
 *  - raises threshold issues (high_disk, high_memory, high_cpu) and clears
 *    them once the metric drops back
 *  - raises guest_stopped when a running VM/CT stops, clears it on recovery
 *
 * Node and guest fetches are independent; one failing does not block the other.
 */

import type { GuestResource, NodeResource } from '../clients/proxmox.js';
import type { RemediationEngine } from '../engine/engine.js';
import { errorMessage } from '../engine/errors.js';
import { StateTracker, type GuestState } from './state-tracker.js';
import { ThresholdEvaluator, type NodeMetrics, type ThresholdViolation } from './thresholds.js';

export const HEALTH_SOURCE = 'health';

export interface ClusterReader {
  getNodeResources(): Promise<NodeResource[]>;
  getGuestResources(): Promise<GuestResource[]>;
}

type EngineSink = Pick<RemediationEngine, 'recordSample' | 'reportLocalIssue' | 'clearLocalIssue'>;

export interface SweepSummary {
  nodes: number;
  guests: number;
  raised: number;
  cleared: number;
}

const METRIC_LABEL: Record<ThresholdViolation['metric'], string> = {
  diskPercent: 'Disk usage',
  memPercent: 'Memory usage',
  cpuPercent: 'CPU usage',
};

function percent(used: number, total: number): number {
  return total > 0 ? (used / total) * 100 : 0;
}

export function toNodeMetrics(node: NodeResource): NodeMetrics {
  return {
    node: node.node,
    online: node.status === 'online',
    diskPercent: percent(node.disk, node.maxdisk),
    memPercent: percent(node.mem, node.maxmem),
    cpuPercent: node.cpu * 100,
  };
}

function guestComponent(guest: GuestState): string {
  return guest.name || `${guest.type}-${guest.vmid}`;
}

export class HealthSweep {
  private readonly stateTracker = new StateTracker();
  private readonly thresholds = new ThresholdEvaluator();

  constructor(
    private readonly cluster: () => ClusterReader,
    private readonly engine: EngineSink,
  ) {}

  async run(): Promise<SweepSummary> {
    const summary: SweepSummary = { nodes: 0, guests: 0, raised: 0, cleared: 0 };
    const pve = this.cluster();

    const [nodesResult, guestsResult] = await Promise.allSettled([
      pve.getNodeResources(),
      pve.getGuestResources(),
    ]);

    if (nodesResult.status === 'fulfilled') {
      await this.processNodes(nodesResult.value.map(toNodeMetrics), summary);
    } else {
      console.warn('[Monitor] Failed to fetch nodes:', errorMessage(nodesResult.reason));
    }

    if (guestsResult.status === 'fulfilled') {
      await this.processGuests(guestsResult.value, summary);
    } else {
      console.warn('[Monitor] Failed to fetch guests:', errorMessage(guestsResult.reason));
    }

    return summary;
  }

  private async processNodes(nodes: NodeMetrics[], summary: SweepSummary): Promise<void> {
    summary.nodes = nodes.length;

    for (const node of nodes) {
      if (!node.online) continue;
      this.engine.recordSample(node.node, 'disk_usage', node.diskPercent);
      this.engine.recordSample(node.node, 'memory_usage', node.memPercent);
      this.engine.recordSample(node.node, 'cpu_usage', node.cpuPercent);
    }

    const { raised, cleared } = this.thresholds.evaluate(nodes);

    for (const v of raised) {
      await this.engine.reportLocalIssue({
        source: HEALTH_SOURCE,
        component: v.node,
        issueType: v.issueType,
        severity: v.severity,
        description: `${METRIC_LABEL[v.metric]} at ${v.value}% on ${v.node} (threshold ${v.threshold}%)`,
        metrics: { [v.metric]: v.value, threshold: v.threshold },
        labels: { node: v.node },
      });
      summary.raised++;
    }

    for (const c of cleared) {
      await this.engine.clearLocalIssue(HEALTH_SOURCE, c.node, c.issueType);
      summary.cleared++;
    }
  }

  private async processGuests(guests: GuestResource[], summary: SweepSummary): Promise<void> {
    summary.guests = guests.length;
    const { stopped, recovered } = this.stateTracker.update(guests);

    for (const guest of stopped) {
      const kind = guest.type === 'qemu' ? 'VM' : 'Container';
      await this.engine.reportLocalIssue({
        source: HEALTH_SOURCE,
        component: guestComponent(guest),
        issueType: 'guest_stopped',
        severity: 'CRITICAL',
        description: `${kind} ${guest.vmid} (${guestComponent(guest)}) on ${guest.node} stopped unexpectedly`,
        labels: { node: guest.node, type: guest.type, vmid: String(guest.vmid) },
      });
      summary.raised++;
    }

    for (const guest of recovered) {
      await this.engine.clearLocalIssue(HEALTH_SOURCE, guestComponent(guest), 'guest_stopped');
      summary.cleared++;
    }
  }
}
