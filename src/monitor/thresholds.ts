/**
 * Threshold evaluator -- checks node metrics against defined thresholds.
 * Keeps a Set of active violations so each one is raised once and cleared
 * once, not re-emitted every poll cycle.
 */

import type { Severity } from '../engine/types.js';

export interface NodeMetrics {
  node: string;
  online: boolean;
  diskPercent: number;
  memPercent: number;
  cpuPercent: number;
}

type MetricKey = 'diskPercent' | 'memPercent' | 'cpuPercent';

interface Threshold {
  metric: MetricKey;
  value: number;
  severity: Severity;
  issueType: string;
}

export interface ThresholdViolation {
  issueType: string;
  node: string;
  metric: MetricKey;
  value: number;
  threshold: number;
  severity: Severity;
}

export interface ThresholdChanges {
  raised: ThresholdViolation[];
  cleared: Array<{ issueType: string; node: string }>;
}

export const THRESHOLDS: Threshold[] = [
  { metric: 'diskPercent', value: 90, severity: 'WARNING', issueType: 'high_disk' },
  { metric: 'memPercent', value: 90, severity: 'WARNING', issueType: 'high_memory' },
  { metric: 'cpuPercent', value: 95, severity: 'WARNING', issueType: 'high_cpu' },
];

export class ThresholdEvaluator {
  /** Active violation keys: `${issueType}|${node}` */
  private activeViolations = new Set<string>();

  /**
   * Evaluate all thresholds against current node metrics. Returns NEW
   * violations and violations that have cleared since the last call.
   * Offline nodes keep their current state.
   */
  evaluate(nodes: NodeMetrics[]): ThresholdChanges {
    const raised: ThresholdViolation[] = [];
    const cleared: ThresholdChanges['cleared'] = [];

    for (const node of nodes) {
      if (!node.online) continue;

      for (const threshold of THRESHOLDS) {
        const value = node[threshold.metric];
        const key = `${threshold.issueType}|${node.node}`;

        if (value > threshold.value) {
          if (!this.activeViolations.has(key)) {
            this.activeViolations.add(key);
            raised.push({
              issueType: threshold.issueType,
              node: node.node,
              metric: threshold.metric,
              value: Math.round(value * 10) / 10,
              threshold: threshold.value,
              severity: threshold.severity,
            });
          }
        } else if (this.activeViolations.delete(key)) {
          cleared.push({ issueType: threshold.issueType, node: node.node });
        }
      }
    }

    return { raised, cleared };
  }

  /** Get count of active violations */
  getActiveCount(): number {
    return this.activeViolations.size;
  }
}
