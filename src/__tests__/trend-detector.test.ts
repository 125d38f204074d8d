/**
 * Unit tests for trend forecasts and anomaly flags. Samples are hourly
 * straight lines so slopes and horizons are exact.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TrendDetector, isActionable, olsSlope, stdDev } from '../engine/trend-detector.js';
import { DAY_MS, HOUR_MS, type Prediction } from '../engine/types.js';
import { FakeClock } from './helpers.js';

/** 24 hourly samples ending now: start, start + step, ... */
function feedLine(detector: TrendDetector, clock: FakeClock, component: string, metric: string, start: number, step: number, count = 24): void {
  for (let i = 0; i < count; i++) {
    detector.addSample(component, metric, start + step * i, clock.now - (count - 1 - i) * HOUR_MS);
  }
}

describe('math helpers', () => {
  it('computes an exact slope for a straight line', () => {
    expect(olsSlope([0, 1, 2, 3], [10, 12, 14, 16])).toBe(2);
    expect(olsSlope([1, 1, 1], [3, 4, 5])).toBe(0);
  });

  it('computes the population standard deviation', () => {
    expect(stdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(stdDev([])).toBe(0);
  });
});

describe('TrendDetector', () => {
  let clock: FakeClock;
  let failures: number[];
  let detector: TrendDetector;

  beforeEach(() => {
    clock = new FakeClock();
    failures = [];
    detector = new TrendDetector({
      clock: clock.read,
      retentionMs: 7 * DAY_MS,
      minSamples: 24,
      failureTimes: () => failures,
    });
  });

  it('forecasts a full disk from an increasing trend', () => {
    feedLine(detector, clock, 'pve1', 'disk_usage', 60, 0.5);

    const prediction = detector.forecastDiskFull('pve1');

    expect(prediction?.id).toBe('DISK_FULL:pve1');
    expect(prediction?.hoursUntil).toBe(47);
    expect(prediction?.severity).toBe('WARNING');
    expect(prediction?.confidence).toBe('MEDIUM');
    expect(prediction?.predictedTime).toBeGreaterThan(clock.now);
    expect(prediction?.description).toBe('Disk on pve1 projected to reach 95% in 47h');
  });

  it('marks a disk filling within a day as CRITICAL', () => {
    feedLine(detector, clock, 'pve1', 'disk_usage', 80, 0.6);
    // current 93.8, 1.2 points to go at 0.6/h
    const prediction = detector.forecastDiskFull('pve1');
    expect(prediction?.severity).toBe('CRITICAL');
    expect(prediction?.hoursUntil).toBe(2);
  });

  it('does not forecast flat or decreasing disk usage', () => {
    feedLine(detector, clock, 'flat', 'disk_usage', 70, 0);
    feedLine(detector, clock, 'falling', 'disk_usage', 90, -0.5);

    expect(detector.trend('flat', 'disk_usage')?.direction).toBe('stable');
    expect(detector.trend('falling', 'disk_usage')?.direction).toBe('decreasing');
    expect(detector.forecastDiskFull('flat')).toBeNull();
    expect(detector.forecastDiskFull('falling')).toBeNull();
  });

  it('does not forecast beyond the horizon', () => {
    // 0.11 points/h from 10%: roughly 700h to go, past the 168h memory horizon
    feedLine(detector, clock, 'pve1', 'memory_usage', 10, 0.11);
    expect(detector.forecastMemoryExhaustion('pve1')).toBeNull();
  });

  it('needs the minimum number of samples', () => {
    feedLine(detector, clock, 'pve1', 'disk_usage', 60, 0.5, 23);
    expect(detector.trend('pve1', 'disk_usage')).toBeNull();
    expect(detector.forecastDiskFull('pve1')).toBeNull();
  });

  it('forecasts memory exhaustion with HIGH confidence for a steady climb', () => {
    feedLine(detector, clock, 'pve2', 'memory_usage', 80, 0.2);
    const prediction = detector.forecastMemoryExhaustion('pve2');
    expect(prediction?.type).toBe('MEMORY_EXHAUSTION');
    expect(prediction?.hoursUntil).toBe(27);
    expect(prediction?.severity).toBe('WARNING');
    expect(prediction?.confidence).toBe('HIGH');
    expect(prediction && isActionable(prediction)).toBe(true);
  });

  it('forgets samples older than the retention window', () => {
    detector.addSample('pve1', 'disk_usage', 50, clock.now - 8 * DAY_MS);
    detector.addSample('pve1', 'disk_usage', 55, clock.now);
    expect(detector.samples('pve1', 'disk_usage')).toEqual([{ timestamp: clock.now, value: 55 }]);
  });

  it('ignores non-finite samples', () => {
    detector.addSample('pve1', 'disk_usage', Number.NaN);
    expect(detector.samples('pve1', 'disk_usage')).toEqual([]);
  });

  it('forecasts a recurring failure from regular intervals', () => {
    failures = [clock.now - 60 * HOUR_MS, clock.now - 36 * HOUR_MS, clock.now - 12 * HOUR_MS];

    const prediction = detector.forecastRecurringFailure('nginx');

    expect(prediction?.type).toBe('SERVICE_FAILURE');
    expect(prediction?.hoursUntil).toBe(12);
    expect(prediction?.confidence).toBe('HIGH');
    expect(prediction?.severity).toBe('WARNING');
    expect(prediction?.predictedTime).toBe(clock.now + 12 * HOUR_MS);
  });

  it('needs three failures and a future next failure', () => {
    failures = [clock.now - 36 * HOUR_MS, clock.now - 12 * HOUR_MS];
    expect(detector.forecastRecurringFailure('nginx')).toBeNull();

    failures = [clock.now - 100 * HOUR_MS, clock.now - 90 * HOUR_MS, clock.now - 80 * HOUR_MS];
    expect(detector.forecastRecurringFailure('nginx')).toBeNull();
  });

  it('flags an outlier and a spike', () => {
    for (let i = 0; i < 39; i++) {
      detector.addSample('pve1', 'cpu_usage', 50, clock.now - (39 - i) * HOUR_MS);
    }
    detector.addSample('pve1', 'cpu_usage', 90, clock.now);

    const anomalies = detector.detectAnomalies('pve1', 'cpu_usage');

    expect(anomalies.map((a) => a.kind)).toEqual(['outlier', 'spike']);
    expect(anomalies[0]?.value).toBe(90);
    expect(anomalies[0]?.mean).toBe(51);
  });

  it('reports no anomalies for short or constant series', () => {
    feedLine(detector, clock, 'short', 'cpu_usage', 50, 0, 22);
    detector.addSample('short', 'cpu_usage', 500, clock.now);
    feedLine(detector, clock, 'constant', 'cpu_usage', 50, 0, 30);
    expect(detector.detectAnomalies('short', 'cpu_usage')).toEqual([]);
    expect(detector.detectAnomalies('constant', 'cpu_usage')).toEqual([]);
  });

  it('analyzes every known component plus extras', () => {
    feedLine(detector, clock, 'pve1', 'disk_usage', 60, 0.5);
    failures = [clock.now - 60 * HOUR_MS, clock.now - 36 * HOUR_MS, clock.now - 12 * HOUR_MS];

    const { predictions } = detector.analyze(['nginx']);

    // pve1 disk, plus the failure forecast answered for both components
    expect(predictions.map((p) => p.id).sort()).toEqual([
      'DISK_FULL:pve1',
      'SERVICE_FAILURE:nginx',
      'SERVICE_FAILURE:pve1',
    ]);
  });
});

describe('isActionable', () => {
  const base: Prediction = {
    id: 'DISK_FULL:pve1',
    type: 'DISK_FULL',
    component: 'pve1',
    confidence: 'HIGH',
    severity: 'WARNING',
    hoursUntil: 40,
    predictedTime: 0,
    description: '',
    recommendation: '',
    metrics: {},
    createdAt: 0,
  };

  it('requires HIGH/MEDIUM confidence and WARNING/CRITICAL severity', () => {
    expect(isActionable(base)).toBe(true);
    expect(isActionable({ ...base, confidence: 'LOW' })).toBe(false);
    expect(isActionable({ ...base, severity: 'INFO' })).toBe(false);
  });
});
