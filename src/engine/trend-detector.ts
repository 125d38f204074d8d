/**
 * TrendDetector -- rolling metric history, linear trends, forecasts and
 * anomaly flags.
 *
 * Forecasts are deterministic:
 *  - Disk full: increasing `disk_usage` towards 95%, horizon 30 days
 *  - Memory exhaustion: increasing `memory_usage` towards 90%, horizon 7 days
 *  - Recurring failure: mean interval between past failures, horizon 30 days
 *
 * Confidence falls with volatility (or with the coefficient of variation of
 * failure intervals). Anomalies are reported, never turned into issues here.
 */

import {
  DAY_MS,
  HOUR_MS,
  systemClock,
  type Anomaly,
  type Clock,
  type Confidence,
  type Prediction,
  type Severity,
  type Trend,
  type TrendSample,
} from './types.js';

// ---------------------------------------------------------------------------
// Forecast rules
// ---------------------------------------------------------------------------

interface ThresholdRule {
  type: 'DISK_FULL' | 'MEMORY_EXHAUSTION';
  metric: string;
  threshold: number;
  horizonHours: number;
  /** Volatility below [0] is HIGH confidence, below [1] MEDIUM. */
  volatilityBands: [number, number];
  /** Hours below [0] is CRITICAL, below [1] WARNING. */
  severityBands: [number, number];
  label: string;
  recommendation: string;
}

export const THRESHOLD_RULES: ThresholdRule[] = [
  {
    type: 'DISK_FULL',
    metric: 'disk_usage',
    threshold: 95,
    horizonHours: 30 * 24,
    volatilityBands: [2, 5],
    severityBands: [24, 72],
    label: 'Disk',
    recommendation: 'Clean old logs, prune unused images or expand the volume',
  },
  {
    type: 'MEMORY_EXHAUSTION',
    metric: 'memory_usage',
    threshold: 90,
    horizonHours: 7 * 24,
    volatilityBands: [3, 7],
    severityBands: [12, 48],
    label: 'Memory',
    recommendation: 'Look for a leaking process, restart it or add memory',
  },
];

const STABLE_SLOPE = 0.1;
const FAILURE_HORIZON_HOURS = 30 * 24;
const ANOMALY_WINDOW = 10;

// ---------------------------------------------------------------------------
// Math helpers
// ---------------------------------------------------------------------------

export function mean(values: number[]): number {
  return values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

/** Population standard deviation. */
export function stdDev(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

/** Ordinary least-squares slope of y over x. */
export function olsSlope(xs: number[], ys: number[]): number {
  const mx = mean(xs);
  const my = mean(ys);
  let num = 0;
  let den = 0;
  for (let i = 0; i < xs.length; i++) {
    num += (xs[i] - mx) * (ys[i] - my);
    den += (xs[i] - mx) ** 2;
  }
  return den === 0 ? 0 : num / den;
}

function band(value: number, [high, medium]: [number, number]): Confidence {
  if (value < high) return 'HIGH';
  if (value < medium) return 'MEDIUM';
  return 'LOW';
}

function round(value: number, digits = 1): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/** Forecasts worth telling a human about. */
export function isActionable(prediction: Prediction): boolean {
  return (
    (prediction.confidence === 'HIGH' || prediction.confidence === 'MEDIUM') &&
    (prediction.severity === 'WARNING' || prediction.severity === 'CRITICAL')
  );
}

// ---------------------------------------------------------------------------
// Detector
// ---------------------------------------------------------------------------

export interface TrendDetectorOptions {
  clock?: Clock;
  retentionMs?: number;
  minSamples?: number;
  /** Start times of past failures for a component, oldest first. */
  failureTimes?: (component: string) => number[];
}

export interface AnalysisResult {
  predictions: Prediction[];
  anomalies: Anomaly[];
}

export class TrendDetector {
  private readonly series = new Map<string, Map<string, TrendSample[]>>();
  private readonly clock: Clock;
  private readonly retentionMs: number;
  private readonly minSamples: number;
  private readonly failureTimes: (component: string) => number[];

  constructor(opts: TrendDetectorOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.retentionMs = opts.retentionMs ?? 7 * DAY_MS;
    this.minSamples = opts.minSamples ?? 24;
    this.failureTimes = opts.failureTimes ?? (() => []);
  }

  addSample(component: string, metric: string, value: number, timestamp = this.clock()): void {
    if (!Number.isFinite(value)) return;
    let metrics = this.series.get(component);
    if (!metrics) {
      metrics = new Map();
      this.series.set(component, metrics);
    }
    const samples = metrics.get(metric) ?? [];
    samples.push({ timestamp, value });
    metrics.set(metric, samples);
  }

  /** Samples inside the retention window; older ones are dropped. */
  samples(component: string, metric: string): TrendSample[] {
    const metrics = this.series.get(component);
    const all = metrics?.get(metric);
    if (!metrics || !all) return [];

    const cutoff = this.clock() - this.retentionMs;
    const kept = all.filter((s) => s.timestamp >= cutoff);
    if (kept.length !== all.length) metrics.set(metric, kept);
    return kept;
  }

  components(): string[] {
    return [...this.series.keys()];
  }

  trend(component: string, metric: string): Trend | null {
    const samples = this.samples(component, metric);
    if (samples.length < this.minSamples) return null;

    const t0 = samples[0].timestamp;
    const xs = samples.map((s) => (s.timestamp - t0) / HOUR_MS);
    const ys = samples.map((s) => s.value);
    const slope = olsSlope(xs, ys);

    return {
      slope,
      volatility: stdDev(ys),
      direction: Math.abs(slope) < STABLE_SLOPE ? 'stable' : slope > 0 ? 'increasing' : 'decreasing',
      mean: mean(ys),
      current: ys[ys.length - 1],
      sampleCount: ys.length,
    };
  }

  // ------------------------------------------------------------------ Forecasts

  forecastThreshold(component: string, rule: ThresholdRule): Prediction | null {
    const trend = this.trend(component, rule.metric);
    if (!trend || trend.direction !== 'increasing') return null;

    const hoursUntil = (rule.threshold - trend.current) / trend.slope;
    if (!(hoursUntil > 0 && hoursUntil < rule.horizonHours)) return null;

    const now = this.clock();
    const severity: Severity =
      hoursUntil < rule.severityBands[0] ? 'CRITICAL' : hoursUntil < rule.severityBands[1] ? 'WARNING' : 'INFO';

    return {
      id: `${rule.type}:${component}`,
      type: rule.type,
      component,
      confidence: band(trend.volatility, rule.volatilityBands),
      severity,
      hoursUntil: round(hoursUntil),
      predictedTime: now + hoursUntil * HOUR_MS,
      description: `${rule.label} on ${component} projected to reach ${rule.threshold}% in ${round(hoursUntil)}h`,
      recommendation: rule.recommendation,
      metrics: {
        current: round(trend.current),
        slopePerHour: round(trend.slope, 3),
        volatility: round(trend.volatility, 2),
        threshold: rule.threshold,
      },
      createdAt: now,
    };
  }

  forecastDiskFull(component: string): Prediction | null {
    return this.forecastThreshold(component, THRESHOLD_RULES[0]);
  }

  forecastMemoryExhaustion(component: string): Prediction | null {
    return this.forecastThreshold(component, THRESHOLD_RULES[1]);
  }

  forecastRecurringFailure(component: string): Prediction | null {
    const times = this.failureTimes(component);
    if (times.length < 3) return null;

    const intervals: number[] = [];
    for (let i = 1; i < times.length; i++) {
      intervals.push((times[i] - times[i - 1]) / HOUR_MS);
    }
    const meanInterval = mean(intervals);
    if (meanInterval <= 0) return null;
    const cv = stdDev(intervals) / meanInterval;

    const now = this.clock();
    const predictedTime = times[times.length - 1] + meanInterval * HOUR_MS;
    const hoursUntil = (predictedTime - now) / HOUR_MS;
    if (hoursUntil < 0 || hoursUntil > FAILURE_HORIZON_HOURS) return null;

    return {
      id: `SERVICE_FAILURE:${component}`,
      type: 'SERVICE_FAILURE',
      component,
      confidence: band(cv, [0.3, 0.6]),
      severity: 'WARNING',
      hoursUntil: round(hoursUntil),
      predictedTime,
      description: `${component} has failed ${times.length} times; next failure expected in ${round(hoursUntil)}h`,
      recommendation: 'Investigate the root cause of the recurring failure',
      metrics: {
        failures: times.length,
        meanIntervalHours: round(meanInterval),
        coefficientOfVariation: round(cv, 2),
      },
      createdAt: now,
    };
  }

  // ------------------------------------------------------------------ Anomalies

  detectAnomalies(component: string, metric: string): Anomaly[] {
    const samples = this.samples(component, metric);
    if (samples.length < this.minSamples) return [];

    const values = samples.map((s) => s.value);
    const m = mean(values);
    const sd = stdDev(values);
    if (sd === 0) return [];

    const anomalies: Anomaly[] = [];
    for (const sample of samples.slice(-ANOMALY_WINDOW)) {
      if (Math.abs(sample.value - m) > 3 * sd) {
        anomalies.push({ component, metric, kind: 'outlier', value: sample.value, mean: m, stdDev: sd, timestamp: sample.timestamp });
      }
    }

    const last = samples[samples.length - 1];
    const previous = samples[samples.length - 2];
    if (Math.abs(last.value - previous.value) > 2 * sd) {
      anomalies.push({ component, metric, kind: 'spike', value: last.value, mean: m, stdDev: sd, timestamp: last.timestamp });
    }

    return anomalies;
  }

  /** Run every forecast and anomaly check over all known components. */
  analyze(extraComponents: string[] = []): AnalysisResult {
    const predictions: Prediction[] = [];
    const anomalies: Anomaly[] = [];
    const components = new Set([...this.components(), ...extraComponents]);

    for (const component of components) {
      for (const rule of THRESHOLD_RULES) {
        const prediction = this.forecastThreshold(component, rule);
        if (prediction) predictions.push(prediction);
      }
      const failure = this.forecastRecurringFailure(component);
      if (failure) predictions.push(failure);

      for (const metric of this.series.get(component)?.keys() ?? []) {
        anomalies.push(...this.detectAnomalies(component, metric));
      }
    }

    for (const anomaly of anomalies) {
      console.warn(
        `[Trends] Anomaly (${anomaly.kind}) on ${anomaly.component}/${anomaly.metric}: ${round(anomaly.value, 2)} vs mean ${round(anomaly.mean, 2)}`,
      );
    }

    return { predictions, anomalies };
  }
}
