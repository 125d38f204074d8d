/**
 * Unit tests for oracle parsing and the static fallback.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { RiskClassifier, parseDiagnosis, type DiagnosisOracle } from '../engine/risk-classifier.js';
import { makeIssue } from './helpers.js';

function oracle(diagnose: DiagnosisOracle['diagnose']): DiagnosisOracle {
  return { name: 'test-oracle', diagnose };
}

describe('parseDiagnosis', () => {
  it('extracts the first JSON object from free text', () => {
    const parsed = parseDiagnosis(
      'Here is my analysis:\n{"root_cause": "OOM", "remediation": "restart it", "risk_level": "Low", "reasoning": "idempotent"}\nThanks',
    );
    expect(parsed).toEqual({ rootCause: 'OOM', remediation: 'restart it', riskLevel: 'LOW', reasoning: 'idempotent' });
  });

  it('accepts an object directly', () => {
    expect(parseDiagnosis({ risk_level: 'high' })?.riskLevel).toBe('HIGH');
  });

  it('treats an invalid risk level as absent', () => {
    const parsed = parseDiagnosis({ risk_level: 'catastrophic', remediation: 'reboot' });
    expect(parsed?.riskLevel).toBeUndefined();
    expect(parsed?.remediation).toBe('reboot');
  });

  it('treats malformed fields as absent', () => {
    expect(parseDiagnosis({ root_cause: 42, remediation: '   ', risk_level: 'medium' })).toEqual({
      rootCause: undefined,
      remediation: undefined,
      reasoning: undefined,
      riskLevel: 'MEDIUM',
    });
  });

  it('returns null when there is no JSON object', () => {
    expect(parseDiagnosis('I think it is fine')).toBeNull();
    expect(parseDiagnosis('{not json}')).toBeNull();
    expect(parseDiagnosis(null)).toBeNull();
    expect(parseDiagnosis(['low'])).toBeNull();
  });
});

describe('RiskClassifier', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('uses the static table when there is no oracle', async () => {
    const classifier = new RiskClassifier(null, { timeoutMs: 1000 });
    const result = await classifier.classify(makeIssue({ issueType: 'container_stopped' }));
    expect(result.riskLevel).toBe('LOW');
    expect(result.diagnosis).toEqual({ riskLevel: 'LOW', source: 'fallback', fallbackReason: 'oracle_unavailable' });
    expect(result.suggestedFix).toBe('Restart the affected container');
  });

  it('never falls back to LOW for a MEDIUM issue type', async () => {
    const classifier = new RiskClassifier(null, { timeoutMs: 1000 });
    expect((await classifier.classify(makeIssue({ issueType: 'service_stopped' }))).riskLevel).toBe('MEDIUM');
    expect((await classifier.classify(makeIssue({ issueType: 'prometheus_unknown' }))).riskLevel).toBe('MEDIUM');
    expect((await classifier.classify(makeIssue({ issueType: 'disk_full' }))).riskLevel).toBe('HIGH');
  });

  it('uses the oracle answer and its remediation', async () => {
    const classifier = new RiskClassifier(
      oracle(async () => ({ risk_level: 'high', remediation: 'Fail over to the standby', root_cause: 'disk' })),
      { timeoutMs: 1000 },
    );
    const result = await classifier.classify(makeIssue());
    expect(result.riskLevel).toBe('HIGH');
    expect(result.suggestedFix).toBe('Fail over to the standby');
    expect(result.diagnosis.source).toBe('oracle');
    expect(result.diagnosis.rootCause).toBe('disk');
  });

  it('defaults a parsed answer without a valid risk to MEDIUM', async () => {
    const classifier = new RiskClassifier(oracle(async () => '{"risk_level": "extreme"}'), { timeoutMs: 1000 });
    const result = await classifier.classify(makeIssue({ issueType: 'container_stopped' }));
    expect(result.riskLevel).toBe('MEDIUM');
    expect(result.diagnosis.source).toBe('oracle');
    expect(result.suggestedFix).toBe('Restart the affected container');
  });

  it('falls back when the answer is unparseable', async () => {
    const classifier = new RiskClassifier(oracle(async () => 'no idea'), { timeoutMs: 1000 });
    const result = await classifier.classify(makeIssue({ issueType: 'high_memory' }));
    expect(result.riskLevel).toBe('MEDIUM');
    expect(result.diagnosis.fallbackReason).toBe('unparseable');
  });

  it('falls back when the oracle throws', async () => {
    const classifier = new RiskClassifier(
      oracle(async () => {
        throw new Error('rate limited');
      }),
      { timeoutMs: 1000 },
    );
    const result = await classifier.classify(makeIssue({ issueType: 'host_down' }));
    expect(result.riskLevel).toBe('HIGH');
    expect(result.diagnosis.fallbackReason).toBe('oracle_error');
  });

  it('falls back on timeout and aborts the oracle call', async () => {
    vi.useFakeTimers();
    let signal: AbortSignal | undefined;
    const classifier = new RiskClassifier(
      oracle((_issue, s) => {
        signal = s;
        return new Promise(() => {});
      }),
      { timeoutMs: 5000 },
    );

    const pending = classifier.classify(makeIssue({ issueType: 'service_stopped' }));
    await vi.advanceTimersByTimeAsync(5000);
    const result = await pending;

    expect(result.riskLevel).toBe('MEDIUM');
    expect(result.diagnosis.fallbackReason).toBe('oracle_timeout');
    expect(signal?.aborted).toBe(true);
  });
});
