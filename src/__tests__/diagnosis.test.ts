import { describe, it, expect, vi, afterEach } from 'vitest';

const mockConfig = vi.hoisted(() => ({
  claudeModel: 'claude-test',
  localLlmEndpoint: 'http://127.0.0.1:8080',
  localLlmModel: 'local-test',
}));

vi.mock('../config.js', () => ({ config: mockConfig }));

import {
  ClaudeDiagnosisOracle,
  LocalLlmDiagnosisOracle,
  buildDiagnosisPrompt,
  createDiagnosisOracle,
} from '../ai/diagnosis.js';
import { makeIssue } from './helpers.js';

describe('buildDiagnosisPrompt', () => {
  it('describes the issue and asks for JSON', () => {
    const lines = buildDiagnosisPrompt(makeIssue({ metrics: { restarts: 3 } })).split('\n');

    expect(lines.slice(2, 9)).toEqual([
      'Issue type: container_stopped',
      'Alert: ContainerDown',
      'Component: nginx',
      'Severity: WARNING',
      'Description: nginx is down',
      'Metrics: {"restarts":3}',
      'Labels: {"alertname":"ContainerDown","instance":"nginx"}',
    ]);
    expect(lines).toContain('Answer with a single JSON object and nothing else:');
  });
});

describe('createDiagnosisOracle', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    mockConfig.localLlmEndpoint = 'http://127.0.0.1:8080';
    vi.restoreAllMocks();
  });

  it('prefers Claude when an API key is set', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-key');

    expect(createDiagnosisOracle()).toBeInstanceOf(ClaudeDiagnosisOracle);
  });

  it('falls back to the local endpoint', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    const oracle = createDiagnosisOracle();

    expect(oracle).toBeInstanceOf(LocalLlmDiagnosisOracle);
    expect(oracle?.name).toBe('local-llm');
  });

  it('returns null when nothing is configured', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    mockConfig.localLlmEndpoint = '';

    expect(createDiagnosisOracle()).toBeNull();
    expect(warn).toHaveBeenCalledWith('[Diagnosis] No oracle configured -- using the static risk table');
  });
});
