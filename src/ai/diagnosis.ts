/**
 * Diagnosis oracles backed by a language model.
 *
 * Both return the model's raw text; the risk classifier extracts and
 * validates the JSON itself, so nothing here is trusted.
 *
 *  - Claude via the Anthropic SDK (when ANTHROPIC_API_KEY is set)
 *  - Any OpenAI-compatible local endpoint (llama-server, vLLM, ...)
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { config } from '../config.js';
import type { DiagnosisOracle } from '../engine/risk-classifier.js';
import type { Issue } from '../engine/types.js';

const MAX_TOKENS = 1024;

export function buildDiagnosisPrompt(issue: Issue): string {
  return [
    'You are diagnosing an infrastructure issue in a homelab cluster.',
    '',
    `Issue type: ${issue.issueType}`,
    `Alert: ${issue.name}`,
    `Component: ${issue.component}`,
    `Severity: ${issue.severity}`,
    `Description: ${issue.description}`,
    `Metrics: ${JSON.stringify(issue.metrics)}`,
    `Labels: ${JSON.stringify(issue.labels)}`,
    '',
    'Answer with a single JSON object and nothing else:',
    '{',
    '  "root_cause": "likely root cause",',
    '  "remediation": "specific fix to apply",',
    '  "risk_level": "low" | "medium" | "high",',
    '  "reasoning": "why this fix and this risk level"',
    '}',
    '',
    'Risk guidance: low = safe, idempotent restart of a single service or container;',
    'medium = may briefly affect users or other services; high = may cause data loss or cluster-wide impact.',
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Claude
// ---------------------------------------------------------------------------

export class ClaudeDiagnosisOracle implements DiagnosisOracle {
  readonly name = 'claude';

  constructor(
    private readonly client: Anthropic = new Anthropic(),
    private readonly model: string = config.claudeModel,
  ) {}

  async diagnose(issue: Issue, signal: AbortSignal): Promise<unknown> {
    const message = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: MAX_TOKENS,
        messages: [{ role: 'user', content: buildDiagnosisPrompt(issue) }],
      },
      { signal },
    );
    return message.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('\n');
  }
}

// ---------------------------------------------------------------------------
// Local LLM (OpenAI-compatible)
// ---------------------------------------------------------------------------

export class LocalLlmDiagnosisOracle implements DiagnosisOracle {
  readonly name = 'local-llm';
  private readonly client: OpenAI;

  constructor(
    endpoint: string = config.localLlmEndpoint,
    private readonly model: string = config.localLlmModel,
  ) {
    this.client = new OpenAI({
      baseURL: `${endpoint}/v1`,
      apiKey: 'not-needed', // llama-server doesn't require auth
    });
  }

  async diagnose(issue: Issue, signal: AbortSignal): Promise<unknown> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: 'You are a precise infrastructure diagnostician. Reply with JSON only.' },
          { role: 'user', content: buildDiagnosisPrompt(issue) },
        ],
        temperature: 0.2,
        max_tokens: MAX_TOKENS,
      },
      { signal },
    );
    return completion.choices[0]?.message?.content ?? '';
  }
}

/**
 * Pick the oracle from configuration: Claude when an API key is present,
 * else the local endpoint, else none (static risk table only).
 */
export function createDiagnosisOracle(): DiagnosisOracle | null {
  if (process.env.ANTHROPIC_API_KEY) {
    console.log(`[Diagnosis] Using Claude (${config.claudeModel})`);
    return new ClaudeDiagnosisOracle();
  }
  if (config.localLlmEndpoint) {
    console.log(`[Diagnosis] Using local LLM at ${config.localLlmEndpoint}`);
    return new LocalLlmDiagnosisOracle();
  }
  console.warn('[Diagnosis] No oracle configured -- using the static risk table');
  return null;
}
