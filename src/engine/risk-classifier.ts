/**
 * RiskClassifier -- assigns LOW / MEDIUM / HIGH to an issue.
 *
 * The diagnosis oracle is untrusted: its answer may be free text, partial
 * JSON or garbage. Answers are validated with zod before any field reaches
 * the gate. A risk value outside the enum becomes MEDIUM. An oracle that
 * throws, times out or answers without any JSON object falls back to the
 * static per-issue-type table.
 */

import { z } from 'zod';
import { defaultRiskFor } from './alert-mapping.js';
import { ClassificationTimeout, errorMessage } from './errors.js';
import { withTimeout } from './timeout.js';
import type { Diagnosis, Issue, RiskLevel } from './types.js';

// ---------------------------------------------------------------------------
// Oracle contract
// ---------------------------------------------------------------------------

export interface DiagnosisOracle {
  readonly name: string;
  /** Returns an object or free text. `signal` aborts when the classifier gives up. */
  diagnose(issue: Issue, signal: AbortSignal): Promise<unknown>;
}

export interface Classification {
  riskLevel: RiskLevel;
  suggestedFix: string | null;
  diagnosis: Diagnosis;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const optionalText = z.string().trim().min(1).optional().catch(undefined);

const diagnosisSchema = z.object({
  root_cause: optionalText,
  remediation: optionalText,
  reasoning: optionalText,
  risk_level: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['low', 'medium', 'high']))
    .optional()
    .catch(undefined),
});

export interface ParsedDiagnosis {
  rootCause?: string;
  remediation?: string;
  reasoning?: string;
  riskLevel?: RiskLevel;
}

function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    return JSON.parse(match[0]);
  } catch {
    return null;
  }
}

/**
 * Parse an oracle answer. Returns null when there is nothing usable at all;
 * malformed individual fields are treated as absent.
 */
export function parseDiagnosis(raw: unknown): ParsedDiagnosis | null {
  const candidate = typeof raw === 'string' ? extractJsonObject(raw) : raw;
  if (candidate === null || typeof candidate !== 'object' || Array.isArray(candidate)) {
    return null;
  }

  const parsed = diagnosisSchema.safeParse(candidate);
  if (!parsed.success) return null;

  const { root_cause, remediation, reasoning, risk_level } = parsed.data;
  return {
    rootCause: root_cause,
    remediation,
    reasoning,
    riskLevel: risk_level ? toRiskLevel(risk_level) : undefined,
  };
}

function toRiskLevel(value: 'low' | 'medium' | 'high'): RiskLevel {
  switch (value) {
    case 'low':
      return 'LOW';
    case 'medium':
      return 'MEDIUM';
    case 'high':
      return 'HIGH';
  }
}

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

export interface RiskClassifierOptions {
  timeoutMs: number;
}

export class RiskClassifier {
  constructor(
    private readonly oracle: DiagnosisOracle | null,
    private readonly opts: RiskClassifierOptions,
  ) {}

  async classify(issue: Issue): Promise<Classification> {
    if (!this.oracle) {
      return this.fallback(issue, 'oracle_unavailable');
    }

    const controller = new AbortController();
    let raw: unknown;
    try {
      raw = await withTimeout(
        this.oracle.diagnose(issue, controller.signal),
        this.opts.timeoutMs,
        () => {
          controller.abort();
          return new ClassificationTimeout(this.opts.timeoutMs);
        },
      );
    } catch (err) {
      const reason = err instanceof ClassificationTimeout ? err.reason : 'oracle_error';
      console.warn(`[Classifier] ${this.oracle.name} failed for ${issue.issueType} (${reason}):`, errorMessage(err));
      return this.fallback(issue, reason);
    }

    const parsed = parseDiagnosis(raw);
    if (!parsed) {
      console.warn(`[Classifier] ${this.oracle.name} returned an unparseable diagnosis for ${issue.issueType}`);
      return this.fallback(issue, 'unparseable');
    }

    const riskLevel = parsed.riskLevel ?? 'MEDIUM';
    if (!parsed.riskLevel) {
      console.warn(`[Classifier] ${this.oracle.name} gave no valid risk for ${issue.issueType}; using MEDIUM`);
    }

    return {
      riskLevel,
      suggestedFix: parsed.remediation ?? issue.suggestedFix,
      diagnosis: {
        riskLevel,
        source: 'oracle',
        rootCause: parsed.rootCause,
        remediation: parsed.remediation,
        reasoning: parsed.reasoning,
      },
    };
  }

  private fallback(issue: Issue, reason: string): Classification {
    const riskLevel = defaultRiskFor(issue.issueType);
    return {
      riskLevel,
      suggestedFix: issue.suggestedFix,
      diagnosis: { riskLevel, source: 'fallback', fallbackReason: reason },
    };
  }
}
