import type {
  AnswerReport,
  ClaimOutcome,
  LabelCounts,
} from '@epirisk/shared/src/types/analysis.types.js';

export interface AnswerReportInput {
  readonly answerText: string;
  readonly outcomes: readonly ClaimOutcome[];
  readonly totalClaims: number;
  readonly cancelled: boolean;
  readonly warnings: readonly string[];
}

function countLabels(outcomes: readonly ClaimOutcome[]): LabelCounts {
  const counts = { GROUNDED: 0, WEAK: 0, HALLUCINATED: 0, UNVERIFIABLE: 0 };
  for (const outcome of outcomes) {
    if (outcome.kind === 'verdict') {
      counts[outcome.verdict.label]++;
    } else {
      counts.UNVERIFIABLE++;
    }
  }
  return counts;
}

function summarize(input: AnswerReportInput, counts: LabelCounts, degraded: boolean): string {
  if (input.totalClaims === 0) {
    return 'No factual claims found in the answer.';
  }

  const verdicted = counts.GROUNDED + counts.WEAK + counts.HALLUCINATED;
  const parts: string[] = [];

  if (degraded) {
    parts.push(`None of the ${String(input.outcomes.length)} processed claims could be verified.`);
  } else if (verdicted > 0) {
    if (counts.HALLUCINATED === 0) {
      parts.push(`All ${String(verdicted)} verified claims appear grounded or weakly supported.`);
    } else if (counts.HALLUCINATED === verdicted) {
      parts.push(`All ${String(verdicted)} verified claims appear to be hallucinations.`);
    } else {
      parts.push(
        `${String(counts.HALLUCINATED)}/${String(verdicted)} claims flagged as potential hallucinations. ${String(counts.GROUNDED)} claims are well-grounded.`,
      );
    }
    if (counts.UNVERIFIABLE > 0) {
      parts.push(`${String(counts.UNVERIFIABLE)} claim(s) could not be verified.`);
    }
  }

  if (input.cancelled) {
    parts.push(
      `Analysis cancelled after ${String(input.outcomes.length)} of ${String(input.totalClaims)} claims.`,
    );
  }

  return parts.join(' ');
}

/**
 * Answer-level risk is the maximum claim risk: a single hallucinated claim is
 * enough to make the whole answer risky. The mean is reported alongside.
 */
export function buildAnswerReport(input: AnswerReportInput): AnswerReport {
  const risks = input.outcomes.flatMap((outcome) =>
    outcome.kind === 'verdict' ? [outcome.verdict.riskScore] : [],
  );
  const counts = countLabels(input.outcomes);
  const degraded = input.outcomes.length > 0 && risks.length === 0;

  return Object.freeze({
    answerText: input.answerText,
    outcomes: Object.freeze([...input.outcomes]),
    overallRisk: risks.length > 0 ? Math.max(...risks) : null,
    meanRisk: risks.length > 0 ? risks.reduce((sum, risk) => sum + risk, 0) / risks.length : null,
    counts: Object.freeze(counts),
    degraded,
    cancelled: input.cancelled,
    warnings: Object.freeze([...input.warnings]),
    summary: summarize(input, counts, degraded),
  });
}
