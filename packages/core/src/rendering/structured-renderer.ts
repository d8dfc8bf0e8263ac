import type { ExtractionMetadata } from '@epirisk/shared/src/types/claim.types.js';
import type {
  AnswerReport,
  ClaimOutcome,
  ContradictionType,
  PenaltyName,
  VerdictLabel,
} from '@epirisk/shared/src/types/analysis.types.js';
import type { RelationLabel } from '@epirisk/shared/src/types/evidence.types.js';
import { roundTo } from '@epirisk/shared/src/utils/math.js';

const PRECISION = 3;

export interface StructuredClaim {
  readonly id: string;
  readonly text: string;
  readonly span: readonly [number, number];
}

export interface StructuredEvidence {
  readonly id: string;
  readonly sourceId: string;
  readonly relation: RelationLabel;
  readonly similarity: number;
}

export interface StructuredVerdict {
  readonly claim: StructuredClaim;
  readonly verdict: VerdictLabel;
  readonly riskScore: number;
  readonly evidenceStrength: number;
  readonly contradictionType: ContradictionType;
  readonly confidence: {
    readonly raw: number;
    readonly calibrated: number;
    readonly penalties: readonly PenaltyName[];
  };
  readonly explanation: string;
  readonly evidence: readonly StructuredEvidence[];
  readonly bestEvidence: (StructuredEvidence & { readonly text: string }) | null;
}

export interface StructuredUnverifiable {
  readonly claim: StructuredClaim;
  readonly verdict: 'UNVERIFIABLE';
  readonly reason: string;
  readonly code: string;
}

export interface StructuredReport {
  readonly answerText: string;
  readonly claimsCount: number;
  readonly overallRisk: number | null;
  readonly meanRisk: number | null;
  readonly summary: string;
  readonly degraded: boolean;
  readonly cancelled: boolean;
  readonly warnings: readonly string[];
  readonly statistics: {
    readonly grounded: number;
    readonly weak: number;
    readonly hallucinated: number;
    readonly unverifiable: number;
  };
  readonly claims: readonly (StructuredVerdict | StructuredUnverifiable)[];
  readonly extraction?: ExtractionMetadata;
}

function round(value: number): number {
  return roundTo(value, PRECISION);
}

function renderOutcome(outcome: ClaimOutcome): StructuredVerdict | StructuredUnverifiable {
  const claim: StructuredClaim = {
    id: outcome.claim.id,
    text: outcome.claim.text,
    span: [outcome.claim.span.start, outcome.claim.span.end],
  };

  if (outcome.kind === 'unverifiable') {
    return { claim, verdict: 'UNVERIFIABLE', reason: outcome.reason, code: outcome.code };
  }

  const { verdict } = outcome;
  const best = verdict.bestEvidence;

  return {
    claim,
    verdict: verdict.label,
    riskScore: round(verdict.riskScore),
    evidenceStrength: round(verdict.alignment.evidenceStrength),
    contradictionType: verdict.alignment.contradictionType,
    confidence: {
      raw: round(verdict.calibration.rawConfidence),
      calibrated: round(verdict.calibration.calibratedConfidence),
      penalties: verdict.calibration.appliedPenalties.map((penalty) => penalty.name),
    },
    explanation: verdict.explanation,
    evidence: verdict.alignment.labeledEvidence.map((chunk) => ({
      id: chunk.id,
      sourceId: chunk.sourceId,
      relation: chunk.relation,
      similarity: round(chunk.similarityScore),
    })),
    bestEvidence: best
      ? {
          id: best.id,
          sourceId: best.sourceId,
          relation: best.relation,
          similarity: round(best.similarityScore),
          text: best.text,
        }
      : null,
  };
}

/** JSON-ready view of a report, scores rounded to three decimals. */
export function renderStructured(
  report: AnswerReport,
  extraction?: ExtractionMetadata,
): StructuredReport {
  return {
    answerText: report.answerText,
    claimsCount: report.outcomes.length,
    overallRisk: report.overallRisk === null ? null : round(report.overallRisk),
    meanRisk: report.meanRisk === null ? null : round(report.meanRisk),
    summary: report.summary,
    degraded: report.degraded,
    cancelled: report.cancelled,
    warnings: report.warnings,
    statistics: {
      grounded: report.counts.GROUNDED,
      weak: report.counts.WEAK,
      hallucinated: report.counts.HALLUCINATED,
      unverifiable: report.counts.UNVERIFIABLE,
    },
    claims: report.outcomes.map(renderOutcome),
    ...(extraction ? { extraction } : {}),
  };
}
