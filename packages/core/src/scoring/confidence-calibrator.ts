import type { ScoringConfig } from '@epirisk/schemas/src/scoring-config.schema.js';
import type { ClaimRecord } from '@epirisk/shared/src/types/claim.types.js';
import type { RelationLabel } from '@epirisk/shared/src/types/evidence.types.js';
import type {
  AlignmentResult,
  AppliedPenalty,
  CalibrationResult,
  PenaltyName,
} from '@epirisk/shared/src/types/analysis.types.js';
import { clamp01 } from '@epirisk/shared/src/utils/math.js';
import { detectHedges } from './hedge-detector.js';

export interface ConfidenceCalibrator {
  calibrate(claim: ClaimRecord, alignment: AlignmentResult): CalibrationResult;
}

interface PenaltyRule {
  readonly name: PenaltyName;
  readonly magnitude: (config: ScoringConfig) => number;
  readonly applies: (claim: ClaimRecord, alignment: AlignmentResult) => boolean;
}

function retainedRelations(alignment: AlignmentResult): readonly RelationLabel[] {
  return alignment.labeledEvidence
    .map((chunk) => chunk.relation)
    .filter((relation) => relation !== 'IRRELEVANT');
}

// Order is part of the contract: replaying these steps reproduces the result.
const PENALTY_RULES: readonly PenaltyRule[] = [
  {
    name: 'no_evidence',
    magnitude: (config) => config.noEvidencePenalty,
    applies: (_claim, alignment) =>
      alignment.evidenceStrength === 0 && alignment.contradictionType === 'NONE',
  },
  {
    name: 'contradiction',
    magnitude: (config) => config.contradictionPenalty,
    applies: (_claim, alignment) => alignment.contradictionType !== 'NONE',
  },
  {
    name: 'weak_evidence_only',
    magnitude: (config) => config.weakEvidencePenalty,
    applies: (_claim, alignment) => {
      const relations = retainedRelations(alignment);
      return relations.length > 0 && relations.every((relation) => relation === 'WEAK_SUPPORT');
    },
  },
  {
    name: 'vague_language',
    magnitude: (config) => config.vagueLanguagePenalty,
    applies: (claim) => claim.hedgeFlags.length > 0 || detectHedges(claim.text).length > 0,
  },
];

export function calibrateConfidence(
  claim: ClaimRecord,
  alignment: AlignmentResult,
  config: ScoringConfig,
): CalibrationResult {
  const rawConfidence = claim.rawConfidence ?? config.defaultRawConfidence;
  const appliedPenalties: AppliedPenalty[] = [];

  let confidence = clamp01(rawConfidence);
  for (const rule of PENALTY_RULES) {
    if (!rule.applies(claim, alignment)) continue;

    const magnitude = rule.magnitude(config);
    confidence = clamp01(confidence - magnitude);
    appliedPenalties.push({ name: rule.name, magnitude, confidenceAfter: confidence });
  }

  return {
    claimId: claim.id,
    rawConfidence,
    calibratedConfidence: confidence,
    appliedPenalties,
  };
}

/** Re-applies recorded penalties to a raw confidence, clamping after each step. */
export function replayPenalties(
  rawConfidence: number,
  penalties: readonly AppliedPenalty[],
): number {
  return penalties.reduce((value, penalty) => clamp01(value - penalty.magnitude), clamp01(rawConfidence));
}

export function createConfidenceCalibrator(config: ScoringConfig): ConfidenceCalibrator {
  return {
    calibrate(claim: ClaimRecord, alignment: AlignmentResult): CalibrationResult {
      return calibrateConfidence(claim, alignment, config);
    },
  };
}
