import type { ScoringConfig } from '@epirisk/schemas/src/scoring-config.schema.js';
import type { LabeledEvidence } from '@epirisk/shared/src/types/evidence.types.js';
import type {
  AlignmentResult,
  CalibrationResult,
  Verdict,
  VerdictLabel,
} from '@epirisk/shared/src/types/analysis.types.js';
import { EpiriskError } from '@epirisk/shared/src/utils/errors.js';
import { clamp01 } from '@epirisk/shared/src/utils/math.js';

export interface VerdictEngine {
  decide(calibration: CalibrationResult, alignment: AlignmentResult): Verdict;
}

export function computeRiskScore(
  calibratedConfidence: number,
  evidenceStrength: number,
  config: ScoringConfig,
): number {
  return clamp01(
    config.riskConfidenceWeight * calibratedConfidence +
      config.riskEvidenceWeight * (1 - evidenceStrength),
  );
}

/**
 * First match wins. The hallucination rule is checked before the grounded
 * rule, so it still decides when the two thresholds are configured to cross.
 */
export function decideLabel(alignment: AlignmentResult, config: ScoringConfig): VerdictLabel {
  if (alignment.evidenceStrength < config.hallucinationThreshold) {
    return 'HALLUCINATED';
  }
  if (
    alignment.evidenceStrength > config.groundedThreshold &&
    alignment.contradictionType === 'NONE'
  ) {
    return 'GROUNDED';
  }
  return 'WEAK';
}

export function selectBestEvidence(
  labeledEvidence: readonly LabeledEvidence[],
): LabeledEvidence | undefined {
  return (
    labeledEvidence.find((chunk) => chunk.relation === 'SUPPORTS') ??
    labeledEvidence.find((chunk) => chunk.relation === 'WEAK_SUPPORT') ??
    labeledEvidence[0]
  );
}

function formatScore(value: number): string {
  return value.toFixed(2);
}

function explain(
  label: VerdictLabel,
  calibration: CalibrationResult,
  alignment: AlignmentResult,
): string {
  const strength = formatScore(alignment.evidenceStrength);
  const retained = alignment.labeledEvidence.filter((chunk) => chunk.relation !== 'IRRELEVANT');

  if (label === 'HALLUCINATED') {
    let reason: string;
    if (alignment.contradictionType !== 'NONE') {
      reason = `contradicting evidence (${alignment.contradictionType})`;
    } else if (retained.length === 0) {
      reason = 'no usable evidence';
    } else {
      reason = `weak evidence (strength: ${strength})`;
    }
    const penalties = calibration.appliedPenalties.map((penalty) => penalty.name);
    const suffix = penalties.length > 0 ? ` Penalties: ${penalties.join(', ')}.` : '';
    return `Confidence ${formatScore(calibration.rawConfidence)} with ${reason}.${suffix}`;
  }

  if (label === 'WEAK') {
    const reduced =
      calibration.calibratedConfidence < calibration.rawConfidence
        ? ` Confidence reduced from ${formatScore(calibration.rawConfidence)} to ${formatScore(calibration.calibratedConfidence)}.`
        : '';
    return `Partial support found (evidence strength: ${strength}).${reduced}`;
  }

  const supporting = retained.filter((chunk) => chunk.relation === 'SUPPORTS').length;
  return `Strong evidence supports this claim (strength: ${strength}). ${String(supporting)} evidence chunk(s) directly support.`;
}

export function decideVerdict(
  calibration: CalibrationResult,
  alignment: AlignmentResult,
  config: ScoringConfig,
): Verdict {
  if (calibration.claimId !== alignment.claimId) {
    throw new EpiriskError(
      `Calibration for claim ${calibration.claimId} paired with alignment for claim ${alignment.claimId}`,
      'CLAIM_MISMATCH',
    );
  }

  const label = decideLabel(alignment, config);

  return {
    claimId: alignment.claimId,
    label,
    riskScore: computeRiskScore(calibration.calibratedConfidence, alignment.evidenceStrength, config),
    alignment,
    calibration,
    bestEvidence: selectBestEvidence(alignment.labeledEvidence),
    explanation: explain(label, calibration, alignment),
  };
}

export function createVerdictEngine(config: ScoringConfig): VerdictEngine {
  return {
    decide(calibration: CalibrationResult, alignment: AlignmentResult): Verdict {
      return decideVerdict(calibration, alignment, config);
    },
  };
}
