import { describe, it, expect } from 'vitest';
import type { LabeledEvidence } from '@epirisk/shared/src/types/evidence.types.js';
import type {
  AlignmentResult,
  CalibrationResult,
} from '@epirisk/shared/src/types/analysis.types.js';
import { DEFAULT_SCORING_CONFIG } from '@epirisk/schemas/src/scoring-config.schema.js';
import { resolveScoringConfig } from '@epirisk/schemas/src/validators.js';
import { EpiriskError } from '@epirisk/shared/src/utils/errors.js';
import {
  computeRiskScore,
  createVerdictEngine,
  decideLabel,
  decideVerdict,
  selectBestEvidence,
} from './verdict-engine.js';

function labeled(
  id: string,
  relation: LabeledEvidence['relation'],
  similarityScore: number,
): LabeledEvidence {
  return { id, text: `text of ${id}`, sourceId: 'doc.md', similarityScore, relation };
}

function alignment(overrides?: Partial<AlignmentResult>): AlignmentResult {
  return {
    claimId: 'claim-1',
    evidenceStrength: 0,
    contradictionType: 'NONE',
    labeledEvidence: [],
    ...overrides,
  };
}

function calibration(overrides?: Partial<CalibrationResult>): CalibrationResult {
  return {
    claimId: 'claim-1',
    rawConfidence: 0.9,
    calibratedConfidence: 0.9,
    appliedPenalties: [],
    ...overrides,
  };
}

describe('computeRiskScore', () => {
  it('should weight calibrated confidence and missing evidence', () => {
    expect(computeRiskScore(0.32, 0.1375, DEFAULT_SCORING_CONFIG)).toBeCloseTo(0.6455, 10);
    expect(computeRiskScore(0.9, 0.9, DEFAULT_SCORING_CONFIG)).toBeCloseTo(0.42, 10);
  });

  it('should clamp when the weights sum above one', () => {
    const config = resolveScoringConfig({ riskConfidenceWeight: 1, riskEvidenceWeight: 1 });
    expect(computeRiskScore(1, 0, config)).toBe(1);
  });

  it('should rise with confidence and fall with evidence strength', () => {
    expect(computeRiskScore(0.8, 0.5, DEFAULT_SCORING_CONFIG)).toBeGreaterThan(
      computeRiskScore(0.4, 0.5, DEFAULT_SCORING_CONFIG),
    );
    expect(computeRiskScore(0.5, 0.8, DEFAULT_SCORING_CONFIG)).toBeLessThan(
      computeRiskScore(0.5, 0.4, DEFAULT_SCORING_CONFIG),
    );
  });
});

describe('decideLabel', () => {
  it.each([
    [0.29, 'NONE', 'HALLUCINATED'],
    [0.3, 'NONE', 'WEAK'],
    [0.7, 'NONE', 'WEAK'],
    [0.71, 'NONE', 'GROUNDED'],
    [0.9, 'TEMPORAL_MISMATCH', 'WEAK'],
    [0.1, 'DIRECT_NEGATION', 'HALLUCINATED'],
  ] as const)('should label strength %s with %s as %s', (strength, contradictionType, expected) => {
    expect(
      decideLabel(alignment({ evidenceStrength: strength, contradictionType }), DEFAULT_SCORING_CONFIG),
    ).toBe(expected);
  });

  it('should prefer hallucinated when thresholds cross', () => {
    const config = resolveScoringConfig({ hallucinationThreshold: 0.8, groundedThreshold: 0.2 });
    expect(decideLabel(alignment({ evidenceStrength: 0.5 }), config)).toBe('HALLUCINATED');
  });
});

describe('selectBestEvidence', () => {
  it('should prefer support, then weak support, then the top chunk', () => {
    expect(
      selectBestEvidence([labeled('a', 'CONTRADICTS', 0.9), labeled('b', 'SUPPORTS', 0.8)])?.id,
    ).toBe('b');
    expect(
      selectBestEvidence([labeled('a', 'CONTRADICTS', 0.9), labeled('b', 'WEAK_SUPPORT', 0.5)])?.id,
    ).toBe('b');
    expect(selectBestEvidence([labeled('a', 'CONTRADICTS', 0.9)])?.id).toBe('a');
    expect(selectBestEvidence([])).toBeUndefined();
  });
});

describe('decideVerdict', () => {
  it('should flag a contradicted claim as hallucinated', () => {
    const verdict = decideVerdict(
      calibration({
        rawConfidence: 0.92,
        calibratedConfidence: 0.32,
        appliedPenalties: [{ name: 'contradiction', magnitude: 0.6, confidenceAfter: 0.32 }],
      }),
      alignment({
        evidenceStrength: 0.1375,
        contradictionType: 'DIRECT_NEGATION',
        labeledEvidence: [
          labeled('release-notes', 'CONTRADICTS', 0.81),
          labeled('pep703', 'WEAK_SUPPORT', 0.55),
        ],
      }),
      DEFAULT_SCORING_CONFIG,
    );

    expect(verdict.label).toBe('HALLUCINATED');
    expect(verdict.riskScore).toBeCloseTo(0.6455, 10);
    expect(verdict.bestEvidence?.id).toBe('pep703');
    expect(verdict.explanation).toBe(
      'Confidence 0.92 with contradicting evidence (DIRECT_NEGATION). Penalties: contradiction.',
    );
  });

  it('should explain a claim without usable evidence', () => {
    const verdict = decideVerdict(
      calibration({
        rawConfidence: 0.8,
        calibratedConfidence: 0.4,
        appliedPenalties: [{ name: 'no_evidence', magnitude: 0.4, confidenceAfter: 0.4 }],
      }),
      alignment(),
      DEFAULT_SCORING_CONFIG,
    );

    expect(verdict.label).toBe('HALLUCINATED');
    expect(verdict.riskScore).toBeCloseTo(0.76, 10);
    expect(verdict.bestEvidence).toBeUndefined();
    expect(verdict.explanation).toBe(
      'Confidence 0.80 with no usable evidence. Penalties: no_evidence.',
    );
  });

  it('should explain a weakly supported claim', () => {
    const verdict = decideVerdict(
      calibration({ rawConfidence: 0.8, calibratedConfidence: 0.65 }),
      alignment({ evidenceStrength: 0.5, labeledEvidence: [labeled('a', 'SUPPORTS', 0.5)] }),
      DEFAULT_SCORING_CONFIG,
    );

    expect(verdict.label).toBe('WEAK');
    expect(verdict.riskScore).toBeCloseTo(0.56, 10);
    expect(verdict.explanation).toBe(
      'Partial support found (evidence strength: 0.50). Confidence reduced from 0.80 to 0.65.',
    );
  });

  it('should explain a grounded claim', () => {
    const verdict = decideVerdict(
      calibration(),
      alignment({ evidenceStrength: 0.9, labeledEvidence: [labeled('tower', 'SUPPORTS', 0.9)] }),
      DEFAULT_SCORING_CONFIG,
    );

    expect(verdict.label).toBe('GROUNDED');
    expect(verdict.riskScore).toBeCloseTo(0.42, 10);
    expect(verdict.bestEvidence?.id).toBe('tower');
    expect(verdict.explanation).toBe(
      'Strong evidence supports this claim (strength: 0.90). 1 evidence chunk(s) directly support.',
    );
  });

  it('should reject a calibration paired with another claim', () => {
    expect(() =>
      decideVerdict(calibration({ claimId: 'other' }), alignment(), DEFAULT_SCORING_CONFIG),
    ).toThrow(EpiriskError);
  });
});

describe('createVerdictEngine', () => {
  it('should change the label when the thresholds are reconfigured', () => {
    const strict = createVerdictEngine(resolveScoringConfig({ groundedThreshold: 0.95 }));
    const verdict = strict.decide(
      calibration(),
      alignment({ evidenceStrength: 0.9, labeledEvidence: [labeled('tower', 'SUPPORTS', 0.9)] }),
    );
    expect(verdict.label).toBe('WEAK');
  });
});
