import type { ScoringConfig } from '@epirisk/schemas/src/scoring-config.schema.js';
import type { ClaimRecord } from '@epirisk/shared/src/types/claim.types.js';
import type {
  EvidenceChunk,
  LabeledEvidence,
  RelationLabel,
} from '@epirisk/shared/src/types/evidence.types.js';
import type {
  AlignmentResult,
  ContradictionType,
} from '@epirisk/shared/src/types/analysis.types.js';
import { clamp01 } from '@epirisk/shared/src/utils/math.js';
import {
  createPatternContradictionDetector,
  type ContradictionDetector,
} from './contradiction-detector.js';

export interface AlignmentEvaluator {
  evaluate(claim: ClaimRecord, evidence: readonly EvidenceChunk[]): AlignmentResult;
}

interface LabeledWithType {
  readonly chunk: LabeledEvidence;
  readonly contradictionType: ContradictionType;
}

/** Highest similarity first; equal scores keep their retrieval order. */
export function rankEvidence(evidence: readonly EvidenceChunk[]): readonly EvidenceChunk[] {
  return evidence
    .map((chunk, index) => ({ chunk, index }))
    .sort((a, b) => b.chunk.similarityScore - a.chunk.similarityScore || a.index - b.index)
    .map(({ chunk }) => chunk);
}

function labelChunk(
  claim: ClaimRecord,
  chunk: EvidenceChunk,
  config: ScoringConfig,
  detector: ContradictionDetector,
): LabeledWithType {
  if (chunk.similarityScore < config.similarityThreshold) {
    return { chunk: { ...chunk, relation: 'IRRELEVANT' }, contradictionType: 'NONE' };
  }

  const contradictionType = detector.detect(claim.text, chunk.text);
  if (contradictionType !== 'NONE') {
    return { chunk: { ...chunk, relation: 'CONTRADICTS' }, contradictionType };
  }

  const relation: RelationLabel =
    chunk.similarityScore > config.strongSimilarityThreshold ? 'SUPPORTS' : 'WEAK_SUPPORT';
  return { chunk: { ...chunk, relation }, contradictionType: 'NONE' };
}

function contribution(chunk: LabeledEvidence, config: ScoringConfig): number {
  switch (chunk.relation) {
    case 'SUPPORTS':
      return chunk.similarityScore;
    case 'WEAK_SUPPORT':
      return config.weakSupportWeight * chunk.similarityScore;
    case 'CONTRADICTS':
    case 'IRRELEVANT':
      return 0;
  }
}

/**
 * Labels every chunk and aggregates evidence strength as the mean contribution
 * of the retained (non-irrelevant) chunks.
 */
export function evaluateAlignment(
  claim: ClaimRecord,
  evidence: readonly EvidenceChunk[],
  config: ScoringConfig,
  detector: ContradictionDetector = createPatternContradictionDetector(),
): AlignmentResult {
  const labeled = rankEvidence(evidence).map((chunk) => labelChunk(claim, chunk, config, detector));

  const retained = labeled.filter(({ chunk }) => chunk.relation !== 'IRRELEVANT');
  const evidenceStrength =
    retained.length === 0
      ? 0
      : clamp01(
          retained.reduce((sum, { chunk }) => sum + contribution(chunk, config), 0) /
            retained.length,
        );

  const firstContradiction = labeled.find(({ contradictionType }) => contradictionType !== 'NONE');

  return {
    claimId: claim.id,
    evidenceStrength,
    contradictionType: firstContradiction?.contradictionType ?? 'NONE',
    labeledEvidence: labeled.map(({ chunk }) => chunk),
  };
}

export function createAlignmentEvaluator(
  config: ScoringConfig,
  detector: ContradictionDetector = createPatternContradictionDetector(),
): AlignmentEvaluator {
  return {
    evaluate(claim: ClaimRecord, evidence: readonly EvidenceChunk[]): AlignmentResult {
      return evaluateAlignment(claim, evidence, config, detector);
    },
  };
}
