import type { ClaimRecord, NormalizedClaim } from './claim.types.js';
import type { LabeledEvidence } from './evidence.types.js';

export type ContradictionType = 'NONE' | 'DIRECT_NEGATION' | 'TEMPORAL_MISMATCH';

export type VerdictLabel = 'GROUNDED' | 'WEAK' | 'HALLUCINATED';

export type PenaltyName = 'no_evidence' | 'contradiction' | 'weak_evidence_only' | 'vague_language';

export interface AlignmentResult {
  readonly claimId: string;
  readonly evidenceStrength: number;
  readonly contradictionType: ContradictionType;
  /** Ranked by similarity, descending; ties keep retrieval order. */
  readonly labeledEvidence: readonly LabeledEvidence[];
}

export interface AppliedPenalty {
  readonly name: PenaltyName;
  readonly magnitude: number;
  readonly confidenceAfter: number;
}

export interface CalibrationResult {
  readonly claimId: string;
  readonly rawConfidence: number;
  readonly calibratedConfidence: number;
  readonly appliedPenalties: readonly AppliedPenalty[];
}

export interface Verdict {
  readonly claimId: string;
  readonly label: VerdictLabel;
  readonly riskScore: number;
  readonly alignment: AlignmentResult;
  readonly calibration: CalibrationResult;
  readonly bestEvidence?: LabeledEvidence;
  readonly explanation: string;
}

export interface VerdictOutcome {
  readonly kind: 'verdict';
  readonly claim: NormalizedClaim;
  readonly verdict: Verdict;
}

/** Stands in for a verdict when a claim could not be scored. */
export interface UnverifiableOutcome {
  readonly kind: 'unverifiable';
  readonly claim: ClaimRecord;
  readonly label: 'UNVERIFIABLE';
  readonly reason: string;
  readonly code: string;
}

export type ClaimOutcome = VerdictOutcome | UnverifiableOutcome;

export interface LabelCounts {
  readonly GROUNDED: number;
  readonly WEAK: number;
  readonly HALLUCINATED: number;
  readonly UNVERIFIABLE: number;
}

export interface AnswerReport {
  readonly answerText: string;
  readonly outcomes: readonly ClaimOutcome[];
  /** Max risk across verdicted claims; null when no claim produced a verdict. */
  readonly overallRisk: number | null;
  readonly meanRisk: number | null;
  readonly counts: LabelCounts;
  readonly degraded: boolean;
  readonly cancelled: boolean;
  readonly warnings: readonly string[];
  readonly summary: string;
}
