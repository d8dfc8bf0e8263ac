import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { ScoringConfig } from '@epirisk/schemas/src/scoring-config.schema.js';
import type { ClaimRecord, NormalizedClaim } from '@epirisk/shared/src/types/claim.types.js';
import type {
  EvidenceByClaim,
  EvidenceChunk,
} from '@epirisk/shared/src/types/evidence.types.js';
import type {
  AnswerReport,
  ClaimOutcome,
  UnverifiableOutcome,
  VerdictOutcome,
} from '@epirisk/shared/src/types/analysis.types.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import {
  EpiriskError,
  EvidenceMismatchError,
  MalformedClaimError,
  MalformedEvidenceError,
} from '@epirisk/shared/src/utils/errors.js';
import {
  createPatternContradictionDetector,
  type ContradictionDetector,
} from '../scoring/contradiction-detector.js';
import { evaluateAlignment } from '../scoring/alignment-evaluator.js';
import { calibrateConfidence } from '../scoring/confidence-calibrator.js';
import { decideVerdict } from '../scoring/verdict-engine.js';
import { mergeHedgeFlags } from '../scoring/hedge-detector.js';
import { buildAnswerReport } from './answer-report.js';

const log = createChildLogger('orchestration:scoring-pipeline');

export interface ScoringPipelineDeps {
  readonly contradictionDetector?: ContradictionDetector;
}

export interface AnalyzeOptions {
  readonly signal?: AbortSignal;
  readonly onOutcome?: (outcome: ClaimOutcome, index: number) => void;
  /** Claims whose evidence could not be gathered; each becomes UNVERIFIABLE with the error's code. */
  readonly failedClaims?: ReadonlyMap<string, Error>;
}

export interface ScoringPipeline {
  analyze(
    answerText: string,
    claims: readonly ClaimRecord[],
    evidenceByClaim: EvidenceByClaim,
    options?: AnalyzeOptions,
  ): Promise<AnswerReport>;
  scoreClaim(claim: ClaimRecord, evidence: readonly EvidenceChunk[]): VerdictOutcome;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

export function normalizeClaim(claim: ClaimRecord, config: ScoringConfig): NormalizedClaim {
  if (claim.text.trim().length === 0) {
    throw new MalformedClaimError('Claim text is empty', claim.id);
  }

  const rawConfidence = claim.rawConfidence ?? config.defaultRawConfidence;
  if (!isUnitInterval(rawConfidence)) {
    throw new MalformedClaimError(
      `Claim confidence must be within [0, 1], got ${String(rawConfidence)}`,
      claim.id,
    );
  }

  return {
    ...claim,
    rawConfidence,
    hedgeFlags: mergeHedgeFlags(claim.hedgeFlags, claim.text),
  };
}

export function validateEvidence(claimId: string, evidence: readonly EvidenceChunk[]): void {
  for (const chunk of evidence) {
    if (chunk.text.trim().length === 0) {
      throw new MalformedEvidenceError(`Evidence ${chunk.id} has empty text`, claimId, chunk.id);
    }
    if (!isUnitInterval(chunk.similarityScore)) {
      throw new MalformedEvidenceError(
        `Evidence ${chunk.id} similarity must be within [0, 1], got ${String(chunk.similarityScore)}`,
        claimId,
        chunk.id,
      );
    }
  }
}

function toUnverifiable(claim: ClaimRecord, error: unknown): UnverifiableOutcome {
  return {
    kind: 'unverifiable',
    claim,
    label: 'UNVERIFIABLE',
    reason: error instanceof Error ? error.message : String(error),
    code: error instanceof EpiriskError ? error.code : 'SCORING_FAILED',
  };
}

export function createScoringPipeline(
  config: ScoringConfig,
  deps: ScoringPipelineDeps = {},
): ScoringPipeline {
  const detector = deps.contradictionDetector ?? createPatternContradictionDetector();

  function scoreClaim(claim: ClaimRecord, evidence: readonly EvidenceChunk[]): VerdictOutcome {
    const normalized = normalizeClaim(claim, config);
    validateEvidence(claim.id, evidence);

    const alignment = evaluateAlignment(normalized, evidence, config, detector);
    const calibration = calibrateConfidence(normalized, alignment, config);
    const verdict = decideVerdict(calibration, alignment, config);

    return { kind: 'verdict', claim: normalized, verdict };
  }

  return {
    scoreClaim,

    async analyze(
      answerText: string,
      claims: readonly ClaimRecord[],
      evidenceByClaim: EvidenceByClaim,
      options: AnalyzeOptions = {},
    ): Promise<AnswerReport> {
      log.info({ claimCount: claims.length }, 'Scoring answer');

      const warnings: string[] = [];
      const claimIds = new Set(claims.map((claim) => claim.id));
      for (const claimId of evidenceByClaim.keys()) {
        if (!claimIds.has(claimId)) {
          const mismatch = new EvidenceMismatchError(claimId);
          log.warn({ claimId, code: mismatch.code }, 'Ignoring evidence for unknown claim');
          warnings.push(mismatch.message);
        }
      }

      const outcomes: ClaimOutcome[] = [];
      let cancelled = false;

      for (const claim of claims) {
        if (options.signal?.aborted) {
          cancelled = true;
          log.info(
            { completed: outcomes.length, total: claims.length },
            'Scoring cancelled, returning partial report',
          );
          break;
        }

        let outcome: ClaimOutcome;
        try {
          const failure = options.failedClaims?.get(claim.id);
          if (failure) throw failure;

          outcome = scoreClaim(claim, evidenceByClaim.get(claim.id) ?? []);
          log.debug(
            {
              claimId: claim.id,
              label: outcome.verdict.label,
              riskScore: outcome.verdict.riskScore,
            },
            'Claim scored',
          );
        } catch (error) {
          outcome = toUnverifiable(claim, error);
          log.warn(
            { claimId: claim.id, code: outcome.code, reason: outcome.reason },
            'Claim could not be scored, marking as unverifiable',
          );
        }

        outcomes.push(outcome);
        options.onOutcome?.(outcome, outcomes.length - 1);

        await yieldToEventLoop();
      }

      const report = buildAnswerReport({
        answerText,
        outcomes,
        totalClaims: claims.length,
        cancelled,
        warnings,
      });

      log.info(
        {
          overallRisk: report.overallRisk,
          degraded: report.degraded,
          cancelled: report.cancelled,
          counts: report.counts,
        },
        'Answer scored',
      );

      return report;
    },
  };
}
