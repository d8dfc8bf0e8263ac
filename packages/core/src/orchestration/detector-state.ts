import { Annotation } from '@langchain/langgraph';
import type { ClaimRecord, ExtractionMetadata } from '@epirisk/shared/src/types/claim.types.js';
import type { EvidenceByClaim } from '@epirisk/shared/src/types/evidence.types.js';
import type { AnswerReport } from '@epirisk/shared/src/types/analysis.types.js';

export const DetectorGraphAnnotation = Annotation.Root({
  answerText: Annotation<string>,
  signal: Annotation<AbortSignal | undefined>,
  claims: Annotation<readonly ClaimRecord[]>,
  extraction: Annotation<ExtractionMetadata | undefined>,
  evidenceByClaim: Annotation<EvidenceByClaim>,
  retrievalFailures: Annotation<ReadonlyMap<string, Error>>,
  report: Annotation<AnswerReport | undefined>,
});

export type DetectorGraphState = typeof DetectorGraphAnnotation.State;
