import { StateGraph, START, END } from '@langchain/langgraph';
import type { AppConfig } from '@epirisk/schemas/src/app-config.schema.js';
import type { ExtractionMetadata } from '@epirisk/shared/src/types/claim.types.js';
import type { EvidenceChunk } from '@epirisk/shared/src/types/evidence.types.js';
import type { AnswerReport } from '@epirisk/shared/src/types/analysis.types.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { AgentError, RetrievalError } from '@epirisk/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { EvidenceStore } from '../retrieval/evidence-store.js';
import type { ContradictionDetector } from '../scoring/contradiction-detector.js';
import { extractClaims } from '../extraction/claim-extractor.js';
import { createScoringPipeline } from './scoring-pipeline.js';
import { DetectorGraphAnnotation, type DetectorGraphState } from './detector-state.js';

const log = createChildLogger('orchestration:detector');

export interface DetectorConfig {
  readonly llmClient: LlmClient;
  readonly evidenceStore: EvidenceStore;
  readonly config: AppConfig;
  readonly contradictionDetector?: ContradictionDetector;
}

export interface DetectOptions {
  readonly signal?: AbortSignal;
}

export interface DetectionResult {
  readonly report: AnswerReport;
  readonly extraction: ExtractionMetadata;
}

export interface Detector {
  analyze(answerText: string, options?: DetectOptions): Promise<DetectionResult>;
}

export function createDetector(detectorConfig: DetectorConfig): Detector {
  const { llmClient, evidenceStore, config } = detectorConfig;
  const pipeline = createScoringPipeline(config.scoring, {
    contradictionDetector: detectorConfig.contradictionDetector,
  });

  async function extractNode(state: DetectorGraphState): Promise<Partial<DetectorGraphState>> {
    const { claims, metadata } = await extractClaims(state.answerText, llmClient, config.extraction);
    return { claims, extraction: metadata };
  }

  async function retrieveNode(state: DetectorGraphState): Promise<Partial<DetectorGraphState>> {
    const evidenceByClaim = new Map<string, readonly EvidenceChunk[]>();
    const retrievalFailures = new Map<string, Error>();

    for (const claim of state.claims) {
      if (state.signal?.aborted) break;
      try {
        evidenceByClaim.set(
          claim.id,
          await evidenceStore.retrieve(claim.text, config.retrieval.topK),
        );
      } catch (error) {
        if (!(error instanceof RetrievalError)) throw error;
        log.warn({ claimId: claim.id, error: error.message }, 'Evidence retrieval failed for claim');
        retrievalFailures.set(claim.id, error);
      }
    }

    log.debug(
      {
        claimCount: state.claims.length,
        retrievedFor: evidenceByClaim.size,
        failed: retrievalFailures.size,
      },
      'Evidence retrieved',
    );
    return { evidenceByClaim, retrievalFailures };
  }

  async function scoreNode(state: DetectorGraphState): Promise<Partial<DetectorGraphState>> {
    const report = await pipeline.analyze(state.answerText, state.claims, state.evidenceByClaim, {
      signal: state.signal,
      failedClaims: state.retrievalFailures,
    });
    return { report };
  }

  const graph = new StateGraph(DetectorGraphAnnotation)
    .addNode('extract', extractNode)
    .addNode('retrieve', retrieveNode)
    .addNode('score', scoreNode)
    .addEdge(START, 'extract')
    .addEdge('extract', 'retrieve')
    .addEdge('retrieve', 'score')
    .addEdge('score', END)
    .compile();

  return {
    async analyze(answerText: string, options: DetectOptions = {}): Promise<DetectionResult> {
      log.info({ answerLength: answerText.length }, 'Running detector');

      const result = await graph.invoke({
        answerText,
        signal: options.signal,
        claims: [],
        extraction: undefined,
        evidenceByClaim: new Map(),
        retrievalFailures: new Map(),
        report: undefined,
      });

      if (!result.report || !result.extraction) {
        throw new AgentError('Detector finished without producing a report');
      }

      log.info(
        { overallRisk: result.report.overallRisk, claimCount: result.claims.length },
        'Detector complete',
      );

      return { report: result.report, extraction: result.extraction };
    },
  };
}
