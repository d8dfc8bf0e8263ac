import { describe, it, expect, vi, beforeEach } from 'vitest';
import { validateAppConfig } from '@epirisk/schemas/src/validators.js';
import type { AppConfig } from '@epirisk/schemas/src/app-config.schema.js';
import { LlmError } from '@epirisk/shared/src/utils/errors.js';
import type { ClaimOutcome } from '@epirisk/shared/src/types/analysis.types.js';
import type { LlmClient, LlmResponse } from '../llm/llm-client.js';
import { createLlmClient } from '../llm/llm-client.js';
import { createMockEmbeddingClient } from '../embedding/mock-embedding-client.js';
import { createInMemoryEvidenceStore, type EvidenceStore } from '../retrieval/evidence-store.js';
import { createDetector } from './detector.js';

const answer = 'The Eiffel Tower is in Paris. Bananas are purple.';

function labels(outcomes: readonly ClaimOutcome[]): string[] {
  return outcomes.map((o) => (o.kind === 'verdict' ? o.verdict.label : o.label));
}

describe('createDetector', () => {
  let config: AppConfig;
  let evidenceStore: EvidenceStore;
  let llmClient: LlmClient;

  beforeEach(async () => {
    config = validateAppConfig({ llm: { provider: 'mock' } });
    evidenceStore = createInMemoryEvidenceStore(createMockEmbeddingClient(), config.retrieval);
    await evidenceStore.indexDocument('tower.md', 'The Eiffel Tower is in Paris, France.');
    await evidenceStore.indexDocument('fruit.md', 'Bananas are yellow when ripe.');
    llmClient = await createLlmClient(config.llm);
  });

  it('should extract, retrieve and score an answer', async () => {
    const detector = createDetector({ llmClient, evidenceStore, config });

    const { report, extraction } = await detector.analyze(answer);

    expect(extraction.afterFiltering).toBe(2);
    expect(report.answerText).toBe(answer);
    expect(labels(report.outcomes)).toEqual(['GROUNDED', 'HALLUCINATED']);
    expect(report.summary).toBe(
      '1/2 claims flagged as potential hallucinations. 1 claims are well-grounded.',
    );

    const [grounded] = report.outcomes;
    expect(grounded.kind === 'verdict' && grounded.verdict.bestEvidence?.sourceId).toBe('tower.md');
  });

  it('should request the configured number of chunks per claim', async () => {
    const retrieve = vi.spyOn(evidenceStore, 'retrieve');
    const detector = createDetector({
      llmClient,
      evidenceStore,
      config: { ...config, retrieval: { ...config.retrieval, topK: 2 } },
    });

    await detector.analyze(answer);

    expect(retrieve.mock.calls).toEqual([
      ['The Eiffel Tower is in Paris', 2],
      ['Bananas are purple', 2],
    ]);
  });

  it('should skip retrieval and return a cancelled report for an aborted signal', async () => {
    const retrieve = vi.spyOn(evidenceStore, 'retrieve');
    const controller = new AbortController();
    controller.abort();

    const { report } = await createDetector({ llmClient, evidenceStore, config }).analyze(answer, {
      signal: controller.signal,
    });

    expect(retrieve).not.toHaveBeenCalled();
    expect(report.cancelled).toBe(true);
    expect(report.outcomes).toEqual([]);
    expect(report.summary).toBe('Analysis cancelled after 0 of 2 claims.');
  });

  it('should report an extraction failure as an answer without claims', async () => {
    const invoke = vi.fn((): Promise<LlmResponse> => Promise.resolve({ content: 'sorry' }));

    const { report, extraction } = await createDetector({
      llmClient: { invoke },
      evidenceStore,
      config,
    }).analyze(answer);

    expect(extraction.error).toContain('Claim extractor returned invalid output');
    expect(report.outcomes).toEqual([]);
    expect(report.summary).toBe('No factual claims found in the answer.');
  });

  it('should mark a claim unverifiable when its evidence cannot be retrieved', async () => {
    const mock = createMockEmbeddingClient();
    let queries = 0;
    const failingStore = createInMemoryEvidenceStore(
      {
        generateEmbedding: (text) => {
          queries += 1;
          return queries === 2 ? Promise.reject(new Error('quota')) : mock.generateEmbedding(text);
        },
        generateEmbeddings: (texts) => mock.generateEmbeddings(texts),
      },
      config.retrieval,
    );
    await failingStore.indexDocument('tower.md', 'The Eiffel Tower is in Paris, France.');
    await failingStore.indexDocument('fruit.md', 'Bananas are yellow when ripe.');

    const { report } = await createDetector({
      llmClient,
      evidenceStore: failingStore,
      config,
    }).analyze(answer);

    expect(labels(report.outcomes)).toEqual(['GROUNDED', 'UNVERIFIABLE']);
    const [, failed] = report.outcomes;
    expect(failed.kind === 'unverifiable' && failed.code).toBe('RETRIEVAL_ERROR');
    expect(failed.kind === 'unverifiable' && failed.reason).toBe('Failed to embed claim: quota');
    expect(report.degraded).toBe(false);
    expect(report.summary).toBe(
      'All 1 verified claims appear grounded or weakly supported. 1 claim(s) could not be verified.',
    );
  });

  it('should propagate LLM transport failures', async () => {
    const invoke = vi.fn().mockRejectedValue(new LlmError('Vertex AI invocation failed: quota', false));

    await expect(
      createDetector({ llmClient: { invoke }, evidenceStore, config }).analyze(answer),
    ).rejects.toThrow(LlmError);
  });
});
